import { config } from './config';
import db from './db';
import { createKnexRepositories } from './repositories';
import { createServices } from './services';
import { createApp } from './app';

const app = createApp(createServices(createKnexRepositories(db)));

app.listen(config.port, () => {
  console.log(`[INFO] Server listening on http://localhost:${config.port}`);
  console.log(`[INFO] Environment: ${config.env}`);
});
