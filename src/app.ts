import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import path from 'path';
import multer from 'multer';
import { config } from './config';
import type { Services } from './services';
import { createAuthRouter } from './auth/auth.routes';
import { createUsersRouter } from './users/users.routes';
import { createPatientsRouter } from './patients/patients.routes';
import { createAppointmentsRouter } from './appointments/appointments.routes';
import { createClinicalRouter } from './clinical/clinical.routes';
import { createInventoryRouter } from './inventory/inventory.routes';
import { createAdminRouter } from './admin/admin.routes';
import { sendError } from './utils/errors';

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'status' in err && err.status === 400;
}

export function createApp(services: Services) {
  const app = express();

  app.use(cors({ origin: config.allowedOrigins, credentials: true }));
  app.use(express.json());
  app.use('/uploads', express.static(path.resolve(config.uploadDir)));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api/auth', createAuthRouter(services));
  app.use('/api/users', createUsersRouter(services));
  app.use('/api/patients', createPatientsRouter(services));
  app.use('/api/appointments', createAppointmentsRouter(services));
  app.use('/api/clinical', createClinicalRouter(services));
  app.use('/api/inventory', createInventoryRouter(services));
  app.use('/api/admin', createAdminRouter(services));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // errors raised by middleware before a handler's own try/catch
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      return res.status(400).json({ errors: { [err.field ?? 'file']: [err.message] } });
    }
    if (isBodyParseError(err)) {
      return res.status(400).json({ errors: { _: ['Malformed JSON body'] } });
    }
    return sendError(res, err, 'Request failed');
  });

  return app;
}
