import { Router } from 'express';
import { AuthRequest, authMiddleware, requireAdmin } from '../middleware/auth.middleware';
import type { Services } from '../services';
import { JOBS, JOB_NAMES, isJobName } from '../jobs';
import { NotFoundError, sendError } from '../utils/errors';
import { intQuery } from '../utils/query';

export function createAdminRouter({ admin }: Services): Router {
  const router = Router();
  router.use(authMiddleware, requireAdmin);

  // ----- Stats / Dashboard -----
  router.get('/stats', async (_req: AuthRequest, res) => {
    try {
      res.json(await admin.stats());
    } catch (err) {
      sendError(res, err, 'Failed to load stats');
    }
  });

  router.get('/audit-logs', async (req: AuthRequest, res) => {
    try {
      const page = intQuery(req.query.page, 'page') ?? 1;
      const limit = Math.min(intQuery(req.query.limit, 'limit') ?? 50, 200);
      res.json(await admin.auditLogs(page, limit));
    } catch (err) {
      sendError(res, err, 'Failed to load audit logs');
    }
  });

  // ----- Background jobs -----
  router.get('/jobs', (_req: AuthRequest, res) => {
    res.json(JOB_NAMES.map((name) => ({ name, cron: JOBS[name].cron })));
  });

  router.post('/jobs/:name/run', async (req: AuthRequest, res) => {
    try {
      const { name } = req.params;
      if (!isJobName(name)) throw new NotFoundError(`Unknown job '${name}'`);
      res.json({ job: name, result: await admin.runJob(name) });
    } catch (err) {
      sendError(res, err, 'Job failed');
    }
  });

  return router;
}
