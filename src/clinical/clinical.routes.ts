import { Response, Router } from 'express';
import {
  AuthRequest,
  authMiddleware,
  currentUser,
  requireRole,
  requireStaff,
} from '../middleware/auth.middleware';
import { validateRequest, validated } from '../middleware/validation.middleware';
import { uploadAttachment, uploadUrl } from '../middleware/upload.middleware';
import type { Services } from '../services';
import type { AttachmentInput, EpisodeInput, VitalsInput } from './clinical.service';
import { MethodNotAllowedError, ValidationError, sendError } from '../utils/errors';
import { boolQuery, idParam, intQuery } from '../utils/query';

const requireClinician = requireRole('vet', 'admin');

export function createClinicalRouter({ clinical }: Services): Router {
  const router = Router();
  router.use(authMiddleware);

  // ----- episodes -----
  router.get('/episodes', async (req: AuthRequest, res) => {
    try {
      const list = await clinical.list(currentUser(req), {
        patientId: intQuery(req.query.patient_id, 'patient_id'),
        vetId: intQuery(req.query.vet_id, 'vet_id'),
        closed: boolQuery(req.query.closed, 'closed'),
      });
      res.json(list);
    } catch (err) {
      sendError(res, err, 'Failed to list clinical episodes');
    }
  });

  router.get('/episodes/:id', async (req: AuthRequest, res) => {
    try {
      res.json(await clinical.get(currentUser(req), idParam(req.params.id, 'Clinical episode')));
    } catch (err) {
      sendError(res, err, 'Failed to load clinical episode');
    }
  });

  router.get('/patients/:id/episodes', async (req: AuthRequest, res) => {
    try {
      res.json(await clinical.byPatient(currentUser(req), idParam(req.params.id, 'Patient')));
    } catch (err) {
      sendError(res, err, 'Failed to list clinical episodes');
    }
  });

  router.post('/episodes', requireClinician, validateRequest('createEpisode'), async (req: AuthRequest, res) => {
    try {
      res.status(201).json(await clinical.create(currentUser(req), validated<EpisodeInput>(req)));
    } catch (err) {
      sendError(res, err, 'Failed to create clinical episode');
    }
  });

  const update = async (req: AuthRequest, res: Response) => {
    try {
      res.json(
        await clinical.update(currentUser(req), idParam(req.params.id, 'Clinical episode'), validated<EpisodeInput>(req))
      );
    } catch (err) {
      sendError(res, err, 'Failed to update clinical episode');
    }
  };
  router.put('/episodes/:id', requireClinician, validateRequest('updateEpisode'), update);
  router.patch('/episodes/:id', requireClinician, validateRequest('updateEpisode'), update);

  router.post('/episodes/:id/close', requireClinician, async (req: AuthRequest, res) => {
    try {
      res.json(await clinical.close(currentUser(req), idParam(req.params.id, 'Clinical episode')));
    } catch (err) {
      sendError(res, err, 'Failed to close clinical episode');
    }
  });

  router.post('/episodes/:id/reopen', requireClinician, async (req: AuthRequest, res) => {
    try {
      res.json(await clinical.reopen(currentUser(req), idParam(req.params.id, 'Clinical episode')));
    } catch (err) {
      sendError(res, err, 'Failed to reopen clinical episode');
    }
  });

  // ----- vital signs: point-in-time readings, never edited -----
  router.get('/vitals', async (req: AuthRequest, res) => {
    try {
      res.json(await clinical.listVitals(currentUser(req), intQuery(req.query.episode_id, 'episode_id')));
    } catch (err) {
      sendError(res, err, 'Failed to list vital signs');
    }
  });

  router.get('/vitals/:id', async (req: AuthRequest, res) => {
    try {
      res.json(await clinical.getVitals(currentUser(req), idParam(req.params.id, 'Vital signs')));
    } catch (err) {
      sendError(res, err, 'Failed to load vital signs');
    }
  });

  router.post('/vitals', requireStaff, validateRequest('createVitals'), async (req: AuthRequest, res) => {
    try {
      res.status(201).json(await clinical.recordVitals(currentUser(req), validated<VitalsInput>(req)));
    } catch (err) {
      sendError(res, err, 'Failed to record vital signs');
    }
  });

  router.all('/vitals/:id', (_req: AuthRequest, res) => {
    sendError(res, new MethodNotAllowedError('Vital signs cannot be modified once recorded'), 'Request failed');
  });

  // ----- attachments -----
  router.get('/attachments', async (req: AuthRequest, res) => {
    try {
      res.json(await clinical.listAttachments(currentUser(req), intQuery(req.query.episode_id, 'episode_id')));
    } catch (err) {
      sendError(res, err, 'Failed to list attachments');
    }
  });

  router.get('/attachments/:id', async (req: AuthRequest, res) => {
    try {
      res.json(await clinical.getAttachment(currentUser(req), idParam(req.params.id, 'Attachment')));
    } catch (err) {
      sendError(res, err, 'Failed to load attachment');
    }
  });

  router.post(
    '/attachments',
    requireStaff,
    uploadAttachment.single('file'),
    validateRequest('createAttachment'),
    async (req: AuthRequest, res) => {
      try {
        if (!req.file) throw ValidationError.field('file', 'A file is required');
        const attachment = await clinical.addAttachment(currentUser(req), validated<AttachmentInput>(req), {
          url: uploadUrl('attachments', req.file),
          originalName: req.file.originalname,
          mimeType: req.file.mimetype,
          size: req.file.size,
        });
        res.status(201).json(attachment);
      } catch (err) {
        sendError(res, err, 'Failed to upload attachment');
      }
    }
  );

  router.delete('/attachments/:id', requireStaff, async (req: AuthRequest, res) => {
    try {
      await clinical.deleteAttachment(currentUser(req), idParam(req.params.id, 'Attachment'));
      res.status(204).end();
    } catch (err) {
      sendError(res, err, 'Failed to delete attachment');
    }
  });

  return router;
}
