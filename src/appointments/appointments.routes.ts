import { Response, Router } from 'express';
import { AuthRequest, authMiddleware, currentUser, requireStaff } from '../middleware/auth.middleware';
import { validateRequest, validated } from '../middleware/validation.middleware';
import type { Services } from '../services';
import type { AppointmentInput } from './appointments.service';
import { APPOINTMENT_STATUSES, APPOINTMENT_TYPES, AppointmentAction } from '../types/appointment.types';
import { MethodNotAllowedError, sendError } from '../utils/errors';
import { dateQuery, enumQuery, idParam, intQuery, textQuery } from '../utils/query';

const ACTION_PATHS: Record<string, AppointmentAction> = {
  confirm: 'confirm',
  start: 'start',
  complete: 'complete',
  'no-show': 'no_show',
};

export function createAppointmentsRouter({ appointments }: Services): Router {
  const router = Router();
  router.use(authMiddleware);

  router.get('/', async (req: AuthRequest, res) => {
    try {
      const status = enumQuery(req.query.status, 'status', APPOINTMENT_STATUSES);
      const list = await appointments.list(currentUser(req), {
        patientId: intQuery(req.query.patient_id, 'patient_id'),
        vetId: intQuery(req.query.vet_id, 'vet_id'),
        statuses: status ? [status] : undefined,
        type: enumQuery(req.query.type, 'type', APPOINTMENT_TYPES),
        from: dateQuery(req.query.from, 'from'),
        to: dateQuery(req.query.to, 'to'),
        search: textQuery(req.query.search),
      });
      res.json(list);
    } catch (err) {
      sendError(res, err, 'Failed to list appointments');
    }
  });

  router.get('/mine', async (req: AuthRequest, res) => {
    try {
      res.json(
        await appointments.mine(currentUser(req), enumQuery(req.query.status, 'status', APPOINTMENT_STATUSES))
      );
    } catch (err) {
      sendError(res, err, 'Failed to list appointments');
    }
  });

  router.get('/upcoming', async (req: AuthRequest, res) => {
    try {
      res.json(await appointments.upcoming(currentUser(req), intQuery(req.query.days, 'days') ?? 7));
    } catch (err) {
      sendError(res, err, 'Failed to list upcoming appointments');
    }
  });

  router.get('/vet-schedule', requireStaff, async (req: AuthRequest, res) => {
    try {
      const day = dateQuery(req.query.date, 'date') ?? new Date();
      res.json(await appointments.vetSchedule(currentUser(req), day, intQuery(req.query.vet_id, 'vet_id')));
    } catch (err) {
      sendError(res, err, 'Failed to load schedule');
    }
  });

  router.get('/:id', async (req: AuthRequest, res) => {
    try {
      res.json(await appointments.get(currentUser(req), idParam(req.params.id, 'Appointment')));
    } catch (err) {
      sendError(res, err, 'Failed to load appointment');
    }
  });

  router.post('/', validateRequest('createAppointment'), async (req: AuthRequest, res) => {
    try {
      res.status(201).json(await appointments.create(currentUser(req), validated<AppointmentInput>(req)));
    } catch (err) {
      sendError(res, err, 'Failed to create appointment');
    }
  });

  const update = async (req: AuthRequest, res: Response) => {
    try {
      res.json(
        await appointments.update(
          currentUser(req),
          idParam(req.params.id, 'Appointment'),
          validated<AppointmentInput>(req)
        )
      );
    } catch (err) {
      sendError(res, err, 'Failed to update appointment');
    }
  };
  router.put('/:id', requireStaff, validateRequest('updateAppointment'), update);
  router.patch('/:id', requireStaff, validateRequest('updateAppointment'), update);

  router.delete('/:id', (_req: AuthRequest, res) => {
    sendError(
      res,
      new MethodNotAllowedError('Appointments cannot be deleted; cancel the appointment instead'),
      'Failed to delete appointment'
    );
  });

  router.post('/:id/cancel', validateRequest('cancelAppointment'), async (req: AuthRequest, res) => {
    try {
      const { reason } = validated<{ reason?: string }>(req);
      res.json(
        await appointments.transition(currentUser(req), idParam(req.params.id, 'Appointment'), 'cancel', reason)
      );
    } catch (err) {
      sendError(res, err, 'Failed to cancel appointment');
    }
  });

  for (const [path, action] of Object.entries(ACTION_PATHS)) {
    router.post(`/:id/${path}`, requireStaff, async (req: AuthRequest, res) => {
      try {
        res.json(await appointments.transition(currentUser(req), idParam(req.params.id, 'Appointment'), action));
      } catch (err) {
        sendError(res, err, 'Failed to update appointment status');
      }
    });
  }

  return router;
}
