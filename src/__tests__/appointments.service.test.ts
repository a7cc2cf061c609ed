import { beforeEach, describe, it, expect } from 'vitest';
import { createMemoryRepositories } from '../testing/memory.repositories';
import { addAppointment, addPatient, addUser, asActor } from '../testing/fixtures';
import type { Repositories } from '../repositories';
import { AppointmentsService } from '../appointments/appointments.service';
import { Patient } from '../types/patient.types';
import { User } from '../types/user.types';
import { ForbiddenError, NotFoundError, StateConflictError } from '../utils/errors';

const NOW = new Date(2026, 9, 19, 12, 0);
const TOMORROW_10 = new Date(2026, 9, 20, 10, 0);

describe('AppointmentsService', () => {
  let repos: Repositories;
  let appointments: AppointmentsService;
  let guardian: User;
  let vet: User;
  let desk: User;
  let patient: Patient;

  beforeEach(async () => {
    repos = createMemoryRepositories();
    appointments = new AppointmentsService(repos, () => NOW);
    guardian = await addUser(repos, 'guardian');
    vet = await addUser(repos, 'vet');
    desk = await addUser(repos, 'receptionist');
    patient = await addPatient(repos, guardian);
  });

  describe('create', () => {
    it('should book with defaults and the patient guardian', async () => {
      const booked = await appointments.create(asActor(guardian), {
        patient_id: patient.id,
        scheduled_at: TOMORROW_10,
        reason: 'Vaccination due',
        internal_notes: 'ignored for guardians',
      });

      expect(booked).toMatchObject({
        patient_id: patient.id,
        guardian_id: guardian.id,
        vet_id: null,
        status: 'booked',
        duration_minutes: 30,
        type: 'general_consultation',
        created_by: guardian.id,
        can_cancel: true,
        is_overdue: false,
      });
      expect(booked.ends_at).toEqual(new Date(2026, 9, 20, 10, 30));
      expect(booked).not.toHaveProperty('internal_notes');
      expect((await repos.appointments.findById(booked.id))?.internal_notes).toBe('');
    });

    it('should refuse a time in the past', async () => {
      await expect(
        appointments.create(asActor(desk), { patient_id: patient.id, scheduled_at: new Date(2026, 9, 19, 11, 0), reason: 'x' })
      ).rejects.toHaveProperty('fields', { scheduled_at: ['Appointments cannot be booked in the past'] });
    });

    it('should not let a guardian book for someone else patient', async () => {
      const other = await addUser(repos, 'guardian');
      await expect(
        appointments.create(asActor(other), { patient_id: patient.id, scheduled_at: TOMORROW_10, reason: 'x' })
      ).rejects.toBeInstanceOf(ForbiddenError);
    });

    it('should reject an inactive patient', async () => {
      const retired = await addPatient(repos, guardian, { active: false });
      await expect(
        appointments.create(asActor(desk), { patient_id: retired.id, scheduled_at: TOMORROW_10, reason: 'x' })
      ).rejects.toHaveProperty('fields', { patient_id: ['Cannot book an appointment for an inactive patient'] });
    });

    it('should insist on the patient guardian and a real vet', async () => {
      const other = await addUser(repos, 'guardian');
      await expect(
        appointments.create(asActor(desk), {
          patient_id: patient.id,
          guardian_id: other.id,
          scheduled_at: TOMORROW_10,
          reason: 'x',
        })
      ).rejects.toHaveProperty('fields', { guardian_id: ["The guardian must be the patient's guardian"] });

      await expect(
        appointments.create(asActor(desk), { patient_id: patient.id, vet_id: desk.id, scheduled_at: TOMORROW_10, reason: 'x' })
      ).rejects.toHaveProperty('fields', { vet_id: ['The selected user is not a veterinarian'] });
    });
  });

  describe('transitions', () => {
    it('should walk booked -> confirmed -> in_progress -> completed', async () => {
      const appt = await addAppointment(repos, patient, { vet_id: vet.id, scheduled_at: TOMORROW_10 });

      await appointments.transition(asActor(desk), appt.id, 'confirm');
      await appointments.transition(asActor(vet), appt.id, 'start');
      const done = await appointments.transition(asActor(vet), appt.id, 'complete');

      expect(done.status).toBe('completed');
      expect(done.confirmed_at).toEqual(NOW);
      expect(done.started_at).toEqual(NOW);
      expect(done.completed_at).toEqual(NOW);
      expect(done.can_cancel).toBe(false);
    });

    it('should let the guardian cancel but not confirm', async () => {
      const appt = await addAppointment(repos, patient, { scheduled_at: TOMORROW_10 });

      await expect(appointments.transition(asActor(guardian), appt.id, 'confirm')).rejects.toBeInstanceOf(
        ForbiddenError
      );
      const cancelled = await appointments.transition(asActor(guardian), appt.id, 'cancel', 'Feeling better');
      expect(cancelled).toMatchObject({ status: 'cancelled', cancellation_reason: 'Feeling better' });
    });

    it('should answer 409 when cancelling a completed appointment', async () => {
      const appt = await addAppointment(repos, patient, { status: 'completed' });
      await expect(appointments.transition(asActor(desk), appt.id, 'cancel')).rejects.toThrow(
        "Appointment cannot be cancelled from status 'completed'"
      );
      await expect(appointments.transition(asActor(desk), appt.id, 'cancel')).rejects.toBeInstanceOf(
        StateConflictError
      );
    });
  });

  describe('update', () => {
    it('should reset the reminder when rescheduling', async () => {
      const appt = await addAppointment(repos, patient, {
        scheduled_at: TOMORROW_10,
        reminder_sent: true,
        reminder_sent_at: NOW,
      });

      const moved = await appointments.update(asActor(desk), appt.id, { scheduled_at: new Date(2026, 9, 21, 9, 0) });
      expect(moved.reminder_sent).toBe(false);
      expect(moved.reminder_sent_at).toBeNull();
    });

    it('should refuse to edit a terminal appointment', async () => {
      const appt = await addAppointment(repos, patient, { status: 'cancelled' });
      await expect(appointments.update(asActor(desk), appt.id, { reason: 'later' })).rejects.toThrow(
        'Appointment is cancelled and can no longer be edited'
      );
    });
  });

  describe('scoping', () => {
    it('should show vets their own and unassigned appointments only', async () => {
      const otherVet = await addUser(repos, 'vet');
      const own = await addAppointment(repos, patient, { vet_id: vet.id, scheduled_at: new Date(2026, 9, 20, 9, 0) });
      const open = await addAppointment(repos, patient, { scheduled_at: new Date(2026, 9, 20, 11, 0) });
      const theirs = await addAppointment(repos, patient, { vet_id: otherVet.id });

      const listed = await appointments.list(asActor(vet), {});
      expect(listed.map((a) => a.id)).toEqual([own.id, open.id]);
      await expect(appointments.get(asActor(vet), theirs.id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should build a vet day schedule without cancelled and no-show visits', async () => {
      const kept = await addAppointment(repos, patient, { vet_id: vet.id, scheduled_at: TOMORROW_10 });
      await addAppointment(repos, patient, { vet_id: vet.id, scheduled_at: new Date(2026, 9, 20, 11, 0), status: 'cancelled' });
      await addAppointment(repos, patient, { vet_id: vet.id, scheduled_at: new Date(2026, 9, 20, 12, 0), status: 'no_show' });
      await addAppointment(repos, patient, { vet_id: vet.id, scheduled_at: new Date(2026, 9, 21, 10, 0) });

      const day = await appointments.vetSchedule(asActor(vet), new Date(2026, 9, 20));
      expect(day.map((a) => a.id)).toEqual([kept.id]);
      await expect(appointments.vetSchedule(asActor(desk), new Date(2026, 9, 20))).rejects.toHaveProperty('fields', {
        vet_id: ['vet_id is required'],
      });
    });

    it('should return booked and confirmed visits of the next days as upcoming', async () => {
      const soon = await addAppointment(repos, patient, { scheduled_at: TOMORROW_10 });
      await addAppointment(repos, patient, { scheduled_at: new Date(2026, 9, 20, 15, 0), status: 'cancelled' });
      await addAppointment(repos, patient, { scheduled_at: new Date(2026, 10, 30, 10, 0) });

      const upcoming = await appointments.upcoming(asActor(guardian));
      expect(upcoming.map((a) => a.id)).toEqual([soon.id]);
    });

    it('should only give guardians and vets their own list', async () => {
      await expect(appointments.mine(asActor(desk))).rejects.toBeInstanceOf(ForbiddenError);
    });
  });
});
