import type { Repositories } from '../repositories';
import {
  Appointment,
  AppointmentAction,
  AppointmentChanges,
  AppointmentFilter,
  AppointmentStatus,
  AppointmentType,
  AppointmentView,
} from '../types/appointment.types';
import { AuthUser, isStaff } from '../types/user.types';
import { ForbiddenError, NotFoundError, StateConflictError, ValidationError } from '../utils/errors';
import { addDays, endOfDay, startOfDay } from '../utils/dates';
import { applyTransition, canTransition, endsAt, isOverdue, isTerminal } from './appointment.lifecycle';

export interface AppointmentInput {
  patient_id?: number;
  guardian_id?: number | null;
  vet_id?: number | null;
  scheduled_at?: Date;
  duration_minutes?: number | null;
  type?: AppointmentType;
  reason?: string;
  notes?: string;
  internal_notes?: string;
}

export class AppointmentsService {
  constructor(private readonly repos: Repositories, private readonly now: () => Date) {}

  toView(appointment: Appointment, actor: AuthUser): AppointmentView {
    const view: AppointmentView = {
      ...appointment,
      ends_at: endsAt(appointment),
      is_overdue: isOverdue(appointment, this.now()),
      can_cancel: canTransition(appointment.status, 'cancel'),
    };
    if (actor.role === 'guardian') delete view.internal_notes;
    return view;
  }

  /** Guardians see their own appointments, vets their own plus unassigned ones. */
  private scope(actor: AuthUser, filter: AppointmentFilter): AppointmentFilter {
    if (actor.role === 'guardian') return { ...filter, guardianId: actor.id };
    if (actor.role === 'vet') return { ...filter, vetOrUnassigned: actor.id };
    return filter;
  }

  private isVisible(actor: AuthUser, appointment: Appointment): boolean {
    if (actor.role === 'guardian') return appointment.guardian_id === actor.id;
    if (actor.role === 'vet') return appointment.vet_id === null || appointment.vet_id === actor.id;
    return true;
  }

  async findVisible(actor: AuthUser, id: number): Promise<Appointment> {
    const appointment = await this.repos.appointments.findById(id);
    if (!appointment || !this.isVisible(actor, appointment)) {
      throw new NotFoundError('Appointment not found');
    }
    return appointment;
  }

  async list(actor: AuthUser, filter: AppointmentFilter): Promise<AppointmentView[]> {
    const appointments = await this.repos.appointments.list(this.scope(actor, filter));
    return appointments.map((a) => this.toView(a, actor));
  }

  async get(actor: AuthUser, id: number): Promise<AppointmentView> {
    return this.toView(await this.findVisible(actor, id), actor);
  }

  /** Resolves the patient, guardian and vet of the appointment as it would be saved. */
  private async checkRelations(
    actor: AuthUser,
    merged: AppointmentInput,
    existing?: Appointment
  ): Promise<{ patientId: number; guardianId: number }> {
    if (!merged.patient_id) throw ValidationError.field('patient_id', 'patient_id is required');
    const patient = await this.repos.patients.findById(merged.patient_id);
    if (!patient) throw ValidationError.field('patient_id', 'Patient not found');
    if (actor.role === 'guardian' && patient.guardian_id !== actor.id) {
      throw new ForbiddenError('You can only book appointments for your own patients');
    }
    if (!patient.active && patient.id !== existing?.patient_id) {
      throw ValidationError.field('patient_id', 'Cannot book an appointment for an inactive patient');
    }

    const guardianId = merged.guardian_id ?? patient.guardian_id;
    if (guardianId !== patient.guardian_id) {
      throw ValidationError.field('guardian_id', "The guardian must be the patient's guardian");
    }

    if (merged.vet_id && merged.vet_id !== existing?.vet_id) {
      const vet = await this.repos.users.findById(merged.vet_id);
      if (!vet || vet.role !== 'vet') {
        throw ValidationError.field('vet_id', 'The selected user is not a veterinarian');
      }
      if (!vet.active) throw ValidationError.field('vet_id', 'The selected veterinarian is inactive');
    }

    return { patientId: patient.id, guardianId };
  }

  async create(actor: AuthUser, input: AppointmentInput): Promise<AppointmentView> {
    if (!input.scheduled_at) throw ValidationError.field('scheduled_at', 'scheduled_at is required');
    if (input.scheduled_at < this.now()) {
      throw ValidationError.field('scheduled_at', 'Appointments cannot be booked in the past');
    }
    const { patientId, guardianId } = await this.checkRelations(actor, input);

    const appointment = await this.repos.appointments.create({
      patient_id: patientId,
      guardian_id: guardianId,
      vet_id: input.vet_id ?? null,
      scheduled_at: input.scheduled_at,
      duration_minutes: input.duration_minutes ?? 30,
      type: input.type ?? 'general_consultation',
      status: 'booked',
      reason: input.reason ?? '',
      notes: input.notes ?? '',
      internal_notes: actor.role === 'guardian' ? '' : input.internal_notes ?? '',
      reminder_sent: false,
      reminder_sent_at: null,
      confirmed_at: null,
      started_at: null,
      completed_at: null,
      cancelled_at: null,
      cancellation_reason: '',
      no_show_at: null,
      created_by: actor.id,
    });
    console.log(`[Appointments] #${appointment.id} booked for patient ${patientId} by user ${actor.id}`);
    return this.toView(appointment, actor);
  }

  /** Staff edit of the booking details. Status only moves through the action endpoints. */
  async update(actor: AuthUser, id: number, input: AppointmentInput): Promise<AppointmentView> {
    const existing = await this.findVisible(actor, id);
    if (isTerminal(existing.status)) {
      throw new StateConflictError(`Appointment is ${existing.status} and can no longer be edited`);
    }

    const merged: AppointmentInput = { ...existing, ...input };
    // a new patient brings its own guardian unless one is named
    if (input.patient_id && input.guardian_id === undefined) merged.guardian_id = null;
    const { patientId, guardianId } = await this.checkRelations(actor, merged, existing);

    const changes: AppointmentChanges = { patient_id: patientId, guardian_id: guardianId };
    if (input.vet_id !== undefined) changes.vet_id = input.vet_id;
    if (input.scheduled_at) changes.scheduled_at = input.scheduled_at;
    if (input.duration_minutes) changes.duration_minutes = input.duration_minutes;
    if (input.type) changes.type = input.type;
    if (input.reason !== undefined) changes.reason = input.reason;
    if (input.notes !== undefined) changes.notes = input.notes;
    if (input.internal_notes !== undefined) changes.internal_notes = input.internal_notes;
    if (input.scheduled_at && input.scheduled_at.getTime() !== existing.scheduled_at.getTime()) {
      changes.reminder_sent = false;
      changes.reminder_sent_at = null;
    }

    const appointment = await this.repos.appointments.update(id, changes);
    if (!appointment) throw new NotFoundError('Appointment not found');
    return this.toView(appointment, actor);
  }

  async transition(
    actor: AuthUser,
    id: number,
    action: AppointmentAction,
    reason?: string
  ): Promise<AppointmentView> {
    const existing = await this.findVisible(actor, id);
    const allowed = action === 'cancel' ? isStaff(actor) || existing.guardian_id === actor.id : isStaff(actor);
    if (!allowed) throw new ForbiddenError('You are not allowed to change this appointment');

    const appointment = await this.repos.appointments.update(id, applyTransition(existing, action, this.now(), reason));
    if (!appointment) throw new NotFoundError('Appointment not found');
    console.log(`[Appointments] #${id} ${existing.status} -> ${appointment.status} by user ${actor.id}`);
    return this.toView(appointment, actor);
  }

  async mine(actor: AuthUser, status?: AppointmentStatus): Promise<AppointmentView[]> {
    const filter: AppointmentFilter = status ? { statuses: [status] } : {};
    if (actor.role === 'guardian') filter.guardianId = actor.id;
    else if (actor.role === 'vet') filter.vetId = actor.id;
    else throw new ForbiddenError('Only guardians and vets have their own appointments');

    const appointments = await this.repos.appointments.list(filter);
    return appointments.map((a) => this.toView(a, actor));
  }

  /** One vet's appointments on a calendar day, without cancelled and no-show ones. */
  async vetSchedule(actor: AuthUser, day: Date, vetId?: number): Promise<AppointmentView[]> {
    const targetVet = vetId ?? (actor.role === 'vet' ? actor.id : undefined);
    if (!targetVet) throw ValidationError.field('vet_id', 'vet_id is required');

    const appointments = await this.repos.appointments.list({
      vetId: targetVet,
      from: startOfDay(day),
      to: endOfDay(day),
      excludeStatuses: ['cancelled', 'no_show'],
    });
    return appointments.map((a) => this.toView(a, actor));
  }

  async upcoming(actor: AuthUser, days = 7): Promise<AppointmentView[]> {
    const now = this.now();
    const appointments = await this.repos.appointments.list(
      this.scope(actor, { from: now, to: addDays(now, days), statuses: ['booked', 'confirmed'] })
    );
    return appointments.map((a) => this.toView(a, actor));
  }
}
