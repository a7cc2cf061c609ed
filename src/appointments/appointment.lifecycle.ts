import {
  Appointment,
  AppointmentAction,
  AppointmentChanges,
  AppointmentStatus,
  TERMINAL_STATUSES,
} from '../types/appointment.types';
import { StateConflictError } from '../utils/errors';

interface Transition {
  from: readonly AppointmentStatus[];
  to: AppointmentStatus;
  stamp: 'confirmed_at' | 'started_at' | 'completed_at' | 'cancelled_at' | 'no_show_at';
  /** Past-tense wording used in conflict messages. */
  verb: string;
}

export const TRANSITIONS: Record<AppointmentAction, Transition> = {
  confirm: { from: ['booked'], to: 'confirmed', stamp: 'confirmed_at', verb: 'confirmed' },
  start: { from: ['booked', 'confirmed'], to: 'in_progress', stamp: 'started_at', verb: 'started' },
  complete: { from: ['in_progress'], to: 'completed', stamp: 'completed_at', verb: 'completed' },
  cancel: { from: ['booked', 'confirmed'], to: 'cancelled', stamp: 'cancelled_at', verb: 'cancelled' },
  no_show: { from: ['booked', 'confirmed'], to: 'no_show', stamp: 'no_show_at', verb: 'marked as no-show' },
};

export function canTransition(status: AppointmentStatus, action: AppointmentAction): boolean {
  return TRANSITIONS[action].from.includes(status);
}

export function isTerminal(status: AppointmentStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Changes to persist for `action`, or a StateConflictError when the
 * appointment's current status is not an allowed source. Never mutates.
 */
export function applyTransition(
  appointment: Pick<Appointment, 'status'>,
  action: AppointmentAction,
  now: Date,
  reason?: string
): AppointmentChanges {
  const transition = TRANSITIONS[action];
  if (!canTransition(appointment.status, action)) {
    throw new StateConflictError(
      `Appointment cannot be ${transition.verb} from status '${appointment.status}'`
    );
  }

  const changes: AppointmentChanges = { status: transition.to };
  changes[transition.stamp] = now;
  if (action === 'cancel') changes.cancellation_reason = reason ?? '';
  return changes;
}

export function endsAt(appointment: Pick<Appointment, 'scheduled_at' | 'duration_minutes'>): Date {
  return new Date(appointment.scheduled_at.getTime() + appointment.duration_minutes * 60_000);
}

export function isOverdue(appointment: Pick<Appointment, 'scheduled_at' | 'status'>, now: Date): boolean {
  return appointment.scheduled_at < now && !isTerminal(appointment.status);
}
