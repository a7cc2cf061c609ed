export const APPOINTMENT_STATUSES = [
  'booked',
  'confirmed',
  'in_progress',
  'completed',
  'cancelled',
  'no_show',
] as const;
export type AppointmentStatus = (typeof APPOINTMENT_STATUSES)[number];

export const TERMINAL_STATUSES: readonly AppointmentStatus[] = ['completed', 'cancelled', 'no_show'];

export const APPOINTMENT_TYPES = [
  'general_consultation',
  'vaccination',
  'surgery',
  'emergency',
  'follow_up',
  'deworming',
  'other',
] as const;
export type AppointmentType = (typeof APPOINTMENT_TYPES)[number];

export const APPOINTMENT_ACTIONS = ['confirm', 'start', 'complete', 'cancel', 'no_show'] as const;
export type AppointmentAction = (typeof APPOINTMENT_ACTIONS)[number];

export interface Appointment {
  id: number;
  patient_id: number;
  guardian_id: number;
  vet_id: number | null;
  scheduled_at: Date;
  duration_minutes: number;
  type: AppointmentType;
  status: AppointmentStatus;
  reason: string;
  notes: string;
  internal_notes: string;
  reminder_sent: boolean;
  reminder_sent_at: Date | null;
  confirmed_at: Date | null;
  started_at: Date | null;
  completed_at: Date | null;
  cancelled_at: Date | null;
  cancellation_reason: string;
  no_show_at: Date | null;
  created_by: number | null;
  created_at: Date;
  updated_at: Date;
}

export type NewAppointment = Omit<Appointment, 'id' | 'created_at' | 'updated_at'>;
export type AppointmentChanges = Partial<Omit<Appointment, 'id' | 'created_at'>>;

export interface AppointmentFilter {
  patientId?: number;
  guardianId?: number;
  vetId?: number;
  /** vet's own appointments plus the ones nobody has been assigned to */
  vetOrUnassigned?: number;
  statuses?: AppointmentStatus[];
  excludeStatuses?: AppointmentStatus[];
  type?: AppointmentType;
  from?: Date;
  to?: Date;
  reminderSent?: boolean;
  search?: string;
}

export interface AppointmentView extends Omit<Appointment, 'internal_notes'> {
  internal_notes?: string;
  ends_at: Date;
  is_overdue: boolean;
  can_cancel: boolean;
}

export function isAppointmentStatus(value: unknown): value is AppointmentStatus {
  return typeof value === 'string' && (APPOINTMENT_STATUSES as readonly string[]).includes(value);
}
