import type { Knex } from 'knex';
import {
  Appointment,
  AppointmentChanges,
  AppointmentFilter,
  AppointmentStatus,
  NewAppointment,
  isAppointmentStatus,
} from '../types/appointment.types';

export interface AppointmentRepository {
  list(filter: AppointmentFilter): Promise<Appointment[]>;
  findById(id: number): Promise<Appointment | undefined>;
  countByStatus(): Promise<Partial<Record<AppointmentStatus, number>>>;
  create(data: NewAppointment): Promise<Appointment>;
  update(id: number, changes: AppointmentChanges): Promise<Appointment | undefined>;
  /** Moves every booked/confirmed appointment that started before `cutoff` to no_show. */
  markNoShowsBefore(cutoff: Date, now: Date): Promise<number>;
}

export class KnexAppointmentRepository implements AppointmentRepository {
  constructor(private readonly db: Knex) {}

  async list(filter: AppointmentFilter): Promise<Appointment[]> {
    let query = this.db('appointments as a');

    if (filter.patientId) query = query.where('a.patient_id', filter.patientId);
    if (filter.guardianId) query = query.where('a.guardian_id', filter.guardianId);
    if (filter.vetId) query = query.where('a.vet_id', filter.vetId);
    if (filter.vetOrUnassigned) {
      const vetId = filter.vetOrUnassigned;
      query = query.where((b) => b.where('a.vet_id', vetId).orWhereNull('a.vet_id'));
    }
    if (filter.statuses) query = query.whereIn('a.status', filter.statuses);
    if (filter.excludeStatuses) query = query.whereNotIn('a.status', filter.excludeStatuses);
    if (filter.type) query = query.where('a.type', filter.type);
    if (filter.from) query = query.where('a.scheduled_at', '>=', filter.from);
    if (filter.to) query = query.where('a.scheduled_at', '<=', filter.to);
    if (filter.reminderSent !== undefined) query = query.where('a.reminder_sent', filter.reminderSent);
    if (filter.search) {
      const term = `%${filter.search}%`;
      query = query
        .leftJoin('patients as p', 'a.patient_id', 'p.id')
        .leftJoin('users as g', 'a.guardian_id', 'g.id')
        .leftJoin('users as v', 'a.vet_id', 'v.id')
        .where((b) =>
          b
            .whereILike('p.name', term)
            .orWhereILike('g.first_name', term)
            .orWhereILike('g.last_name', term)
            .orWhereILike('v.first_name', term)
            .orWhereILike('v.last_name', term)
            .orWhereILike('a.reason', term)
        );
    }

    return query.select('a.*').orderBy('a.scheduled_at', 'asc');
  }

  findById(id: number) {
    return this.db<Appointment>('appointments').where({ id }).first();
  }

  async countByStatus() {
    const result = await this.db.raw<{ rows: { status: string; count: number }[] }>('SELECT status, COUNT(*)::int AS count FROM appointments GROUP BY status');
    const counts: Partial<Record<AppointmentStatus, number>> = {};
    for (const row of result.rows) {
      if (isAppointmentStatus(row.status)) counts[row.status] = Number(row.count);
    }
    return counts;
  }

  async create(data: NewAppointment) {
    const [appointment] = await this.db<Appointment>('appointments').insert(data).returning('*');
    return appointment;
  }

  async update(id: number, changes: AppointmentChanges) {
    const [appointment] = await this.db<Appointment>('appointments')
      .where({ id })
      .update({ ...changes, updated_at: new Date() })
      .returning('*');
    return appointment;
  }

  markNoShowsBefore(cutoff: Date, now: Date) {
    return this.db<Appointment>('appointments')
      .where('scheduled_at', '<', cutoff)
      .whereIn('status', ['booked', 'confirmed'])
      .update({ status: 'no_show', no_show_at: now, updated_at: now });
  }
}
