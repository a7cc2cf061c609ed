import type { Knex } from 'knex';
import {
  Attachment,
  ClinicalEpisode,
  ClinicalEpisodeChanges,
  ClinicalEpisodeFilter,
  NewAttachment,
  NewClinicalEpisode,
  NewVitalSigns,
  VitalSigns,
} from '../types/clinical.types';

export interface ClinicalEpisodeRepository {
  list(filter: ClinicalEpisodeFilter): Promise<ClinicalEpisode[]>;
  findById(id: number): Promise<ClinicalEpisode | undefined>;
  findByAppointment(appointmentId: number): Promise<ClinicalEpisode | undefined>;
  create(data: NewClinicalEpisode): Promise<ClinicalEpisode>;
  update(id: number, changes: ClinicalEpisodeChanges): Promise<ClinicalEpisode | undefined>;
}

export interface VitalSignsRepository {
  list(episodeId?: number): Promise<VitalSigns[]>;
  findById(id: number): Promise<VitalSigns | undefined>;
  create(data: NewVitalSigns): Promise<VitalSigns>;
}

export interface AttachmentRepository {
  list(episodeId?: number): Promise<Attachment[]>;
  findById(id: number): Promise<Attachment | undefined>;
  create(data: NewAttachment): Promise<Attachment>;
  delete(id: number): Promise<boolean>;
}

export class KnexClinicalEpisodeRepository implements ClinicalEpisodeRepository {
  constructor(private readonly db: Knex) {}

  async list(filter: ClinicalEpisodeFilter): Promise<ClinicalEpisode[]> {
    let query = this.db('clinical_episodes as e');

    if (filter.patientId) query = query.where('e.patient_id', filter.patientId);
    if (filter.vetId) query = query.where('e.vet_id', filter.vetId);
    if (filter.closed !== undefined) query = query.where('e.closed', filter.closed);
    if (filter.guardianId) {
      query = query.join('patients as p', 'e.patient_id', 'p.id').where('p.guardian_id', filter.guardianId);
    }

    return query.select('e.*').orderBy('e.created_at', 'desc');
  }

  findById(id: number) {
    return this.db<ClinicalEpisode>('clinical_episodes').where({ id }).first();
  }

  findByAppointment(appointmentId: number) {
    return this.db<ClinicalEpisode>('clinical_episodes').where({ appointment_id: appointmentId }).first();
  }

  async create(data: NewClinicalEpisode) {
    const [episode] = await this.db<ClinicalEpisode>('clinical_episodes').insert(data).returning('*');
    return episode;
  }

  async update(id: number, changes: ClinicalEpisodeChanges) {
    const [episode] = await this.db<ClinicalEpisode>('clinical_episodes')
      .where({ id })
      .update({ ...changes, updated_at: new Date() })
      .returning('*');
    return episode;
  }
}

export class KnexVitalSignsRepository implements VitalSignsRepository {
  constructor(private readonly db: Knex) {}

  list(episodeId?: number) {
    const query = this.db<VitalSigns>('vital_signs');
    if (episodeId) query.where('episode_id', episodeId);
    return query.orderBy('recorded_at', 'desc');
  }

  findById(id: number) {
    return this.db<VitalSigns>('vital_signs').where({ id }).first();
  }

  async create(data: NewVitalSigns) {
    const [vitals] = await this.db<VitalSigns>('vital_signs').insert(data).returning('*');
    return vitals;
  }
}

export class KnexAttachmentRepository implements AttachmentRepository {
  constructor(private readonly db: Knex) {}

  list(episodeId?: number) {
    const query = this.db<Attachment>('attachments');
    if (episodeId) query.where('episode_id', episodeId);
    return query.orderBy('uploaded_at', 'desc');
  }

  findById(id: number) {
    return this.db<Attachment>('attachments').where({ id }).first();
  }

  async create(data: NewAttachment) {
    const [attachment] = await this.db<Attachment>('attachments').insert(data).returning('*');
    return attachment;
  }

  async delete(id: number) {
    return (await this.db<Attachment>('attachments').where({ id }).del()) > 0;
  }
}
