import type { Repositories } from '../repositories';
import {
  Attachment,
  AttachmentType,
  ClinicalEpisode,
  ClinicalEpisodeChanges,
  ClinicalEpisodeFilter,
  Prognosis,
  VitalSigns,
} from '../types/clinical.types';
import { StockMovement } from '../types/inventory.types';
import { AuthUser } from '../types/user.types';
import { NotFoundError, StateConflictError, ValidationError } from '../utils/errors';

export interface EpisodeInput {
  appointment_id?: number;
  vet_id?: number | null;
  motive?: string;
  history?: string;
  physical_exam?: string;
  presumptive_diagnosis?: string;
  definitive_diagnosis?: string;
  treatment_plan?: string;
  medications?: string;
  procedures?: string;
  prognosis?: Prognosis;
  home_instructions?: string;
  next_checkup_on?: string | null;
}

export interface VitalsInput {
  episode_id: number;
  weight_kg: number;
  temperature_c?: number | null;
  heart_rate?: number | null;
  respiratory_rate?: number | null;
  systolic_bp?: number | null;
  diastolic_bp?: number | null;
  capillary_refill_s?: number | null;
  body_condition_score?: number | null;
  notes?: string;
}

export interface AttachmentInput {
  episode_id: number;
  type?: AttachmentType;
  title: string;
  description?: string;
}

export interface StoredFile {
  url: string;
  originalName: string;
  mimeType: string;
  size: number;
}

export interface EpisodeDetail extends ClinicalEpisode {
  vital_signs: VitalSigns[];
  attachments: Attachment[];
  stock_movements: StockMovement[];
}

export class ClinicalService {
  constructor(private readonly repos: Repositories) {}

  /** Guardians read episodes of their own patients, vets their own episodes. */
  private scope(actor: AuthUser, filter: ClinicalEpisodeFilter): ClinicalEpisodeFilter {
    if (actor.role === 'guardian') return { ...filter, guardianId: actor.id };
    if (actor.role === 'vet') return { ...filter, vetId: actor.id };
    return filter;
  }

  async findVisible(actor: AuthUser, id: number): Promise<ClinicalEpisode> {
    const episode = await this.repos.episodes.findById(id);
    if (!episode) throw new NotFoundError('Clinical episode not found');

    if (actor.role === 'vet' && episode.vet_id !== actor.id) {
      throw new NotFoundError('Clinical episode not found');
    }
    if (actor.role === 'guardian') {
      const patient = await this.repos.patients.findById(episode.patient_id);
      if (!patient || patient.guardian_id !== actor.id) throw new NotFoundError('Clinical episode not found');
    }
    return episode;
  }

  private async findEditable(actor: AuthUser, id: number): Promise<ClinicalEpisode> {
    const episode = await this.findVisible(actor, id);
    if (episode.closed) throw new StateConflictError('Clinical episode is closed; reopen it before making changes');
    return episode;
  }

  list(actor: AuthUser, filter: ClinicalEpisodeFilter) {
    return this.repos.episodes.list(this.scope(actor, filter));
  }

  async get(actor: AuthUser, id: number): Promise<EpisodeDetail> {
    const episode = await this.findVisible(actor, id);
    const [vitalSigns, attachments, movements] = await Promise.all([
      this.repos.vitals.list(id),
      this.repos.attachments.list(id),
      this.repos.movements.list({ episodeId: id }),
    ]);
    return { ...episode, vital_signs: vitalSigns, attachments, stock_movements: movements };
  }

  async byPatient(actor: AuthUser, patientId: number) {
    const patient = await this.repos.patients.findById(patientId);
    if (!patient || (actor.role === 'guardian' && patient.guardian_id !== actor.id)) {
      throw new NotFoundError('Patient not found');
    }
    return this.repos.episodes.list(this.scope(actor, { patientId }));
  }

  async create(actor: AuthUser, input: EpisodeInput): Promise<ClinicalEpisode> {
    if (!input.appointment_id) throw ValidationError.field('appointment_id', 'appointment_id is required');
    const appointment = await this.repos.appointments.findById(input.appointment_id);
    if (!appointment) throw ValidationError.field('appointment_id', 'Appointment not found');
    if (appointment.status !== 'in_progress' && appointment.status !== 'completed') {
      throw ValidationError.field(
        'appointment_id',
        `A clinical episode needs an appointment in progress or completed (current status: '${appointment.status}')`
      );
    }
    if (await this.repos.episodes.findByAppointment(appointment.id)) {
      throw new StateConflictError('This appointment already has a clinical episode');
    }

    const vetId = input.vet_id ?? appointment.vet_id ?? (actor.role === 'vet' ? actor.id : null);
    if (!vetId) throw ValidationError.field('vet_id', 'vet_id is required when the appointment has no vet');
    const vet = await this.repos.users.findById(vetId);
    if (!vet || vet.role !== 'vet') throw ValidationError.field('vet_id', 'The selected user is not a veterinarian');

    const episode = await this.repos.episodes.create({
      appointment_id: appointment.id,
      patient_id: appointment.patient_id,
      vet_id: vetId,
      motive: input.motive || appointment.reason,
      history: input.history ?? '',
      physical_exam: input.physical_exam ?? '',
      presumptive_diagnosis: input.presumptive_diagnosis ?? '',
      definitive_diagnosis: input.definitive_diagnosis ?? '',
      treatment_plan: input.treatment_plan ?? '',
      medications: input.medications ?? '',
      procedures: input.procedures ?? '',
      prognosis: input.prognosis ?? 'good',
      home_instructions: input.home_instructions ?? '',
      next_checkup_on: input.next_checkup_on ?? null,
      closed: false,
    });
    console.log(`[Clinical] episode #${episode.id} opened for appointment #${appointment.id}`);
    return episode;
  }

  async update(actor: AuthUser, id: number, input: EpisodeInput): Promise<ClinicalEpisode> {
    await this.findEditable(actor, id);
    const { appointment_id: _appointment, vet_id: _vet, ...fields } = input;
    const changes: ClinicalEpisodeChanges = fields;

    const episode = await this.repos.episodes.update(id, changes);
    if (!episode) throw new NotFoundError('Clinical episode not found');
    return episode;
  }

  async close(actor: AuthUser, id: number) {
    const episode = await this.findVisible(actor, id);
    if (episode.closed) throw new StateConflictError('Clinical episode is already closed');
    return this.setClosed(id, true);
  }

  async reopen(actor: AuthUser, id: number) {
    const episode = await this.findVisible(actor, id);
    if (!episode.closed) throw new StateConflictError('Clinical episode is not closed');
    return this.setClosed(id, false);
  }

  private async setClosed(id: number, closed: boolean) {
    const episode = await this.repos.episodes.update(id, { closed });
    if (!episode) throw new NotFoundError('Clinical episode not found');
    return episode;
  }

  // ---- vital signs ----

  /** Episode ids the caller may read, or null when the role sees every episode. */
  private async visibleEpisodeIds(actor: AuthUser): Promise<Set<number> | null> {
    if (actor.role !== 'guardian' && actor.role !== 'vet') return null;
    const episodes = await this.repos.episodes.list(this.scope(actor, {}));
    return new Set(episodes.map((e) => e.id));
  }

  async listVitals(actor: AuthUser, episodeId?: number): Promise<VitalSigns[]> {
    if (episodeId) {
      await this.findVisible(actor, episodeId);
      return this.repos.vitals.list(episodeId);
    }
    const [visible, vitals] = await Promise.all([this.visibleEpisodeIds(actor), this.repos.vitals.list()]);
    return visible ? vitals.filter((v) => visible.has(v.episode_id)) : vitals;
  }

  async getVitals(actor: AuthUser, id: number): Promise<VitalSigns> {
    const vitals = await this.repos.vitals.findById(id);
    if (!vitals) throw new NotFoundError('Vital signs not found');
    await this.findVisible(actor, vitals.episode_id);
    return vitals;
  }

  async recordVitals(actor: AuthUser, input: VitalsInput): Promise<VitalSigns> {
    await this.findEditable(actor, input.episode_id);
    return this.repos.vitals.create({
      episode_id: input.episode_id,
      weight_kg: input.weight_kg,
      temperature_c: input.temperature_c ?? null,
      heart_rate: input.heart_rate ?? null,
      respiratory_rate: input.respiratory_rate ?? null,
      systolic_bp: input.systolic_bp ?? null,
      diastolic_bp: input.diastolic_bp ?? null,
      capillary_refill_s: input.capillary_refill_s ?? null,
      body_condition_score: input.body_condition_score ?? null,
      notes: input.notes ?? '',
      recorded_by: actor.id,
    });
  }

  // ---- attachments ----

  async listAttachments(actor: AuthUser, episodeId?: number): Promise<Attachment[]> {
    if (episodeId) {
      await this.findVisible(actor, episodeId);
      return this.repos.attachments.list(episodeId);
    }
    const [visible, attachments] = await Promise.all([this.visibleEpisodeIds(actor), this.repos.attachments.list()]);
    return visible ? attachments.filter((a) => visible.has(a.episode_id)) : attachments;
  }

  async getAttachment(actor: AuthUser, id: number): Promise<Attachment> {
    const attachment = await this.repos.attachments.findById(id);
    if (!attachment) throw new NotFoundError('Attachment not found');
    await this.findVisible(actor, attachment.episode_id);
    return attachment;
  }

  async addAttachment(actor: AuthUser, input: AttachmentInput, file: StoredFile): Promise<Attachment> {
    await this.findEditable(actor, input.episode_id);
    return this.repos.attachments.create({
      episode_id: input.episode_id,
      type: input.type ?? 'other',
      title: input.title,
      description: input.description ?? '',
      file_url: file.url,
      original_name: file.originalName,
      mime_type: file.mimeType,
      size_bytes: file.size,
      uploaded_by: actor.id,
    });
  }

  async deleteAttachment(actor: AuthUser, id: number): Promise<Attachment> {
    const attachment = await this.getAttachment(actor, id);
    await this.findEditable(actor, attachment.episode_id);
    await this.repos.attachments.delete(id);
    return attachment;
  }
}
