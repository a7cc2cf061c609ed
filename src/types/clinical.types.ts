export const PROGNOSES = ['excellent', 'good', 'guarded', 'poor'] as const;
export type Prognosis = (typeof PROGNOSES)[number];

export const ATTACHMENT_TYPES = ['radiograph', 'ultrasound', 'lab_result', 'photo', 'document', 'other'] as const;
export type AttachmentType = (typeof ATTACHMENT_TYPES)[number];

export interface ClinicalEpisode {
  id: number;
  appointment_id: number;
  patient_id: number;
  vet_id: number;
  motive: string;
  history: string;
  physical_exam: string;
  presumptive_diagnosis: string;
  definitive_diagnosis: string;
  treatment_plan: string;
  medications: string;
  procedures: string;
  prognosis: Prognosis;
  home_instructions: string;
  next_checkup_on: string | null;
  closed: boolean;
  created_at: Date;
  updated_at: Date;
}

export type NewClinicalEpisode = Omit<ClinicalEpisode, 'id' | 'created_at' | 'updated_at'>;
export type ClinicalEpisodeChanges = Partial<Omit<ClinicalEpisode, 'id' | 'appointment_id' | 'created_at'>>;

export interface ClinicalEpisodeFilter {
  patientId?: number;
  vetId?: number;
  guardianId?: number;
  closed?: boolean;
}

export interface VitalSigns {
  id: number;
  episode_id: number;
  weight_kg: number;
  temperature_c: number | null;
  heart_rate: number | null;
  respiratory_rate: number | null;
  systolic_bp: number | null;
  diastolic_bp: number | null;
  capillary_refill_s: number | null;
  body_condition_score: number | null;
  notes: string;
  recorded_by: number | null;
  recorded_at: Date;
}

export type NewVitalSigns = Omit<VitalSigns, 'id' | 'recorded_at'>;

export interface Attachment {
  id: number;
  episode_id: number;
  type: AttachmentType;
  title: string;
  description: string;
  file_url: string;
  original_name: string;
  mime_type: string;
  size_bytes: number;
  uploaded_by: number | null;
  uploaded_at: Date;
}

export type NewAttachment = Omit<Attachment, 'id' | 'uploaded_at'>;
