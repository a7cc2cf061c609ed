export const SEXES = ['male', 'female', 'unknown'] as const;
export type Sex = (typeof SEXES)[number];

export interface Species {
  id: number;
  name: string;
  description: string;
  active: boolean;
  created_at: Date;
}

export interface Breed {
  id: number;
  species_id: number;
  name: string;
  description: string;
  active: boolean;
  created_at: Date;
}

export interface Patient {
  id: number;
  guardian_id: number;
  name: string;
  species_id: number;
  breed_id: number | null;
  sex: Sex;
  birth_date: string | null;
  color: string;
  weight_kg: number | null;
  microchip: string | null;
  photo_url: string | null;
  sterilized: boolean;
  allergies: string;
  chronic_conditions: string;
  notes: string;
  active: boolean;
  deceased: boolean;
  deceased_on: string | null;
  created_at: Date;
  updated_at: Date;
}

export type NewSpecies = Omit<Species, 'id' | 'created_at'>;
export type NewBreed = Omit<Breed, 'id' | 'created_at'>;
export type NewPatient = Omit<Patient, 'id' | 'created_at' | 'updated_at'>;
export type PatientChanges = Partial<Omit<Patient, 'id' | 'created_at'>>;

export interface PatientFilter {
  guardianId?: number;
  speciesId?: number;
  breedId?: number;
  sex?: Sex;
  active?: boolean;
  deceased?: boolean;
  search?: string;
}

export interface PatientView extends Patient {
  age_years: number | null;
}
