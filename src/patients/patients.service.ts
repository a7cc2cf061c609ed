import type { Repositories } from '../repositories';
import {
  Breed,
  NewBreed,
  NewSpecies,
  Patient,
  PatientChanges,
  PatientFilter,
  PatientView,
  Sex,
  Species,
} from '../types/patient.types';
import { AuthUser } from '../types/user.types';
import { NotFoundError, StateConflictError, ValidationError } from '../utils/errors';
import { ageInYears } from '../utils/dates';

export interface PatientInput {
  guardian_id?: number | null;
  name?: string;
  species_id?: number | null;
  breed_id?: number | null;
  sex?: Sex;
  birth_date?: string | null;
  color?: string;
  weight_kg?: number | null;
  microchip?: string | null;
  sterilized?: boolean;
  allergies?: string;
  chronic_conditions?: string;
  notes?: string;
  active?: boolean;
}

export class PatientsService {
  constructor(private readonly repos: Repositories, private readonly now: () => Date) {}

  toView(patient: Patient): PatientView {
    return { ...patient, age_years: ageInYears(patient.birth_date, this.now()) };
  }

  // ---- species & breeds ----

  listSpecies(filter: { active?: boolean; search?: string }) {
    return this.repos.species.list(filter);
  }

  async getSpecies(id: number): Promise<Species> {
    const species = await this.repos.species.findById(id);
    if (!species) throw new NotFoundError('Species not found');
    return species;
  }

  createSpecies(input: Partial<NewSpecies> & { name: string }) {
    return this.repos.species.create({
      name: input.name,
      description: input.description ?? '',
      active: input.active ?? true,
    });
  }

  async updateSpecies(id: number, changes: Partial<NewSpecies>) {
    const species = await this.repos.species.update(id, changes);
    if (!species) throw new NotFoundError('Species not found');
    return species;
  }

  async deleteSpecies(id: number) {
    if (!(await this.repos.species.delete(id))) throw new NotFoundError('Species not found');
  }

  async speciesBreeds(speciesId: number): Promise<Breed[]> {
    await this.getSpecies(speciesId);
    return this.repos.breeds.list({ speciesId, active: true });
  }

  listBreeds(filter: { speciesId?: number; active?: boolean; search?: string }) {
    return this.repos.breeds.list(filter);
  }

  async getBreed(id: number): Promise<Breed> {
    const breed = await this.repos.breeds.findById(id);
    if (!breed) throw new NotFoundError('Breed not found');
    return breed;
  }

  private async assertSpeciesExists(speciesId: number) {
    if (!(await this.repos.species.findById(speciesId))) {
      throw ValidationError.field('species_id', 'Species not found');
    }
  }

  async createBreed(input: Partial<NewBreed> & { species_id: number; name: string }) {
    await this.assertSpeciesExists(input.species_id);
    return this.repos.breeds.create({
      species_id: input.species_id,
      name: input.name,
      description: input.description ?? '',
      active: input.active ?? true,
    });
  }

  async updateBreed(id: number, changes: Partial<NewBreed>) {
    if (changes.species_id) {
      await this.assertSpeciesExists(changes.species_id);
      const existing = await this.repos.breeds.findById(id);
      if (!existing) throw new NotFoundError('Breed not found');
      if (existing.species_id !== changes.species_id && (await this.repos.patients.count({ breedId: id })) > 0) {
        throw new StateConflictError('Breed is assigned to patients; it cannot move to another species');
      }
    }
    const breed = await this.repos.breeds.update(id, changes);
    if (!breed) throw new NotFoundError('Breed not found');
    return breed;
  }

  async deleteBreed(id: number) {
    if (!(await this.repos.breeds.delete(id))) throw new NotFoundError('Breed not found');
  }

  // ---- patients ----

  async list(actor: AuthUser, filter: PatientFilter): Promise<PatientView[]> {
    const scoped = actor.role === 'guardian' ? { ...filter, guardianId: actor.id } : filter;
    const patients = await this.repos.patients.list(scoped);
    return patients.map((p) => this.toView(p));
  }

  async mine(actor: AuthUser): Promise<PatientView[]> {
    const patients = await this.repos.patients.list({ guardianId: actor.id, active: true });
    return patients.map((p) => this.toView(p));
  }

  /** Guardians only ever see their own patients; anything else reads as missing. */
  async findVisible(actor: AuthUser, id: number): Promise<Patient> {
    const patient = await this.repos.patients.findById(id);
    if (!patient || (actor.role === 'guardian' && patient.guardian_id !== actor.id)) {
      throw new NotFoundError('Patient not found');
    }
    return patient;
  }

  async get(actor: AuthUser, id: number): Promise<PatientView> {
    return this.toView(await this.findVisible(actor, id));
  }

  /** Checks guardian, species, breed and microchip of the record as it would be saved. */
  private async checkRelations(
    actor: AuthUser,
    merged: PatientInput,
    existing?: Patient
  ): Promise<{ guardianId: number; speciesId: number }> {
    let guardianId = existing?.guardian_id ?? actor.id;
    if (actor.role !== 'guardian') {
      if (!merged.guardian_id) throw ValidationError.field('guardian_id', 'guardian_id is required');
      guardianId = merged.guardian_id;
      if (!existing || guardianId !== existing.guardian_id) {
        const guardian = await this.repos.users.findById(guardianId);
        if (!guardian || guardian.role !== 'guardian') {
          throw ValidationError.field('guardian_id', 'The selected user is not a guardian');
        }
      }
    }

    if (!merged.species_id) throw ValidationError.field('species_id', 'species_id is required');
    const species = await this.repos.species.findById(merged.species_id);
    if (!species) throw ValidationError.field('species_id', 'Species not found');

    if (merged.breed_id) {
      const breed = await this.repos.breeds.findById(merged.breed_id);
      if (!breed) throw ValidationError.field('breed_id', 'Breed not found');
      if (breed.species_id !== species.id) {
        throw ValidationError.field('breed_id', `Breed '${breed.name}' does not belong to species '${species.name}'`);
      }
    }

    if (merged.microchip) {
      const other = await this.repos.patients.findByMicrochip(merged.microchip);
      if (other && other.id !== existing?.id) {
        throw ValidationError.field('microchip', 'A patient with this microchip already exists');
      }
    }

    return { guardianId, speciesId: species.id };
  }

  async create(actor: AuthUser, input: PatientInput): Promise<PatientView> {
    const merged: PatientInput = actor.role === 'guardian' ? { ...input, guardian_id: actor.id } : input;
    const { guardianId, speciesId } = await this.checkRelations(actor, merged);

    const patient = await this.repos.patients.create({
      guardian_id: guardianId,
      name: merged.name ?? '',
      species_id: speciesId,
      breed_id: merged.breed_id ?? null,
      sex: merged.sex ?? 'unknown',
      birth_date: merged.birth_date ?? null,
      color: merged.color ?? '',
      weight_kg: merged.weight_kg ?? null,
      microchip: merged.microchip || null,
      photo_url: null,
      sterilized: merged.sterilized ?? false,
      allergies: merged.allergies ?? '',
      chronic_conditions: merged.chronic_conditions ?? '',
      notes: merged.notes ?? '',
      active: merged.active ?? true,
      deceased: false,
      deceased_on: null,
    });
    return this.toView(patient);
  }

  private async save(id: number, changes: PatientChanges, existing: Patient): Promise<PatientView> {
    const deceased = changes.deceased ?? existing.deceased;
    const patient = await this.repos.patients.update(id, deceased ? { ...changes, active: false } : changes);
    if (!patient) throw new NotFoundError('Patient not found');
    return this.toView(patient);
  }

  async update(actor: AuthUser, id: number, input: PatientInput): Promise<PatientView> {
    const existing = await this.findVisible(actor, id);
    const changes: PatientInput =
      actor.role === 'guardian' ? { ...input, guardian_id: existing.guardian_id } : input;
    const merged: PatientInput = { ...existing, ...changes };
    const { guardianId, speciesId } = await this.checkRelations(actor, merged, existing);
    if (guardianId !== existing.guardian_id) {
      // appointments carry the patient's guardian
      const appointments = await this.repos.appointments.list({ patientId: id });
      if (appointments.length > 0) {
        throw ValidationError.field('guardian_id', 'A patient with appointments cannot change guardian');
      }
    }

    const { guardian_id: _guardian, species_id: _species, microchip, ...rest } = changes;
    const patch: PatientChanges = { ...rest, guardian_id: guardianId, species_id: speciesId };
    if (microchip !== undefined) patch.microchip = microchip || null;

    return this.save(id, patch, existing);
  }

  async deactivate(actor: AuthUser, id: number) {
    const existing = await this.findVisible(actor, id);
    await this.save(id, { active: false }, existing);
  }

  async markDeceased(actor: AuthUser, id: number, deceasedOn: string): Promise<PatientView> {
    const existing = await this.findVisible(actor, id);
    if (existing.deceased) throw new StateConflictError('Patient is already marked as deceased');
    return this.save(id, { deceased: true, deceased_on: deceasedOn, active: false }, existing);
  }

  async updateWeight(actor: AuthUser, id: number, weightKg: number): Promise<PatientView> {
    if (!(weightKg > 0)) throw ValidationError.field('weight_kg', 'weight_kg must be a positive number');
    const existing = await this.findVisible(actor, id);
    return this.save(id, { weight_kg: weightKg }, existing);
  }

  async setPhoto(actor: AuthUser, id: number, photoUrl: string): Promise<PatientView> {
    const existing = await this.findVisible(actor, id);
    return this.save(id, { photo_url: photoUrl }, existing);
  }
}
