import type { Knex } from 'knex';
import {
  Breed,
  NewBreed,
  NewPatient,
  NewSpecies,
  Patient,
  PatientChanges,
  PatientFilter,
  Species,
} from '../types/patient.types';

export interface SpeciesRepository {
  list(filter: { active?: boolean; search?: string }): Promise<Species[]>;
  findById(id: number): Promise<Species | undefined>;
  create(data: NewSpecies): Promise<Species>;
  update(id: number, changes: Partial<NewSpecies>): Promise<Species | undefined>;
  delete(id: number): Promise<boolean>;
}

export interface BreedRepository {
  list(filter: { speciesId?: number; active?: boolean; search?: string }): Promise<Breed[]>;
  findById(id: number): Promise<Breed | undefined>;
  create(data: NewBreed): Promise<Breed>;
  update(id: number, changes: Partial<NewBreed>): Promise<Breed | undefined>;
  delete(id: number): Promise<boolean>;
}

export interface PatientRepository {
  list(filter: PatientFilter): Promise<Patient[]>;
  findById(id: number): Promise<Patient | undefined>;
  findByMicrochip(microchip: string): Promise<Patient | undefined>;
  count(filter: PatientFilter): Promise<number>;
  create(data: NewPatient): Promise<Patient>;
  update(id: number, changes: PatientChanges): Promise<Patient | undefined>;
}

export class KnexSpeciesRepository implements SpeciesRepository {
  constructor(private readonly db: Knex) {}

  async list(filter: { active?: boolean; search?: string }) {
    let query = this.db<Species>('species');
    if (filter.active !== undefined) query = query.where('active', filter.active);
    if (filter.search) {
      const term = `%${filter.search}%`;
      query = query.where((b) => b.whereILike('name', term).orWhereILike('description', term));
    }
    return query.orderBy('name');
  }

  findById(id: number) {
    return this.db<Species>('species').where({ id }).first();
  }

  async create(data: NewSpecies) {
    const [species] = await this.db<Species>('species').insert(data).returning('*');
    return species;
  }

  async update(id: number, changes: Partial<NewSpecies>) {
    const [species] = await this.db<Species>('species').where({ id }).update(changes).returning('*');
    return species;
  }

  async delete(id: number) {
    return (await this.db<Species>('species').where({ id }).del()) > 0;
  }
}

export class KnexBreedRepository implements BreedRepository {
  constructor(private readonly db: Knex) {}

  async list(filter: { speciesId?: number; active?: boolean; search?: string }) {
    let query = this.db<Breed>('breeds');
    if (filter.speciesId) query = query.where('species_id', filter.speciesId);
    if (filter.active !== undefined) query = query.where('active', filter.active);
    if (filter.search) query = query.whereILike('name', `%${filter.search}%`);
    return query.orderBy(['species_id', 'name']);
  }

  findById(id: number) {
    return this.db<Breed>('breeds').where({ id }).first();
  }

  async create(data: NewBreed) {
    const [breed] = await this.db<Breed>('breeds').insert(data).returning('*');
    return breed;
  }

  async update(id: number, changes: Partial<NewBreed>) {
    const [breed] = await this.db<Breed>('breeds').where({ id }).update(changes).returning('*');
    return breed;
  }

  async delete(id: number) {
    return (await this.db<Breed>('breeds').where({ id }).del()) > 0;
  }
}

export class KnexPatientRepository implements PatientRepository {
  constructor(private readonly db: Knex) {}

  private filtered(filter: PatientFilter) {
    let query = this.db('patients as p');

    if (filter.guardianId) query = query.where('p.guardian_id', filter.guardianId);
    if (filter.speciesId) query = query.where('p.species_id', filter.speciesId);
    if (filter.breedId) query = query.where('p.breed_id', filter.breedId);
    if (filter.sex) query = query.where('p.sex', filter.sex);
    if (filter.active !== undefined) query = query.where('p.active', filter.active);
    if (filter.deceased !== undefined) query = query.where('p.deceased', filter.deceased);
    if (filter.search) {
      const term = `%${filter.search}%`;
      query = query
        .leftJoin('users as g', 'p.guardian_id', 'g.id')
        .where((b) =>
          b
            .whereILike('p.name', term)
            .orWhereILike('p.microchip', term)
            .orWhereILike('p.color', term)
            .orWhereILike('g.first_name', term)
            .orWhereILike('g.last_name', term)
        );
    }

    return query;
  }

  async list(filter: PatientFilter): Promise<Patient[]> {
    return this.filtered(filter).select('p.*').orderBy('p.created_at', 'desc');
  }

  findById(id: number) {
    return this.db<Patient>('patients').where({ id }).first();
  }

  findByMicrochip(microchip: string) {
    return this.db<Patient>('patients').where({ microchip }).first();
  }

  async count(filter: PatientFilter) {
    const row = await this.filtered(filter).count({ c: '*' }).first();
    return Number(row?.c ?? 0);
  }

  async create(data: NewPatient) {
    const [patient] = await this.db<Patient>('patients').insert(data).returning('*');
    return patient;
  }

  async update(id: number, changes: PatientChanges) {
    const [patient] = await this.db<Patient>('patients')
      .where({ id })
      .update({ ...changes, updated_at: new Date() })
      .returning('*');
    return patient;
  }
}
