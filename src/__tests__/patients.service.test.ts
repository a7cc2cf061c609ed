import { beforeEach, describe, it, expect } from 'vitest';
import { createMemoryRepositories } from '../testing/memory.repositories';
import { addAppointment, addPatient, addUser, asActor } from '../testing/fixtures';
import type { Repositories } from '../repositories';
import { PatientsService } from '../patients/patients.service';
import { Breed, Species } from '../types/patient.types';
import { User } from '../types/user.types';
import { NotFoundError, StateConflictError } from '../utils/errors';

const NOW = new Date(2026, 9, 19, 12, 0);

describe('PatientsService', () => {
  let repos: Repositories;
  let patients: PatientsService;
  let guardian: User;
  let desk: User;
  let dog: Species;
  let cat: Species;
  let labrador: Breed;
  let siamese: Breed;

  beforeEach(async () => {
    repos = createMemoryRepositories();
    patients = new PatientsService(repos, () => NOW);
    guardian = await addUser(repos, 'guardian');
    desk = await addUser(repos, 'receptionist');
    dog = await repos.species.create({ name: 'Dog', description: '', active: true });
    cat = await repos.species.create({ name: 'Cat', description: '', active: true });
    labrador = await repos.breeds.create({ species_id: dog.id, name: 'Labrador Retriever', description: '', active: true });
    siamese = await repos.breeds.create({ species_id: cat.id, name: 'Siamese', description: '', active: true });
  });

  describe('create', () => {
    it('should register a patient for the guardian who creates it', async () => {
      const patient = await patients.create(asActor(guardian), {
        name: 'Rocky',
        species_id: dog.id,
        breed_id: labrador.id,
        birth_date: '2020-11-02',
        guardian_id: desk.id,
      });

      expect(patient.guardian_id).toBe(guardian.id);
      expect(patient.sex).toBe('unknown');
      expect(patient.active).toBe(true);
      expect(patient.age_years).toBe(5);
    });

    it('should reject a breed from another species', async () => {
      await expect(
        patients.create(asActor(guardian), { name: 'Rocky', species_id: dog.id, breed_id: siamese.id })
      ).rejects.toHaveProperty('fields', {
        breed_id: ["Breed 'Siamese' does not belong to species 'Dog'"],
      });
    });

    it('should require staff to name a guardian account', async () => {
      await expect(
        patients.create(asActor(desk), { name: 'Rocky', species_id: dog.id })
      ).rejects.toHaveProperty('fields', { guardian_id: ['guardian_id is required'] });

      await expect(
        patients.create(asActor(desk), { name: 'Rocky', species_id: dog.id, guardian_id: desk.id })
      ).rejects.toHaveProperty('fields', { guardian_id: ['The selected user is not a guardian'] });

      const patient = await patients.create(asActor(desk), { name: 'Rocky', species_id: dog.id, guardian_id: guardian.id });
      expect(patient.guardian_id).toBe(guardian.id);
    });

    it('should keep microchips unique', async () => {
      await patients.create(asActor(guardian), { name: 'Rocky', species_id: dog.id, microchip: '941000024680135' });
      await expect(
        patients.create(asActor(guardian), { name: 'Max', species_id: dog.id, microchip: '941000024680135' })
      ).rejects.toHaveProperty('fields', { microchip: ['A patient with this microchip already exists'] });
    });
  });

  describe('update', () => {
    it('should check the breed against the species already on record', async () => {
      const patient = await addPatient(repos, guardian, { species_id: dog.id });
      await expect(patients.update(asActor(desk), patient.id, { breed_id: siamese.id })).rejects.toHaveProperty(
        'fields',
        { breed_id: ["Breed 'Siamese' does not belong to species 'Dog'"] }
      );

      const updated = await patients.update(asActor(desk), patient.id, { breed_id: labrador.id, color: 'Black' });
      expect(updated.breed_id).toBe(labrador.id);
      expect(updated.color).toBe('Black');
      expect(updated.guardian_id).toBe(guardian.id);
    });

    it('should move a patient without appointments to another guardian', async () => {
      const patient = await addPatient(repos, guardian, { species_id: dog.id });
      const other = await addUser(repos, 'guardian');

      const updated = await patients.update(asActor(desk), patient.id, { guardian_id: other.id });
      expect(updated.guardian_id).toBe(other.id);
    });

    it('should refuse a new guardian while appointments name the current one', async () => {
      const patient = await addPatient(repos, guardian, { species_id: dog.id });
      const appointment = await addAppointment(repos, patient);
      const other = await addUser(repos, 'guardian');

      await expect(patients.update(asActor(desk), patient.id, { guardian_id: other.id })).rejects.toHaveProperty(
        'fields',
        { guardian_id: ['A patient with appointments cannot change guardian'] }
      );
      expect((await repos.patients.findById(patient.id))?.guardian_id).toBe(guardian.id);
      expect((await repos.appointments.findById(appointment.id))?.guardian_id).toBe(guardian.id);
    });

    it('should keep a deceased patient inactive', async () => {
      const patient = await addPatient(repos, guardian, { species_id: dog.id, deceased: true, active: false });
      const updated = await patients.update(asActor(desk), patient.id, { active: true });
      expect(updated.active).toBe(false);
    });
  });

  describe('visibility', () => {
    it('should hide other guardians patients as missing', async () => {
      const other = await addUser(repos, 'guardian');
      const theirs = await addPatient(repos, other, { species_id: cat.id });
      const mine = await addPatient(repos, guardian, { species_id: dog.id });

      await expect(patients.get(asActor(guardian), theirs.id)).rejects.toBeInstanceOf(NotFoundError);
      const listed = await patients.list(asActor(guardian), {});
      expect(listed.map((p) => p.id)).toEqual([mine.id]);

      const all = await patients.list(asActor(desk), {});
      expect(all).toHaveLength(2);
    });

    it('should list only active patients as mine', async () => {
      const active = await addPatient(repos, guardian, { species_id: dog.id, name: 'Rocky' });
      await addPatient(repos, guardian, { species_id: dog.id, name: 'Old Max', active: false });

      const mine = await patients.mine(asActor(guardian));
      expect(mine.map((p) => p.id)).toEqual([active.id]);
    });
  });

  it('should mark a patient deceased once', async () => {
    const patient = await addPatient(repos, guardian, { species_id: dog.id });

    const deceased = await patients.markDeceased(asActor(desk), patient.id, '2026-10-18');
    expect(deceased).toMatchObject({ deceased: true, deceased_on: '2026-10-18', active: false });

    await expect(patients.markDeceased(asActor(desk), patient.id, '2026-10-18')).rejects.toBeInstanceOf(
      StateConflictError
    );
  });

  it('should reject a non-positive weight', async () => {
    const patient = await addPatient(repos, guardian, { species_id: dog.id });
    await expect(patients.updateWeight(asActor(desk), patient.id, 0)).rejects.toHaveProperty('fields', {
      weight_kg: ['weight_kg must be a positive number'],
    });
    const updated = await patients.updateWeight(asActor(desk), patient.id, 12.4);
    expect(updated.weight_kg).toBe(12.4);
  });

  describe('updateBreed', () => {
    it('should refuse to move a breed in use to another species', async () => {
      await addPatient(repos, guardian, { species_id: dog.id, breed_id: labrador.id });

      await expect(patients.updateBreed(labrador.id, { species_id: cat.id })).rejects.toThrow(
        'Breed is assigned to patients; it cannot move to another species'
      );
      expect((await repos.breeds.findById(labrador.id))?.species_id).toBe(dog.id);

      const renamed = await patients.updateBreed(labrador.id, { species_id: dog.id, name: 'Labrador' });
      expect(renamed.name).toBe('Labrador');
    });

    it('should move an unused breed', async () => {
      const moved = await patients.updateBreed(siamese.id, { species_id: dog.id });
      expect(moved.species_id).toBe(dog.id);
    });
  });

  it('should list only the active breeds of a species', async () => {
    await repos.breeds.create({ species_id: dog.id, name: 'Beagle', description: '', active: false });
    const breeds = await patients.speciesBreeds(dog.id);
    expect(breeds.map((b) => b.name)).toEqual(['Labrador Retriever']);
    await expect(patients.speciesBreeds(999)).rejects.toBeInstanceOf(NotFoundError);
  });
});
