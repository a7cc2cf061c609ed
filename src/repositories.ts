import type { Knex } from 'knex';
import { KnexUserRepository, UserRepository } from './users/users.repository';
import {
  BreedRepository,
  KnexBreedRepository,
  KnexPatientRepository,
  KnexSpeciesRepository,
  PatientRepository,
  SpeciesRepository,
} from './patients/patients.repository';
import { AppointmentRepository, KnexAppointmentRepository } from './appointments/appointments.repository';
import {
  AttachmentRepository,
  ClinicalEpisodeRepository,
  KnexAttachmentRepository,
  KnexClinicalEpisodeRepository,
  KnexVitalSignsRepository,
  VitalSignsRepository,
} from './clinical/clinical.repository';
import {
  KnexLotRepository,
  KnexProductRepository,
  KnexStockMovementRepository,
  LotRepository,
  ProductRepository,
  StockMovementRepository,
} from './inventory/inventory.repository';
import { AuditLogRepository, KnexAuditLogRepository } from './audit/audit.repository';

export interface Repositories {
  users: UserRepository;
  species: SpeciesRepository;
  breeds: BreedRepository;
  patients: PatientRepository;
  appointments: AppointmentRepository;
  episodes: ClinicalEpisodeRepository;
  vitals: VitalSignsRepository;
  attachments: AttachmentRepository;
  products: ProductRepository;
  lots: LotRepository;
  movements: StockMovementRepository;
  audit: AuditLogRepository;
}

export function createKnexRepositories(db: Knex): Repositories {
  return {
    users: new KnexUserRepository(db),
    species: new KnexSpeciesRepository(db),
    breeds: new KnexBreedRepository(db),
    patients: new KnexPatientRepository(db),
    appointments: new KnexAppointmentRepository(db),
    episodes: new KnexClinicalEpisodeRepository(db),
    vitals: new KnexVitalSignsRepository(db),
    attachments: new KnexAttachmentRepository(db),
    products: new KnexProductRepository(db),
    lots: new KnexLotRepository(db),
    movements: new KnexStockMovementRepository(db),
    audit: new KnexAuditLogRepository(db),
  };
}
