import { config } from './config';
import type { Repositories } from './repositories';
import { UsersService } from './users/users.service';
import { PatientsService } from './patients/patients.service';
import { AppointmentsService } from './appointments/appointments.service';
import { ClinicalService } from './clinical/clinical.service';
import { InventoryService } from './inventory/inventory.service';
import { AdminService } from './admin/admin.service';
import { JobContext } from './jobs/job.context';
import { Mailer, createSmtpMailer } from './utils/email_service';

export interface Services {
  users: UsersService;
  patients: PatientsService;
  appointments: AppointmentsService;
  clinical: ClinicalService;
  inventory: InventoryService;
  admin: AdminService;
}

export interface ServiceDeps {
  mailer?: Mailer;
  now?: () => Date;
  clinicName?: string;
}

export function jobContext(repos: Repositories, deps: ServiceDeps = {}): JobContext {
  return {
    repos,
    mailer: deps.mailer ?? createSmtpMailer(),
    now: deps.now ?? (() => new Date()),
    clinicName: deps.clinicName ?? config.clinicName,
  };
}

export function createServices(repos: Repositories, deps: ServiceDeps = {}): Services {
  const jobs = jobContext(repos, deps);
  const inventory = new InventoryService(repos, jobs.now);

  return {
    users: new UsersService(repos),
    patients: new PatientsService(repos, jobs.now),
    appointments: new AppointmentsService(repos, jobs.now),
    clinical: new ClinicalService(repos),
    inventory,
    admin: new AdminService(repos, inventory, jobs),
  };
}
