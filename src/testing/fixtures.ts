import type { Repositories } from '../repositories';
import { AuthUser, NewUser, Role, User } from '../types/user.types';
import { NewPatient, Patient } from '../types/patient.types';
import { Appointment, NewAppointment } from '../types/appointment.types';
import { NewLot, NewProduct, Lot, Product } from '../types/inventory.types';
import { ClinicalEpisode, NewClinicalEpisode } from '../types/clinical.types';

let sequence = 0;

export const asActor = (user: Pick<User, 'id' | 'email' | 'role'>): AuthUser => ({
  id: user.id,
  email: user.email,
  role: user.role,
});

export function addUser(repos: Repositories, role: Role, overrides: Partial<NewUser> = {}): Promise<User> {
  sequence++;
  return repos.users.create({
    email: `${role}${sequence}@clinic.test`,
    password_hash: 'not-a-real-hash',
    first_name: role.charAt(0).toUpperCase() + role.slice(1),
    last_name: `Number${sequence}`,
    role,
    phone: null,
    address: null,
    birth_date: null,
    license_number: role === 'vet' ? `LIC-${sequence}` : null,
    specialty: '',
    photo_url: null,
    active: true,
    ...overrides,
  });
}

export async function addPatient(
  repos: Repositories,
  guardian: User,
  overrides: Partial<NewPatient> = {}
): Promise<Patient> {
  const speciesId =
    overrides.species_id ??
    (await repos.species.create({ name: `Species ${++sequence}`, description: '', active: true })).id;
  return repos.patients.create({
    guardian_id: guardian.id,
    name: 'Luna',
    species_id: speciesId,
    breed_id: null,
    sex: 'female',
    birth_date: null,
    color: '',
    weight_kg: null,
    microchip: null,
    photo_url: null,
    sterilized: false,
    allergies: '',
    chronic_conditions: '',
    notes: '',
    active: true,
    deceased: false,
    deceased_on: null,
    ...overrides,
  });
}

export function addAppointment(
  repos: Repositories,
  patient: Patient,
  overrides: Partial<NewAppointment> = {}
): Promise<Appointment> {
  return repos.appointments.create({
    patient_id: patient.id,
    guardian_id: patient.guardian_id,
    vet_id: null,
    scheduled_at: new Date(2026, 9, 20, 10, 0),
    duration_minutes: 30,
    type: 'general_consultation',
    status: 'booked',
    reason: 'Annual check-up',
    notes: '',
    internal_notes: '',
    reminder_sent: false,
    reminder_sent_at: null,
    confirmed_at: null,
    started_at: null,
    completed_at: null,
    cancelled_at: null,
    cancellation_reason: '',
    no_show_at: null,
    created_by: null,
    ...overrides,
  });
}

export function addEpisode(
  repos: Repositories,
  appointment: Appointment,
  vet: User,
  overrides: Partial<NewClinicalEpisode> = {}
): Promise<ClinicalEpisode> {
  return repos.episodes.create({
    appointment_id: appointment.id,
    patient_id: appointment.patient_id,
    vet_id: vet.id,
    motive: appointment.reason,
    history: '',
    physical_exam: '',
    presumptive_diagnosis: '',
    definitive_diagnosis: '',
    treatment_plan: '',
    medications: '',
    procedures: '',
    prognosis: 'good',
    home_instructions: '',
    next_checkup_on: null,
    closed: false,
    ...overrides,
  });
}

export function addProduct(repos: Repositories, overrides: Partial<NewProduct> = {}): Promise<Product> {
  sequence++;
  return repos.products.create({
    code: `P-${sequence}`,
    name: `Product ${sequence}`,
    description: '',
    category: 'medication',
    active_ingredient: '',
    concentration: '',
    manufacturer: '',
    unit: 'unit',
    min_stock: 10,
    max_stock: 100,
    purchase_price: null,
    sale_price: null,
    requires_prescription: false,
    lot_tracked: true,
    active: true,
    ...overrides,
  });
}

export function addLot(repos: Repositories, product: Product, overrides: Partial<NewLot> = {}): Promise<Lot> {
  sequence++;
  const stock = overrides.initial_stock ?? 100;
  return repos.lots.create({
    product_id: product.id,
    lot_number: `L-${sequence}`,
    manufactured_on: null,
    expires_on: '2027-12-31',
    initial_stock: stock,
    current_stock: stock,
    lot_purchase_price: null,
    supplier: '',
    active: true,
    expiry_alerted_on: null,
    ...overrides,
  });
}
