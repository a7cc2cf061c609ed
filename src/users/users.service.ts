import bcrypt from 'bcryptjs';
import { config } from '../config';
import type { Repositories } from '../repositories';
import {
  AuthUser,
  NewUser,
  PublicUser,
  Role,
  User,
  UserChanges,
  UserFilter,
  isStaff,
} from '../types/user.types';
import { NewAuditLog } from '../types/audit.types';
import {
  ForbiddenError,
  NotFoundError,
  StateConflictError,
  UnauthorizedError,
  ValidationError,
} from '../utils/errors';

export interface ProfileInput {
  first_name?: string;
  last_name?: string;
  phone?: string | null;
  address?: string;
  birth_date?: string | null;
  license_number?: string | null;
  specialty?: string;
}

export interface RegisterInput extends Pick<ProfileInput, 'phone' | 'address' | 'birth_date'> {
  email: string;
  password: string;
  first_name: string;
  last_name: string;
}

export interface UserInput extends ProfileInput {
  email?: string;
  password?: string;
  role?: Role;
  active?: boolean;
}

export function toPublicUser(user: User): PublicUser {
  const { password_hash: _hash, ...rest } = user;
  return rest;
}

/** Professional fields only survive on vets. */
function withRoleRules<T extends UserChanges>(role: Role, changes: T): T {
  if (role === 'vet') return changes;
  return { ...changes, license_number: null, specialty: '' };
}

export class UsersService {
  constructor(private readonly repos: Repositories) {}

  private hash(password: string) {
    return bcrypt.hash(password, config.saltRounds);
  }

  private async require(id: number): Promise<User> {
    const user = await this.repos.users.findById(id);
    if (!user) throw new NotFoundError('User not found');
    return user;
  }

  private async assertEmailFree(email: string, exceptId?: number) {
    const existing = await this.repos.users.findByEmail(email);
    if (existing && existing.id !== exceptId) {
      throw ValidationError.field('email', 'A user with this email already exists');
    }
  }

  private async assertLicenseFree(license: string | null | undefined, exceptId?: number) {
    if (!license) return;
    const existing = await this.repos.users.findByLicense(license);
    if (existing && existing.id !== exceptId) {
      throw ValidationError.field('license_number', 'This license number is already registered');
    }
  }

  /** Public sign-up. Always creates a guardian; staff accounts are created by an admin. */
  async register(input: RegisterInput): Promise<PublicUser> {
    await this.assertEmailFree(input.email);

    const user = await this.repos.users.create({
      email: input.email,
      password_hash: await this.hash(input.password),
      first_name: input.first_name,
      last_name: input.last_name,
      role: 'guardian',
      phone: input.phone ?? null,
      address: input.address ?? null,
      birth_date: input.birth_date ?? null,
      license_number: null,
      specialty: '',
      photo_url: null,
      active: true,
    });
    return toPublicUser(user);
  }

  async authenticate(email: string, password: string): Promise<PublicUser> {
    const user = await this.repos.users.findByEmail(email);
    if (!user || !(await bcrypt.compare(password, user.password_hash))) {
      throw new UnauthorizedError('Invalid credentials');
    }
    if (!user.active) throw new ForbiddenError('This account has been deactivated');
    return toPublicUser(user);
  }

  async changePassword(actor: AuthUser, currentPassword: string, newPassword: string) {
    const user = await this.require(actor.id);
    if (!(await bcrypt.compare(currentPassword, user.password_hash))) {
      throw ValidationError.field('current_password', 'Current password is incorrect');
    }
    await this.repos.users.update(user.id, { password_hash: await this.hash(newPassword) });
  }

  async list(filter: UserFilter): Promise<PublicUser[]> {
    const users = await this.repos.users.list(filter);
    return users.map(toPublicUser);
  }

  async listActive(role: Role): Promise<PublicUser[]> {
    const users = await this.repos.users.listActiveByRoles([role]);
    return users.map(toPublicUser);
  }

  async get(actor: AuthUser, id: number): Promise<PublicUser> {
    if (!isStaff(actor) && actor.id !== id) {
      throw new ForbiddenError('You can only view your own account');
    }
    return toPublicUser(await this.require(id));
  }

  async create(input: UserInput): Promise<PublicUser> {
    if (!input.email || !input.password || !input.role) {
      throw new ValidationError({
        ...(input.email ? {} : { email: ['email is required'] }),
        ...(input.password ? {} : { password: ['password is required'] }),
        ...(input.role ? {} : { role: ['role is required'] }),
      });
    }
    await this.assertEmailFree(input.email);
    await this.assertLicenseFree(input.license_number);

    const data: NewUser = withRoleRules(input.role, {
      email: input.email,
      password_hash: await this.hash(input.password),
      first_name: input.first_name ?? '',
      last_name: input.last_name ?? '',
      role: input.role,
      phone: input.phone ?? null,
      address: input.address ?? null,
      birth_date: input.birth_date ?? null,
      license_number: input.license_number || null,
      specialty: input.specialty ?? '',
      photo_url: null,
      active: input.active ?? true,
    });
    return toPublicUser(await this.repos.users.create(data));
  }

  async update(id: number, input: UserInput): Promise<PublicUser> {
    const existing = await this.require(id);
    const { password, ...fields } = input;

    if (fields.email) await this.assertEmailFree(fields.email, id);
    await this.assertLicenseFree(fields.license_number, id);
    if (fields.role && fields.role !== existing.role) await this.assertRoleFree(existing);

    const changes: UserChanges = { ...fields };
    if (password) changes.password_hash = await this.hash(password);

    const user = await this.repos.users.update(id, withRoleRules(fields.role ?? existing.role, changes));
    if (!user) throw new NotFoundError('User not found');
    return toPublicUser(user);
  }

  /** A role change may not strand appointments, episodes or patients that point at the user. */
  private async assertRoleFree(user: User) {
    if (user.role === 'vet') {
      const [appointments, episodes] = await Promise.all([
        this.repos.appointments.list({ vetId: user.id }),
        this.repos.episodes.list({ vetId: user.id }),
      ]);
      if (appointments.length > 0 || episodes.length > 0) {
        throw new StateConflictError('Vet is assigned to appointments or clinical episodes; the role cannot change');
      }
    }
    if (user.role === 'guardian' && (await this.repos.patients.count({ guardianId: user.id })) > 0) {
      throw new StateConflictError('Guardian still owns patients; the role cannot change');
    }
  }

  async delete(id: number) {
    await this.require(id);
    const [patients, asGuardian, asVet] = await Promise.all([
      this.repos.patients.count({ guardianId: id }),
      this.repos.appointments.list({ guardianId: id }),
      this.repos.appointments.list({ vetId: id }),
    ]);
    if (patients > 0 || asGuardian.length > 0 || asVet.length > 0) {
      throw new StateConflictError('User still owns patients or appointments; deactivate the account instead');
    }
    await this.repos.users.delete(id);
  }

  async getProfile(actor: AuthUser): Promise<PublicUser> {
    return toPublicUser(await this.require(actor.id));
  }

  async updateProfile(actor: AuthUser, input: ProfileInput): Promise<PublicUser> {
    const existing = await this.require(actor.id);
    await this.assertLicenseFree(input.license_number, actor.id);

    const user = await this.repos.users.update(actor.id, withRoleRules(existing.role, { ...input }));
    if (!user) throw new NotFoundError('User not found');
    return toPublicUser(user);
  }

  async setPhoto(actor: AuthUser, photoUrl: string): Promise<PublicUser> {
    const user = await this.repos.users.update(actor.id, { photo_url: photoUrl });
    if (!user) throw new NotFoundError('User not found');
    return toPublicUser(user);
  }

  async setActive(actor: AuthUser, id: number, active: boolean): Promise<PublicUser> {
    const existing = await this.require(id);
    const user = await this.repos.users.update(id, { active });
    if (!user) throw new NotFoundError('User not found');

    const entry: NewAuditLog = {
      actor_id: actor.id,
      action: active ? 'user.activate' : 'user.deactivate',
      target_id: id,
      details: { email: existing.email, role: existing.role },
    };
    await this.repos.audit.record(entry);
    console.log(`[Users] ${entry.action} ${existing.email} by user ${actor.id}`);

    return toPublicUser(user);
  }
}
