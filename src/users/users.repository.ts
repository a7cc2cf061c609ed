import type { Knex } from 'knex';
import { NewUser, Role, User, UserChanges, UserFilter, isRole } from '../types/user.types';

export interface UserRepository {
  findById(id: number): Promise<User | undefined>;
  findByEmail(email: string): Promise<User | undefined>;
  findByLicense(licenseNumber: string): Promise<User | undefined>;
  list(filter: UserFilter): Promise<User[]>;
  listActiveByRoles(roles: Role[]): Promise<User[]>;
  countByRole(): Promise<Partial<Record<Role, number>>>;
  create(data: NewUser): Promise<User>;
  update(id: number, changes: UserChanges): Promise<User | undefined>;
  delete(id: number): Promise<boolean>;
}

export class KnexUserRepository implements UserRepository {
  constructor(private readonly db: Knex) {}

  private users() {
    return this.db<User>('users');
  }

  findById(id: number) {
    return this.users().where({ id }).first();
  }

  findByEmail(email: string) {
    return this.users().where({ email: email.toLowerCase() }).first();
  }

  findByLicense(licenseNumber: string) {
    return this.users().where({ license_number: licenseNumber }).first();
  }

  async list(filter: UserFilter) {
    let query = this.users();

    if (filter.role) query = query.where('role', filter.role);
    if (filter.active !== undefined) query = query.where('active', filter.active);
    if (filter.search) {
      const term = `%${filter.search}%`;
      query = query.where((b) =>
        b
          .whereILike('first_name', term)
          .orWhereILike('last_name', term)
          .orWhereILike('email', term)
          .orWhereILike('phone', term)
          .orWhereILike('license_number', term)
      );
    }

    return query.orderBy('created_at', 'desc');
  }

  listActiveByRoles(roles: Role[]) {
    return this.users().whereIn('role', roles).where('active', true).orderBy('id');
  }

  async countByRole() {
    const result = await this.db.raw<{ rows: { role: string; count: number }[] }>('SELECT role, COUNT(*)::int AS count FROM users GROUP BY role');
    const counts: Partial<Record<Role, number>> = {};
    for (const row of result.rows) {
      if (isRole(row.role)) counts[row.role] = Number(row.count);
    }
    return counts;
  }

  async create(data: NewUser) {
    const [user] = await this.users().insert(data).returning('*');
    return user;
  }

  async update(id: number, changes: UserChanges) {
    const [user] = await this.users()
      .where({ id })
      .update({ ...changes, updated_at: new Date() })
      .returning('*');
    return user;
  }

  async delete(id: number) {
    const deleted = await this.users().where({ id }).del();
    return deleted > 0;
  }
}
