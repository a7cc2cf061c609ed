export const ROLES = ['guardian', 'vet', 'receptionist', 'admin'] as const;
export type Role = (typeof ROLES)[number];

export const STAFF_ROLES: readonly Role[] = ['vet', 'receptionist', 'admin'];

export interface User {
  id: number;
  email: string;
  password_hash: string;
  first_name: string;
  last_name: string;
  role: Role;
  phone: string | null;
  address: string | null;
  birth_date: string | null;
  license_number: string | null;
  specialty: string;
  photo_url: string | null;
  active: boolean;
  created_at: Date;
  updated_at: Date;
}

export type PublicUser = Omit<User, 'password_hash'>;

export type NewUser = Omit<User, 'id' | 'created_at' | 'updated_at'>;

export type UserChanges = Partial<Omit<User, 'id' | 'created_at'>>;

export interface UserFilter {
  role?: Role;
  active?: boolean;
  search?: string;
}

/** Payload carried in the bearer token and attached to `req.user`. */
export interface AuthUser {
  id: number;
  email: string;
  role: Role;
}

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && (ROLES as readonly string[]).includes(value);
}

export function isStaff(user: Pick<AuthUser, 'role'>): boolean {
  return STAFF_ROLES.includes(user.role);
}

export function fullName(user: Pick<User, 'first_name' | 'last_name'>): string {
  return `${user.first_name} ${user.last_name}`.trim();
}
