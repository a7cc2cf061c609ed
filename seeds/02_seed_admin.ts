import { Knex } from 'knex';
import bcrypt from 'bcryptjs';
import dotenv from 'dotenv';
dotenv.config();

export async function seed(knex: Knex): Promise<void> {
  const email = (process.env.ADMIN_EMAIL || 'admin@vetclinic.local').toLowerCase();
  const password = process.env.ADMIN_PASSWORD || 'change-me-please';

  const existing = await knex('users').where({ email }).first();
  if (existing) {
    console.log(`[Seed] admin ${email} already exists`);
    return;
  }

  const saltRounds = +(process.env.BCRYPT_SALT_ROUNDS || 10);
  await knex('users').insert({
    email,
    password_hash: await bcrypt.hash(password, saltRounds),
    first_name: 'System',
    last_name: 'Admin',
    role: 'admin',
  });

  console.log(`[Seed] admin ${email} created`);
}
