import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('users', t => {
    t.increments('id').primary();
    t.string('email').notNullable().unique();
    t.string('password_hash').notNullable();
    t.string('first_name', 150).notNullable().defaultTo('');
    t.string('last_name', 150).notNullable().defaultTo('');
    t.enu('role', ['guardian', 'vet', 'receptionist', 'admin']).notNullable().defaultTo('guardian');
    t.string('phone', 17);
    t.string('address');
    t.date('birth_date');
    t.string('license_number', 50).unique();
    t.string('specialty', 100).notNullable().defaultTo('');
    t.string('photo_url');
    t.boolean('active').notNullable().defaultTo(true);
    t.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());
    t.index(['role', 'active']);
  });

  await knex.schema.createTable('audit_logs', t => {
    t.increments('id').primary();
    t.integer('actor_id').unsigned().references('id').inTable('users').onDelete('SET NULL');
    t.string('action').notNullable();
    t.integer('target_id');
    t.jsonb('details');
    t.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('audit_logs');
  await knex.schema.dropTableIfExists('users');
}
