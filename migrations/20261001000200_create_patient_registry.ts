import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('species', t => {
    t.increments('id').primary();
    t.string('name', 100).notNullable().unique();
    t.text('description').notNullable().defaultTo('');
    t.boolean('active').notNullable().defaultTo(true);
    t.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('breeds', t => {
    t.increments('id').primary();
    t.integer('species_id').unsigned().notNullable().references('id').inTable('species').onDelete('RESTRICT');
    t.string('name', 100).notNullable();
    t.text('description').notNullable().defaultTo('');
    t.boolean('active').notNullable().defaultTo(true);
    t.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    t.unique(['species_id', 'name']);
  });

  await knex.schema.createTable('patients', t => {
    t.increments('id').primary();
    t.integer('guardian_id').unsigned().notNullable().references('id').inTable('users').onDelete('RESTRICT');
    t.string('name', 100).notNullable();
    t.integer('species_id').unsigned().notNullable().references('id').inTable('species').onDelete('RESTRICT');
    t.integer('breed_id').unsigned().references('id').inTable('breeds').onDelete('SET NULL');
    t.enu('sex', ['male', 'female', 'unknown']).notNullable().defaultTo('unknown');
    t.date('birth_date');
    t.string('color', 100).notNullable().defaultTo('');
    t.decimal('weight_kg', 6, 2);
    t.string('microchip', 50).unique();
    t.string('photo_url');
    t.boolean('sterilized').notNullable().defaultTo(false);
    t.text('allergies').notNullable().defaultTo('');
    t.text('chronic_conditions').notNullable().defaultTo('');
    t.text('notes').notNullable().defaultTo('');
    t.boolean('active').notNullable().defaultTo(true);
    t.boolean('deceased').notNullable().defaultTo(false);
    t.date('deceased_on');
    t.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());
    t.index(['guardian_id', 'active']);
  });
  await knex.raw('ALTER TABLE patients ADD CONSTRAINT patients_weight_positive CHECK (weight_kg IS NULL OR weight_kg > 0)');
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('patients');
  await knex.schema.dropTableIfExists('breeds');
  await knex.schema.dropTableIfExists('species');
}
