import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('appointments', t => {
    t.increments('id').primary();
    t.integer('patient_id').unsigned().notNullable().references('id').inTable('patients').onDelete('RESTRICT');
    t.integer('guardian_id').unsigned().notNullable().references('id').inTable('users').onDelete('RESTRICT');
    t.integer('vet_id').unsigned().references('id').inTable('users').onDelete('SET NULL');
    t.timestamp('scheduled_at').notNullable();
    t.integer('duration_minutes').notNullable().defaultTo(30);
    t.enu('type', [
      'general_consultation',
      'vaccination',
      'surgery',
      'emergency',
      'follow_up',
      'deworming',
      'other',
    ]).notNullable().defaultTo('general_consultation');
    t.enu('status', ['booked', 'confirmed', 'in_progress', 'completed', 'cancelled', 'no_show'])
      .notNullable()
      .defaultTo('booked');
    t.text('reason').notNullable().defaultTo('');
    t.text('notes').notNullable().defaultTo('');
    t.text('internal_notes').notNullable().defaultTo('');
    t.boolean('reminder_sent').notNullable().defaultTo(false);
    t.timestamp('reminder_sent_at');
    t.timestamp('confirmed_at');
    t.timestamp('started_at');
    t.timestamp('completed_at');
    t.timestamp('cancelled_at');
    t.text('cancellation_reason').notNullable().defaultTo('');
    t.timestamp('no_show_at');
    t.integer('created_by').unsigned().references('id').inTable('users').onDelete('SET NULL');
    t.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());
    t.index(['scheduled_at', 'status']);
    t.index(['vet_id', 'scheduled_at']);
    t.index(['guardian_id']);
  });
  await knex.raw(
    'ALTER TABLE appointments ADD CONSTRAINT appointments_duration_positive CHECK (duration_minutes > 0)'
  );
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('appointments');
}
