import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('clinical_episodes', t => {
    t.increments('id').primary();
    t.integer('appointment_id').unsigned().notNullable().unique()
      .references('id').inTable('appointments').onDelete('RESTRICT');
    t.integer('patient_id').unsigned().notNullable().references('id').inTable('patients').onDelete('RESTRICT');
    t.integer('vet_id').unsigned().notNullable().references('id').inTable('users').onDelete('RESTRICT');
    t.text('motive').notNullable().defaultTo('');
    t.text('history').notNullable().defaultTo('');
    t.text('physical_exam').notNullable().defaultTo('');
    t.text('presumptive_diagnosis').notNullable().defaultTo('');
    t.text('definitive_diagnosis').notNullable().defaultTo('');
    t.text('treatment_plan').notNullable().defaultTo('');
    t.text('medications').notNullable().defaultTo('');
    t.text('procedures').notNullable().defaultTo('');
    t.enu('prognosis', ['excellent', 'good', 'guarded', 'poor']).notNullable().defaultTo('good');
    t.text('home_instructions').notNullable().defaultTo('');
    t.date('next_checkup_on');
    t.boolean('closed').notNullable().defaultTo(false);
    t.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());
    t.index(['patient_id']);
    t.index(['vet_id']);
  });

  await knex.schema.createTable('vital_signs', t => {
    t.increments('id').primary();
    t.integer('episode_id').unsigned().notNullable().references('id').inTable('clinical_episodes').onDelete('CASCADE');
    t.decimal('weight_kg', 6, 2).notNullable();
    t.decimal('temperature_c', 4, 1);
    t.integer('heart_rate');
    t.integer('respiratory_rate');
    t.integer('systolic_bp');
    t.integer('diastolic_bp');
    t.decimal('capillary_refill_s', 3, 1);
    t.integer('body_condition_score');
    t.text('notes').notNullable().defaultTo('');
    t.integer('recorded_by').unsigned().references('id').inTable('users').onDelete('SET NULL');
    t.timestamp('recorded_at').notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('attachments', t => {
    t.increments('id').primary();
    t.integer('episode_id').unsigned().notNullable().references('id').inTable('clinical_episodes').onDelete('CASCADE');
    t.enu('type', ['radiograph', 'ultrasound', 'lab_result', 'photo', 'document', 'other'])
      .notNullable()
      .defaultTo('other');
    t.string('title', 200).notNullable();
    t.text('description').notNullable().defaultTo('');
    t.string('file_url').notNullable();
    t.string('original_name').notNullable().defaultTo('');
    t.string('mime_type', 100).notNullable().defaultTo('');
    t.integer('size_bytes').notNullable().defaultTo(0);
    t.integer('uploaded_by').unsigned().references('id').inTable('users').onDelete('SET NULL');
    t.timestamp('uploaded_at').notNullable().defaultTo(knex.fn.now());
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('attachments');
  await knex.schema.dropTableIfExists('vital_signs');
  await knex.schema.dropTableIfExists('clinical_episodes');
}
