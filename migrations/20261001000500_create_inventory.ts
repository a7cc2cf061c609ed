import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('products', t => {
    t.increments('id').primary();
    t.string('code', 50).notNullable().unique();
    t.string('name', 200).notNullable();
    t.text('description').notNullable().defaultTo('');
    t.enu('category', ['medication', 'vaccine', 'medical_supply', 'food', 'hygiene', 'accessory', 'other'])
      .notNullable()
      .defaultTo('other');
    t.string('active_ingredient', 200).notNullable().defaultTo('');
    t.string('concentration', 100).notNullable().defaultTo('');
    t.string('manufacturer', 200).notNullable().defaultTo('');
    t.enu('unit', ['unit', 'box', 'vial', 'ampoule', 'tablet', 'capsule', 'ml', 'g', 'kg'])
      .notNullable()
      .defaultTo('unit');
    t.integer('min_stock').notNullable().defaultTo(10);
    t.integer('max_stock').notNullable().defaultTo(100);
    t.decimal('purchase_price', 10, 2);
    t.decimal('sale_price', 10, 2);
    t.boolean('requires_prescription').notNullable().defaultTo(false);
    t.boolean('lot_tracked').notNullable().defaultTo(true);
    t.boolean('active').notNullable().defaultTo(true);
    t.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('lots', t => {
    t.increments('id').primary();
    t.integer('product_id').unsigned().notNullable().references('id').inTable('products').onDelete('RESTRICT');
    t.string('lot_number', 100).notNullable();
    t.date('manufactured_on');
    t.date('expires_on').notNullable();
    t.integer('initial_stock').notNullable();
    t.integer('current_stock').notNullable();
    t.decimal('lot_purchase_price', 10, 2);
    t.string('supplier', 200).notNullable().defaultTo('');
    t.boolean('active').notNullable().defaultTo(true);
    t.date('expiry_alerted_on');
    t.timestamp('received_at').notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());
    t.unique(['product_id', 'lot_number']);
    t.index(['expires_on']);
  });
  await knex.raw('ALTER TABLE lots ADD CONSTRAINT lots_stock_not_negative CHECK (current_stock >= 0 AND initial_stock >= 0)');

  await knex.schema.createTable('stock_movements', t => {
    t.increments('id').primary();
    t.integer('lot_id').unsigned().notNullable().references('id').inTable('lots').onDelete('RESTRICT');
    t.enu('type', ['intake', 'sale', 'clinical_use', 'adjustment_in', 'adjustment_out', 'loss', 'return']).notNullable();
    t.integer('quantity').notNullable();
    t.integer('stock_before').notNullable();
    t.integer('stock_after').notNullable();
    t.integer('clinical_episode_id').unsigned().references('id').inTable('clinical_episodes').onDelete('SET NULL');
    t.text('reason').notNullable();
    t.string('reference_document', 100).notNullable().defaultTo('');
    t.integer('performed_by').unsigned().references('id').inTable('users').onDelete('SET NULL');
    t.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    t.index(['lot_id', 'created_at']);
  });
  await knex.raw('ALTER TABLE stock_movements ADD CONSTRAINT stock_movements_quantity_positive CHECK (quantity > 0)');
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('stock_movements');
  await knex.schema.dropTableIfExists('lots');
  await knex.schema.dropTableIfExists('products');
}
