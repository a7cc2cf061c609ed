import type { Knex } from 'knex';
import {
  Lot,
  LotChanges,
  LotFilter,
  MovementDraft,
  MovementFilter,
  NewLot,
  NewProduct,
  Product,
  ProductChanges,
  ProductFilter,
  StockMovement,
} from '../types/inventory.types';
import { NotFoundError } from '../utils/errors';

export interface StockTotals {
  total_stock: number;
  active_lots: number;
}

export interface ProductRepository {
  list(filter: ProductFilter): Promise<Product[]>;
  findById(id: number): Promise<Product | undefined>;
  findByCode(code: string): Promise<Product | undefined>;
  /** Sum of current stock and number of lots, over active lots only, keyed by product id. */
  stockTotals(): Promise<Map<number, StockTotals>>;
  create(data: NewProduct): Promise<Product>;
  update(id: number, changes: ProductChanges): Promise<Product | undefined>;
  delete(id: number): Promise<boolean>;
}

export interface LotRepository {
  list(filter: LotFilter): Promise<Lot[]>;
  findById(id: number): Promise<Lot | undefined>;
  findByNumber(productId: number, lotNumber: string): Promise<Lot | undefined>;
  countByProduct(productId: number): Promise<number>;
  create(data: NewLot): Promise<Lot>;
  update(id: number, changes: LotChanges): Promise<Lot | undefined>;
  delete(id: number): Promise<boolean>;
  markExpiryAlerted(ids: number[], day: string): Promise<void>;
}

export interface StockMovementRepository {
  list(filter: MovementFilter): Promise<StockMovement[]>;
  findById(id: number): Promise<StockMovement | undefined>;
  countByLot(lotId: number): Promise<number>;
  /**
   * Reads the lot, lets `build` derive the movement from it and writes both the
   * movement and the lot's new current_stock in one transaction. The lot row
   * stays locked until commit, so concurrent movements on one lot serialize.
   */
  record(lotId: number, build: (lot: Lot) => MovementDraft): Promise<{ movement: StockMovement; lot: Lot }>;
}

export class KnexProductRepository implements ProductRepository {
  constructor(private readonly db: Knex) {}

  async list(filter: ProductFilter) {
    let query = this.db<Product>('products');

    if (filter.category) query = query.where('category', filter.category);
    if (filter.active !== undefined) query = query.where('active', filter.active);
    if (filter.requiresPrescription !== undefined) {
      query = query.where('requires_prescription', filter.requiresPrescription);
    }
    if (filter.search) {
      const term = `%${filter.search}%`;
      query = query.where((b) =>
        b
          .whereILike('code', term)
          .orWhereILike('name', term)
          .orWhereILike('active_ingredient', term)
          .orWhereILike('manufacturer', term)
      );
    }

    return query.orderBy('name');
  }

  findById(id: number) {
    return this.db<Product>('products').where({ id }).first();
  }

  findByCode(code: string) {
    return this.db<Product>('products').where({ code }).first();
  }

  async stockTotals() {
    const result = await this.db.raw(
      `SELECT product_id, COALESCE(SUM(current_stock), 0)::int AS total_stock, COUNT(*)::int AS active_lots
         FROM lots
        WHERE active = true
        GROUP BY product_id`
    );
    const totals = new Map<number, StockTotals>();
    for (const row of result.rows) {
      totals.set(Number(row.product_id), {
        total_stock: Number(row.total_stock),
        active_lots: Number(row.active_lots),
      });
    }
    return totals;
  }

  async create(data: NewProduct) {
    const [product] = await this.db<Product>('products').insert(data).returning('*');
    return product;
  }

  async update(id: number, changes: ProductChanges) {
    const [product] = await this.db<Product>('products')
      .where({ id })
      .update({ ...changes, updated_at: new Date() })
      .returning('*');
    return product;
  }

  async delete(id: number) {
    return (await this.db<Product>('products').where({ id }).del()) > 0;
  }
}

export class KnexLotRepository implements LotRepository {
  constructor(private readonly db: Knex) {}

  async list(filter: LotFilter): Promise<Lot[]> {
    let query = this.db('lots as l');

    if (filter.productId) query = query.where('l.product_id', filter.productId);
    if (filter.active !== undefined) query = query.where('l.active', filter.active);
    if (filter.expiresFrom) query = query.where('l.expires_on', '>=', filter.expiresFrom);
    if (filter.expiresTo) query = query.where('l.expires_on', '<=', filter.expiresTo);
    if (filter.expiresBefore) query = query.where('l.expires_on', '<', filter.expiresBefore);
    if (filter.inStock) query = query.where('l.current_stock', '>', 0);
    if (filter.search) {
      const term = `%${filter.search}%`;
      query = query
        .join('products as p', 'l.product_id', 'p.id')
        .where((b) => b.whereILike('l.lot_number', term).orWhereILike('p.name', term).orWhereILike('l.supplier', term));
    }

    return query.select('l.*').orderBy('l.expires_on', 'asc');
  }

  findById(id: number) {
    return this.db<Lot>('lots').where({ id }).first();
  }

  findByNumber(productId: number, lotNumber: string) {
    return this.db<Lot>('lots').where({ product_id: productId, lot_number: lotNumber }).first();
  }

  async countByProduct(productId: number) {
    const row = await this.db('lots').where({ product_id: productId }).count({ c: '*' }).first();
    return Number(row?.c ?? 0);
  }

  async create(data: NewLot) {
    const [lot] = await this.db<Lot>('lots').insert(data).returning('*');
    return lot;
  }

  async update(id: number, changes: LotChanges) {
    const [lot] = await this.db<Lot>('lots')
      .where({ id })
      .update({ ...changes, updated_at: new Date() })
      .returning('*');
    return lot;
  }

  async delete(id: number) {
    return (await this.db<Lot>('lots').where({ id }).del()) > 0;
  }

  async markExpiryAlerted(ids: number[], day: string) {
    if (ids.length === 0) return;
    await this.db<Lot>('lots').whereIn('id', ids).update({ expiry_alerted_on: day });
  }
}

export class KnexStockMovementRepository implements StockMovementRepository {
  constructor(private readonly db: Knex) {}

  async list(filter: MovementFilter): Promise<StockMovement[]> {
    let query = this.db('stock_movements as m');

    if (filter.lotId) query = query.where('m.lot_id', filter.lotId);
    if (filter.type) query = query.where('m.type', filter.type);
    if (filter.episodeId) query = query.where('m.clinical_episode_id', filter.episodeId);
    if (filter.productId) {
      query = query.join('lots as l', 'm.lot_id', 'l.id').where('l.product_id', filter.productId);
    }
    if (filter.limit) query = query.limit(filter.limit);

    return query.select('m.*').orderBy([
      { column: 'm.created_at', order: 'desc' },
      { column: 'm.id', order: 'desc' },
    ]);
  }

  findById(id: number) {
    return this.db<StockMovement>('stock_movements').where({ id }).first();
  }

  async countByLot(lotId: number) {
    const row = await this.db('stock_movements').where({ lot_id: lotId }).count({ c: '*' }).first();
    return Number(row?.c ?? 0);
  }

  record(lotId: number, build: (lot: Lot) => MovementDraft) {
    return this.db.transaction(async (trx) => {
      const current = await trx<Lot>('lots').where({ id: lotId }).forUpdate().first();
      if (!current) throw new NotFoundError('Lot not found');

      const draft = build(current);
      const [movement] = await trx<StockMovement>('stock_movements').insert(draft).returning('*');
      const [lot] = await trx<Lot>('lots')
        .where({ id: lotId })
        .update({ current_stock: draft.stock_after, updated_at: new Date() })
        .returning('*');

      return { movement, lot };
    });
  }
}
