import type { Repositories } from '../repositories';
import {
  Lot,
  LotChanges,
  LotFilter,
  LotView,
  MovementFilter,
  MovementType,
  OutboundType,
  Product,
  ProductChanges,
  ProductFilter,
  ProductUnit,
  ProductCategory,
  ProductView,
  StockMovement,
  StockReportRow,
} from '../types/inventory.types';
import { AuthUser } from '../types/user.types';
import { NotFoundError, StateConflictError, ValidationError } from '../utils/errors';
import { addDays, daysUntil, toDateString } from '../utils/dates';
import { StockTotals } from './inventory.repository';
import { buildMovement, stockStatus } from './ledger';

export const EXPIRY_WINDOW_DAYS = 30;

export interface ProductInput {
  code?: string;
  name?: string;
  description?: string;
  category?: ProductCategory;
  active_ingredient?: string;
  concentration?: string;
  manufacturer?: string;
  unit?: ProductUnit;
  min_stock?: number | null;
  max_stock?: number | null;
  purchase_price?: number | null;
  sale_price?: number | null;
  requires_prescription?: boolean;
  lot_tracked?: boolean;
  active?: boolean;
}

export interface LotInput {
  product_id?: number;
  lot_number?: string;
  manufactured_on?: string | null;
  expires_on?: string;
  initial_stock?: number;
  lot_purchase_price?: number | null;
  supplier?: string;
  active?: boolean;
}

export interface MovementRequest {
  type: MovementType;
  lot_id: number;
  quantity: number;
  reason: string;
  reference_document?: string;
  clinical_episode_id?: number | null;
}

const NO_STOCK: StockTotals = { total_stock: 0, active_lots: 0 };

export class InventoryService {
  constructor(private readonly repos: Repositories, private readonly now: () => Date) {}

  private today() {
    return toDateString(this.now());
  }

  // ---- products ----

  private toProductView(product: Product, totals: Map<number, StockTotals>): ProductView {
    const { total_stock } = totals.get(product.id) ?? NO_STOCK;
    return { ...product, total_stock, low_stock: total_stock < product.min_stock };
  }

  async listProducts(filter: ProductFilter): Promise<ProductView[]> {
    const [products, totals] = await Promise.all([this.repos.products.list(filter), this.repos.products.stockTotals()]);
    return products.map((p) => this.toProductView(p, totals));
  }

  private async requireProduct(id: number): Promise<Product> {
    const product = await this.repos.products.findById(id);
    if (!product) throw new NotFoundError('Product not found');
    return product;
  }

  async getProduct(id: number): Promise<ProductView> {
    const product = await this.requireProduct(id);
    return this.toProductView(product, await this.repos.products.stockTotals());
  }

  private checkThresholds(min: number, max: number) {
    if (max < min) throw ValidationError.field('max_stock', 'max_stock must not be lower than min_stock');
  }

  private async assertCodeFree(code: string, exceptId?: number) {
    const existing = await this.repos.products.findByCode(code);
    if (existing && existing.id !== exceptId) {
      throw ValidationError.field('code', 'A product with this code already exists');
    }
  }

  async createProduct(input: ProductInput): Promise<ProductView> {
    if (!input.code || !input.name) {
      throw new ValidationError({
        ...(input.code ? {} : { code: ['code is required'] }),
        ...(input.name ? {} : { name: ['name is required'] }),
      });
    }
    const minStock = input.min_stock ?? 10;
    const maxStock = input.max_stock ?? 100;
    this.checkThresholds(minStock, maxStock);
    await this.assertCodeFree(input.code);

    const product = await this.repos.products.create({
      code: input.code,
      name: input.name,
      description: input.description ?? '',
      category: input.category ?? 'other',
      active_ingredient: input.active_ingredient ?? '',
      concentration: input.concentration ?? '',
      manufacturer: input.manufacturer ?? '',
      unit: input.unit ?? 'unit',
      min_stock: minStock,
      max_stock: maxStock,
      purchase_price: input.purchase_price ?? null,
      sale_price: input.sale_price ?? null,
      requires_prescription: input.requires_prescription ?? false,
      lot_tracked: input.lot_tracked ?? true,
      active: input.active ?? true,
    });
    console.log(`[Inventory] product ${product.code} created`);
    return this.toProductView(product, new Map());
  }

  async updateProduct(id: number, input: ProductInput): Promise<ProductView> {
    const existing = await this.requireProduct(id);
    this.checkThresholds(input.min_stock ?? existing.min_stock, input.max_stock ?? existing.max_stock);
    if (input.code) await this.assertCodeFree(input.code, id);

    const { min_stock, max_stock, ...rest } = input;
    const changes: ProductChanges = { ...rest };
    if (min_stock !== undefined && min_stock !== null) changes.min_stock = min_stock;
    if (max_stock !== undefined && max_stock !== null) changes.max_stock = max_stock;

    const product = await this.repos.products.update(id, changes);
    if (!product) throw new NotFoundError('Product not found');
    return this.toProductView(product, await this.repos.products.stockTotals());
  }

  async deleteProduct(id: number) {
    await this.requireProduct(id);
    if ((await this.repos.lots.countByProduct(id)) > 0) {
      throw new StateConflictError('Product has lots on record; deactivate it instead');
    }
    await this.repos.products.delete(id);
  }

  async lowStock(): Promise<ProductView[]> {
    const products = await this.listProducts({ active: true });
    return products.filter((p) => p.low_stock);
  }

  async stockReport(): Promise<StockReportRow[]> {
    const [products, totals] = await Promise.all([
      this.repos.products.list({ active: true }),
      this.repos.products.stockTotals(),
    ]);
    return products.map((p) => {
      const { total_stock, active_lots } = totals.get(p.id) ?? NO_STOCK;
      return {
        product_id: p.id,
        code: p.code,
        name: p.name,
        category: p.category,
        total_stock,
        min_stock: p.min_stock,
        max_stock: p.max_stock,
        status: stockStatus(total_stock, p.min_stock, p.max_stock),
        active_lots,
      };
    });
  }

  async productMovements(productId: number, limit = 50): Promise<StockMovement[]> {
    await this.requireProduct(productId);
    return this.repos.movements.list({ productId, limit });
  }

  // ---- lots ----

  private toLotView(lot: Lot, product?: Product): LotView {
    const days = daysUntil(lot.expires_on, this.now());
    return {
      ...lot,
      product_name: product?.name,
      product_code: product?.code,
      expired: days < 0,
      days_to_expiry: days,
      expiring_soon: days >= 0 && days <= EXPIRY_WINDOW_DAYS,
    };
  }

  private async toLotViews(lots: Lot[]): Promise<LotView[]> {
    const products = new Map<number, Product>();
    for (const productId of new Set(lots.map((l) => l.product_id))) {
      const product = await this.repos.products.findById(productId);
      if (product) products.set(productId, product);
    }
    return lots.map((l) => this.toLotView(l, products.get(l.product_id)));
  }

  async listLots(filter: LotFilter): Promise<LotView[]> {
    return this.toLotViews(await this.repos.lots.list(filter));
  }

  private async requireLot(id: number): Promise<Lot> {
    const lot = await this.repos.lots.findById(id);
    if (!lot) throw new NotFoundError('Lot not found');
    return lot;
  }

  async getLot(id: number): Promise<LotView> {
    const lot = await this.requireLot(id);
    return this.toLotView(lot, await this.repos.products.findById(lot.product_id));
  }

  private checkDates(manufacturedOn: string | null | undefined, expiresOn: string) {
    if (manufacturedOn && expiresOn <= manufacturedOn) {
      throw ValidationError.field('expires_on', 'expires_on must be after manufactured_on');
    }
  }

  async createLot(input: LotInput): Promise<LotView> {
    if (!input.product_id) throw ValidationError.field('product_id', 'product_id is required');
    if (!input.lot_number) throw ValidationError.field('lot_number', 'lot_number is required');
    if (!input.expires_on) throw ValidationError.field('expires_on', 'expires_on is required');

    const product = await this.repos.products.findById(input.product_id);
    if (!product) throw ValidationError.field('product_id', 'Product not found');
    this.checkDates(input.manufactured_on, input.expires_on);
    if (await this.repos.lots.findByNumber(product.id, input.lot_number)) {
      throw ValidationError.field('lot_number', `Lot ${input.lot_number} already exists for this product`);
    }

    const initialStock = input.initial_stock ?? 0;
    const lot = await this.repos.lots.create({
      product_id: product.id,
      lot_number: input.lot_number,
      manufactured_on: input.manufactured_on ?? null,
      expires_on: input.expires_on,
      initial_stock: initialStock,
      current_stock: initialStock,
      lot_purchase_price: input.lot_purchase_price ?? null,
      supplier: input.supplier ?? '',
      active: input.active ?? true,
      expiry_alerted_on: null,
    });
    console.log(`[Inventory] lot ${lot.lot_number} of ${product.code} received with ${initialStock} ${product.unit}`);
    return this.toLotView(lot, product);
  }

  /** current_stock and initial_stock are never accepted here. */
  async updateLot(id: number, input: LotInput): Promise<LotView> {
    const existing = await this.requireLot(id);
    const manufacturedOn = input.manufactured_on !== undefined ? input.manufactured_on : existing.manufactured_on;
    this.checkDates(manufacturedOn, input.expires_on ?? existing.expires_on);

    if (input.lot_number && input.lot_number !== existing.lot_number) {
      if (await this.repos.lots.findByNumber(existing.product_id, input.lot_number)) {
        throw ValidationError.field('lot_number', `Lot ${input.lot_number} already exists for this product`);
      }
    }

    const changes: LotChanges = {};
    if (input.lot_number !== undefined) changes.lot_number = input.lot_number;
    if (input.manufactured_on !== undefined) changes.manufactured_on = input.manufactured_on;
    if (input.expires_on !== undefined) changes.expires_on = input.expires_on;
    if (input.lot_purchase_price !== undefined) changes.lot_purchase_price = input.lot_purchase_price;
    if (input.supplier !== undefined) changes.supplier = input.supplier;
    if (input.active !== undefined) changes.active = input.active;

    const lot = await this.repos.lots.update(id, changes);
    if (!lot) throw new NotFoundError('Lot not found');
    return this.toLotView(lot, await this.repos.products.findById(lot.product_id));
  }

  async deleteLot(id: number) {
    await this.requireLot(id);
    if ((await this.repos.movements.countByLot(id)) > 0) {
      throw new StateConflictError('Lot has stock movements on record; deactivate it instead');
    }
    await this.repos.lots.delete(id);
  }

  /** Active lots past their expiry date that still hold stock. */
  async expiredLots(): Promise<LotView[]> {
    return this.listLots({ active: true, inStock: true, expiresBefore: this.today() });
  }

  async expiringLots(days = EXPIRY_WINDOW_DAYS): Promise<LotView[]> {
    const now = this.now();
    return this.listLots({
      active: true,
      inStock: true,
      expiresFrom: toDateString(now),
      expiresTo: toDateString(addDays(now, days)),
    });
  }

  // ---- movements ----

  listMovements(filter: MovementFilter) {
    return this.repos.movements.list(filter);
  }

  async getMovement(id: number): Promise<StockMovement> {
    const movement = await this.repos.movements.findById(id);
    if (!movement) throw new NotFoundError('Stock movement not found');
    return movement;
  }

  /** The only write path to Lot.current_stock. */
  async recordMovement(actor: AuthUser, request: MovementRequest): Promise<{ movement: StockMovement; lot: Lot }> {
    if (!(await this.repos.lots.findById(request.lot_id))) {
      throw ValidationError.field('lot_id', 'Lot not found');
    }
    if (request.clinical_episode_id && !(await this.repos.episodes.findById(request.clinical_episode_id))) {
      throw ValidationError.field('clinical_episode_id', 'Clinical episode not found');
    }

    const result = await this.repos.movements.record(request.lot_id, (lot) =>
      buildMovement(lot, { ...request, performed_by: actor.id })
    );
    const { movement } = result;
    console.log(
      `[Inventory] ${movement.type} x${movement.quantity} on lot #${movement.lot_id}: ${movement.stock_before} -> ${movement.stock_after}`
    );
    return result;
  }

  recordIntake(actor: AuthUser, request: Omit<MovementRequest, 'type'>) {
    return this.recordMovement(actor, { ...request, type: 'intake' });
  }

  recordOutbound(actor: AuthUser, request: Omit<MovementRequest, 'type'> & { type?: OutboundType }) {
    return this.recordMovement(actor, { ...request, type: request.type ?? 'clinical_use' });
  }
}
