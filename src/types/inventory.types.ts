export const PRODUCT_CATEGORIES = [
  'medication',
  'vaccine',
  'medical_supply',
  'food',
  'hygiene',
  'accessory',
  'other',
] as const;
export type ProductCategory = (typeof PRODUCT_CATEGORIES)[number];

export const PRODUCT_UNITS = ['unit', 'box', 'vial', 'ampoule', 'tablet', 'capsule', 'ml', 'g', 'kg'] as const;
export type ProductUnit = (typeof PRODUCT_UNITS)[number];

export const MOVEMENT_TYPES = [
  'intake',
  'sale',
  'clinical_use',
  'adjustment_in',
  'adjustment_out',
  'loss',
  'return',
] as const;
export type MovementType = (typeof MOVEMENT_TYPES)[number];

export const OUTBOUND_TYPES = ['sale', 'clinical_use'] as const;
export type OutboundType = (typeof OUTBOUND_TYPES)[number];

export type StockStatus = 'out_of_stock' | 'low' | 'overstock' | 'normal';

export interface Product {
  id: number;
  code: string;
  name: string;
  description: string;
  category: ProductCategory;
  active_ingredient: string;
  concentration: string;
  manufacturer: string;
  unit: ProductUnit;
  min_stock: number;
  max_stock: number;
  purchase_price: number | null;
  sale_price: number | null;
  requires_prescription: boolean;
  lot_tracked: boolean;
  active: boolean;
  created_at: Date;
  updated_at: Date;
}

export type NewProduct = Omit<Product, 'id' | 'created_at' | 'updated_at'>;
export type ProductChanges = Partial<Omit<Product, 'id' | 'created_at'>>;

export interface ProductFilter {
  category?: ProductCategory;
  active?: boolean;
  requiresPrescription?: boolean;
  search?: string;
}

export interface ProductView extends Product {
  total_stock: number;
  low_stock: boolean;
}

export interface Lot {
  id: number;
  product_id: number;
  lot_number: string;
  manufactured_on: string | null;
  expires_on: string;
  initial_stock: number;
  current_stock: number;
  lot_purchase_price: number | null;
  supplier: string;
  active: boolean;
  expiry_alerted_on: string | null;
  received_at: Date;
  updated_at: Date;
}

export type NewLot = Omit<Lot, 'id' | 'received_at' | 'updated_at'>;
export type LotChanges = Partial<Omit<Lot, 'id' | 'product_id' | 'received_at'>>;

export interface LotFilter {
  productId?: number;
  active?: boolean;
  /** inclusive YYYY-MM-DD bounds on expires_on */
  expiresFrom?: string;
  expiresTo?: string;
  expiresBefore?: string;
  inStock?: boolean;
  search?: string;
}

export interface LotView extends Lot {
  product_name?: string;
  product_code?: string;
  expired: boolean;
  days_to_expiry: number;
  expiring_soon: boolean;
}

export interface StockMovement {
  id: number;
  lot_id: number;
  type: MovementType;
  quantity: number;
  stock_before: number;
  stock_after: number;
  clinical_episode_id: number | null;
  reason: string;
  reference_document: string;
  performed_by: number | null;
  created_at: Date;
}

export type MovementDraft = Omit<StockMovement, 'id' | 'created_at'>;

export interface MovementFilter {
  lotId?: number;
  productId?: number;
  type?: MovementType;
  episodeId?: number;
  limit?: number;
}

export interface StockReportRow {
  product_id: number;
  code: string;
  name: string;
  category: ProductCategory;
  total_stock: number;
  min_stock: number;
  max_stock: number;
  status: StockStatus;
  active_lots: number;
}
