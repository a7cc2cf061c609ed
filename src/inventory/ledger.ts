import { Lot, MovementDraft, MovementType, StockStatus } from '../types/inventory.types';
import { ValidationError } from '../utils/errors';

const SIGN: Record<MovementType, 1 | -1> = {
  intake: 1,
  sale: -1,
  clinical_use: -1,
  adjustment_in: 1,
  adjustment_out: -1,
  loss: -1,
  return: 1,
};

export function isInbound(type: MovementType): boolean {
  return SIGN[type] > 0;
}

export function stockAfter(type: MovementType, quantity: number, stockBefore: number): number {
  if (!Number.isInteger(quantity) || quantity < 1) {
    throw ValidationError.field('quantity', 'quantity must be greater than 0');
  }
  const after = stockBefore + SIGN[type] * quantity;
  if (after < 0) {
    throw ValidationError.field('quantity', `Insufficient stock. Available: ${stockBefore}`);
  }
  return after;
}

export interface MovementInput {
  type: MovementType;
  quantity: number;
  reason: string;
  reference_document?: string;
  clinical_episode_id?: number | null;
  performed_by: number | null;
}

export function buildMovement(lot: Pick<Lot, 'id' | 'current_stock'>, input: MovementInput): MovementDraft {
  return {
    lot_id: lot.id,
    type: input.type,
    quantity: input.quantity,
    stock_before: lot.current_stock,
    stock_after: stockAfter(input.type, input.quantity, lot.current_stock),
    clinical_episode_id: input.clinical_episode_id ?? null,
    reason: input.reason,
    reference_document: input.reference_document ?? '',
    performed_by: input.performed_by,
  };
}

export function stockStatus(total: number, min: number, max: number): StockStatus {
  if (total === 0) return 'out_of_stock';
  if (total < min) return 'low';
  if (total > max) return 'overstock';
  return 'normal';
}
