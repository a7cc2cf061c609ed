import { describe, it, expect } from 'vitest';
import { buildMovement, isInbound, stockAfter, stockStatus } from '../inventory/ledger';
import { ValidationError } from '../utils/errors';

describe('stock ledger', () => {
  it('should add inbound and subtract outbound quantities', () => {
    expect(stockAfter('intake', 20, 100)).toBe(120);
    expect(stockAfter('return', 2, 0)).toBe(2);
    expect(stockAfter('adjustment_in', 1, 5)).toBe(6);
    expect(stockAfter('clinical_use', 30, 100)).toBe(70);
    expect(stockAfter('sale', 5, 5)).toBe(0);
    expect(stockAfter('loss', 1, 3)).toBe(2);
  });

  it('should classify movement types', () => {
    expect(isInbound('intake')).toBe(true);
    expect(isInbound('return')).toBe(true);
    expect(isInbound('adjustment_out')).toBe(false);
  });

  it('should reject outbound movements beyond the available stock', () => {
    try {
      stockAfter('sale', 6, 5);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.fields).toEqual({ quantity: ['Insufficient stock. Available: 5'] });
      }
    }
  });

  it('should reject zero, negative and fractional quantities', () => {
    expect(() => stockAfter('intake', 0, 10)).toThrow(ValidationError);
    expect(() => stockAfter('intake', -3, 10)).toThrow(ValidationError);
    expect(() => stockAfter('intake', 1.5, 10)).toThrow(ValidationError);
  });

  it('should build a draft carrying both stock levels', () => {
    const draft = buildMovement(
      { id: 7, current_stock: 100 },
      { type: 'clinical_use', quantity: 30, reason: 'Surgery', clinical_episode_id: 3, performed_by: 2 }
    );
    expect(draft).toEqual({
      lot_id: 7,
      type: 'clinical_use',
      quantity: 30,
      stock_before: 100,
      stock_after: 70,
      clinical_episode_id: 3,
      reason: 'Surgery',
      reference_document: '',
      performed_by: 2,
    });
  });

  describe('stockStatus', () => {
    it('should report out of stock before low', () => {
      expect(stockStatus(0, 10, 100)).toBe('out_of_stock');
      expect(stockStatus(0, 0, 100)).toBe('out_of_stock');
    });

    it('should compare against the thresholds', () => {
      expect(stockStatus(9, 10, 100)).toBe('low');
      expect(stockStatus(10, 10, 100)).toBe('normal');
      expect(stockStatus(100, 10, 100)).toBe('normal');
      expect(stockStatus(101, 10, 100)).toBe('overstock');
    });
  });
});
