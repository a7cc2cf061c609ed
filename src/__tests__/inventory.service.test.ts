import { beforeEach, describe, it, expect } from 'vitest';
import { createMemoryRepositories } from '../testing/memory.repositories';
import { addAppointment, addEpisode, addLot, addPatient, addProduct, addUser, asActor } from '../testing/fixtures';
import type { Repositories } from '../repositories';
import { InventoryService } from '../inventory/inventory.service';
import { AuthUser } from '../types/user.types';
import { NotFoundError, StateConflictError } from '../utils/errors';

const NOW = new Date(2026, 9, 19, 9, 0);

describe('InventoryService', () => {
  let repos: Repositories;
  let inventory: InventoryService;
  let actor: AuthUser;

  beforeEach(async () => {
    repos = createMemoryRepositories();
    inventory = new InventoryService(repos, () => NOW);
    actor = asActor(await addUser(repos, 'vet'));
  });

  describe('products', () => {
    it('should apply default thresholds and report total stock over active lots', async () => {
      const created = await inventory.createProduct({ code: 'AMX-250', name: 'Amoxicillin 250mg' });
      expect(created).toMatchObject({ min_stock: 10, max_stock: 100, total_stock: 0, low_stock: true });

      const product = await repos.products.findById(created.id);
      if (!product) throw new Error('fixture missing');
      await addLot(repos, product, { initial_stock: 8 });
      await addLot(repos, product, { initial_stock: 4 });
      await addLot(repos, product, { initial_stock: 50, active: false });

      const view = await inventory.getProduct(created.id);
      expect(view.total_stock).toBe(12);
      expect(view.low_stock).toBe(false);
    });

    it('should reject a maximum below the minimum and duplicate codes', async () => {
      await expect(
        inventory.createProduct({ code: 'X', name: 'X', min_stock: 20, max_stock: 5 })
      ).rejects.toHaveProperty('fields', { max_stock: ['max_stock must not be lower than min_stock'] });

      await inventory.createProduct({ code: 'X', name: 'X' });
      await expect(inventory.createProduct({ code: 'X', name: 'Y' })).rejects.toHaveProperty('fields', {
        code: ['A product with this code already exists'],
      });
    });

    it('should not delete a product that has lots', async () => {
      const product = await addProduct(repos);
      await addLot(repos, product);
      await expect(inventory.deleteProduct(product.id)).rejects.toBeInstanceOf(StateConflictError);

      const bare = await addProduct(repos);
      await inventory.deleteProduct(bare.id);
      await expect(inventory.getProduct(bare.id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should classify every product in the stock report', async () => {
      const empty = await addProduct(repos, { code: 'A', name: 'A empty' });
      const low = await addProduct(repos, { code: 'B', name: 'B low' });
      const fine = await addProduct(repos, { code: 'C', name: 'C fine' });
      const over = await addProduct(repos, { code: 'D', name: 'D over', max_stock: 20 });
      await addLot(repos, low, { initial_stock: 5 });
      await addLot(repos, fine, { initial_stock: 40 });
      await addLot(repos, over, { initial_stock: 21 });

      const report = await inventory.stockReport();
      expect(report.map((r) => [r.product_id, r.status, r.total_stock])).toEqual([
        [empty.id, 'out_of_stock', 0],
        [low.id, 'low', 5],
        [fine.id, 'normal', 40],
        [over.id, 'overstock', 21],
      ]);
      expect((await inventory.lowStock()).map((p) => p.id)).toEqual([empty.id, low.id]);
    });
  });

  describe('lots', () => {
    it('should start current stock at the initial stock', async () => {
      const product = await addProduct(repos);
      const lot = await inventory.createLot({
        product_id: product.id,
        lot_number: 'B-001',
        manufactured_on: '2026-01-01',
        expires_on: '2026-11-08',
        initial_stock: 100,
      });

      expect(lot).toMatchObject({
        current_stock: 100,
        initial_stock: 100,
        product_code: product.code,
        expired: false,
        days_to_expiry: 20,
        expiring_soon: true,
      });
    });

    it('should check the dates and lot number', async () => {
      const product = await addProduct(repos);
      await expect(
        inventory.createLot({
          product_id: product.id,
          lot_number: 'B-001',
          manufactured_on: '2027-01-01',
          expires_on: '2026-12-31',
        })
      ).rejects.toHaveProperty('fields', { expires_on: ['expires_on must be after manufactured_on'] });

      await inventory.createLot({ product_id: product.id, lot_number: 'B-001', expires_on: '2027-12-31' });
      await expect(
        inventory.createLot({ product_id: product.id, lot_number: 'B-001', expires_on: '2027-12-31' })
      ).rejects.toHaveProperty('fields', { lot_number: ['Lot B-001 already exists for this product'] });
    });

    it('should separate expired lots from lots expiring soon', async () => {
      const product = await addProduct(repos);
      const gone = await addLot(repos, product, { expires_on: '2026-10-01' });
      await addLot(repos, product, { expires_on: '2026-10-01', initial_stock: 0 });
      const soon = await addLot(repos, product, { expires_on: '2026-11-10' });
      await addLot(repos, product, { expires_on: '2027-06-01' });

      expect((await inventory.expiredLots()).map((l) => l.id)).toEqual([gone.id]);
      expect((await inventory.expiringLots()).map((l) => l.id)).toEqual([soon.id]);
    });

    it('should not delete a lot that has movements', async () => {
      const product = await addProduct(repos);
      const lot = await addLot(repos, product);
      await inventory.recordIntake(actor, { lot_id: lot.id, quantity: 5, reason: 'Delivery' });
      await expect(inventory.deleteLot(lot.id)).rejects.toBeInstanceOf(StateConflictError);
    });
  });

  describe('movements', () => {
    it('should take clinical use out of the lot and record both stock levels', async () => {
      const guardian = await addUser(repos, 'guardian');
      const vet = await addUser(repos, 'vet');
      const appt = await addAppointment(repos, await addPatient(repos, guardian), { status: 'in_progress' });
      const episode = await addEpisode(repos, appt, vet);
      const product = await addProduct(repos);
      const lot = await addLot(repos, product, { initial_stock: 100 });

      const { movement, lot: after } = await inventory.recordOutbound(actor, {
        lot_id: lot.id,
        quantity: 30,
        reason: 'Surgery',
        clinical_episode_id: episode.id,
      });

      expect(movement).toMatchObject({
        type: 'clinical_use',
        quantity: 30,
        stock_before: 100,
        stock_after: 70,
        clinical_episode_id: episode.id,
        performed_by: actor.id,
      });
      expect(after.current_stock).toBe(70);
      expect((await repos.lots.findById(lot.id))?.current_stock).toBe(70);
    });

    it('should refuse to go below zero and leave the lot untouched', async () => {
      const product = await addProduct(repos);
      const lot = await addLot(repos, product, { initial_stock: 5 });

      await expect(
        inventory.recordMovement(actor, { type: 'sale', lot_id: lot.id, quantity: 6, reason: 'Counter sale' })
      ).rejects.toHaveProperty('fields', { quantity: ['Insufficient stock. Available: 5'] });
      expect((await repos.lots.findById(lot.id))?.current_stock).toBe(5);
      expect(await repos.movements.countByLot(lot.id)).toBe(0);
    });

    it('should report unknown lots and episodes as field errors', async () => {
      await expect(
        inventory.recordIntake(actor, { lot_id: 404, quantity: 1, reason: 'Delivery' })
      ).rejects.toHaveProperty('fields', { lot_id: ['Lot not found'] });

      const lot = await addLot(repos, await addProduct(repos));
      await expect(
        inventory.recordOutbound(actor, { lot_id: lot.id, quantity: 1, reason: 'Use', clinical_episode_id: 404 })
      ).rejects.toHaveProperty('fields', { clinical_episode_id: ['Clinical episode not found'] });
    });

    it('should list a product movements newest first', async () => {
      const product = await addProduct(repos);
      const lot = await addLot(repos, product, { initial_stock: 10 });
      const first = await inventory.recordIntake(actor, { lot_id: lot.id, quantity: 5, reason: 'Delivery' });
      const second = await inventory.recordOutbound(actor, { lot_id: lot.id, quantity: 2, reason: 'Sale', type: 'sale' });

      const movements = await inventory.productMovements(product.id);
      expect(movements.map((m) => m.id)).toEqual([second.movement.id, first.movement.id]);
      expect(second.lot.current_stock).toBe(13);
    });
  });
});
