import { Lot, Product } from '../types/inventory.types';
import { Role } from '../types/user.types';
import { addDays, daysUntil, parseDay, toDateString } from '../utils/dates';
import { emailTemplates, labelOf } from '../utils/email_templates';
import { EXPIRY_WINDOW_DAYS } from '../inventory/inventory.service';
import { DeliveryResult, JobContext, deliverEach } from './job.context';

async function recipients(ctx: JobContext, roles: Role[]) {
  const users = await ctx.repos.users.listActiveByRoles(roles);
  return users.map((u) => u.email);
}

async function activeProductsWithStock(ctx: JobContext) {
  const [products, totals] = await Promise.all([
    ctx.repos.products.list({ active: true }),
    ctx.repos.products.stockTotals(),
  ]);
  return products.map((product) => ({ product, total: totals.get(product.id)?.total_stock ?? 0 }));
}

export interface LowStockResult extends DeliveryResult {
  lowStock: number;
}

/** One alert per admin and receptionist listing every active product below its minimum. */
export async function checkStockLevels(ctx: JobContext): Promise<LowStockResult> {
  const low = (await activeProductsWithStock(ctx)).filter(({ product, total }) => total < product.min_stock);
  if (low.length === 0) {
    console.log('[Jobs] low stock: all products above minimum');
    return { lowStock: 0, sent: 0, failed: 0 };
  }

  const content = emailTemplates.lowStock({
    clinicName: ctx.clinicName,
    products: low.map(({ product, total }) => ({
      code: product.code,
      name: product.name,
      category: labelOf(product.category),
      total,
      min: product.min_stock,
    })),
  });
  const to = await recipients(ctx, ['admin', 'receptionist']);
  const result = await deliverEach(
    ctx,
    'low stock',
    to.map((email) => ({ to: email, ...content }))
  );

  console.log(`[Jobs] low stock: ${low.length} product(s) below minimum, ${result.sent} alert(s) sent`);
  return { lowStock: low.length, ...result };
}

export interface ExpiryResult extends DeliveryResult {
  expiring: number;
  expired: number;
}

/**
 * Alerts staff about active lots with stock that expire within the window or
 * have already expired. Reported lots are stamped with today's date and left
 * out of any later run on the same day.
 */
export async function checkExpiringLots(ctx: JobContext): Promise<ExpiryResult> {
  const { repos } = ctx;
  const now = ctx.now();
  const today = toDateString(now);

  const notAlertedToday = (lot: Lot) => lot.expiry_alerted_on !== today;
  const [soon, past] = await Promise.all([
    repos.lots.list({
      active: true,
      inStock: true,
      expiresFrom: today,
      expiresTo: toDateString(addDays(now, EXPIRY_WINDOW_DAYS)),
    }),
    repos.lots.list({ active: true, inStock: true, expiresBefore: today }),
  ]);
  const expiring = soon.filter(notAlertedToday);
  const expired = past.filter(notAlertedToday);

  if (expiring.length === 0 && expired.length === 0) {
    console.log('[Jobs] expiry scan: nothing new to report');
    return { expiring: 0, expired: 0, sent: 0, failed: 0 };
  }

  const products = new Map<number, Product>();
  for (const lot of [...expiring, ...expired]) {
    if (products.has(lot.product_id)) continue;
    const product = await repos.products.findById(lot.product_id);
    if (product) products.set(product.id, product);
  }
  const describe = (lot: Lot) => ({
    code: products.get(lot.product_id)?.code ?? '',
    name: products.get(lot.product_id)?.name ?? `product #${lot.product_id}`,
    lotNumber: lot.lot_number,
    expiresOn: parseDay(lot.expires_on),
    stock: lot.current_stock,
  });

  const content = emailTemplates.expiryAlert({
    clinicName: ctx.clinicName,
    expired: expired.map(describe),
    expiring: expiring.map((lot) => ({ ...describe(lot), days: daysUntil(lot.expires_on, now) })),
  });
  const to = await recipients(ctx, ['admin', 'vet', 'receptionist']);
  const result = await deliverEach(
    ctx,
    'expiry scan',
    to.map((email) => ({ to: email, ...content }))
  );

  if (result.sent > 0) {
    await repos.lots.markExpiryAlerted([...expiring, ...expired].map((l) => l.id), today);
  }
  console.log(
    `[Jobs] expiry scan: ${expiring.length} expiring, ${expired.length} expired, ${result.sent} alert(s) sent`
  );
  return { expiring: expiring.length, expired: expired.length, ...result };
}

export interface ValuationResult extends DeliveryResult {
  products: number;
  totalValue: number;
}

/** Stock on hand valued at each product's purchase price, mailed to the admins. */
export async function sendInventoryValuation(ctx: JobContext): Promise<ValuationResult> {
  const rows = await activeProductsWithStock(ctx);
  const totalValue =
    Math.round(rows.reduce((sum, { product, total }) => sum + total * (product.purchase_price ?? 0), 0) * 100) / 100;

  const content = emailTemplates.inventoryValuation({
    clinicName: ctx.clinicName,
    month: ctx.now().toLocaleString('en-US', { month: 'long', year: 'numeric' }),
    productCount: rows.length,
    totalValue,
  });
  const to = await recipients(ctx, ['admin']);
  const result = await deliverEach(
    ctx,
    'valuation',
    to.map((email) => ({ to: email, ...content }))
  );

  console.log(`[Jobs] valuation: ${rows.length} product(s) worth ${totalValue.toFixed(2)}, ${result.sent} report(s) sent`);
  return { products: rows.length, totalValue, ...result };
}
