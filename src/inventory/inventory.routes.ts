import { Response, Router } from 'express';
import { AuthRequest, authMiddleware, currentUser, requireStaff } from '../middleware/auth.middleware';
import { validateRequest, validated } from '../middleware/validation.middleware';
import type { Services } from '../services';
import type { LotInput, MovementRequest, ProductInput } from './inventory.service';
import { MOVEMENT_TYPES, OutboundType, PRODUCT_CATEGORIES } from '../types/inventory.types';
import { ForbiddenError, sendError } from '../utils/errors';
import { boolQuery, enumQuery, idParam, intQuery, textQuery } from '../utils/query';

export function createInventoryRouter({ inventory }: Services): Router {
  const router = Router();
  router.use(authMiddleware);

  // ----- products -----
  router.get('/products', async (req: AuthRequest, res) => {
    try {
      const list = await inventory.listProducts({
        category: enumQuery(req.query.category, 'category', PRODUCT_CATEGORIES),
        active: boolQuery(req.query.active, 'active'),
        requiresPrescription: boolQuery(req.query.requires_prescription, 'requires_prescription'),
        search: textQuery(req.query.search),
      });
      res.json(list);
    } catch (err) {
      sendError(res, err, 'Failed to list products');
    }
  });

  router.get('/products/low-stock', async (_req: AuthRequest, res) => {
    try {
      res.json(await inventory.lowStock());
    } catch (err) {
      sendError(res, err, 'Failed to list low-stock products');
    }
  });

  router.get('/products/stock-report', requireStaff, async (_req: AuthRequest, res) => {
    try {
      res.json(await inventory.stockReport());
    } catch (err) {
      sendError(res, err, 'Failed to build stock report');
    }
  });

  router.get('/products/:id', async (req: AuthRequest, res) => {
    try {
      res.json(await inventory.getProduct(idParam(req.params.id, 'Product')));
    } catch (err) {
      sendError(res, err, 'Failed to load product');
    }
  });

  router.get('/products/:id/movements', requireStaff, async (req: AuthRequest, res) => {
    try {
      const limit = intQuery(req.query.limit, 'limit') ?? 50;
      res.json(await inventory.productMovements(idParam(req.params.id, 'Product'), limit));
    } catch (err) {
      sendError(res, err, 'Failed to list product movements');
    }
  });

  router.post('/products', requireStaff, validateRequest('createProduct'), async (req: AuthRequest, res) => {
    try {
      res.status(201).json(await inventory.createProduct(validated<ProductInput>(req)));
    } catch (err) {
      sendError(res, err, 'Failed to create product');
    }
  });

  const updateProduct = async (req: AuthRequest, res: Response) => {
    try {
      res.json(await inventory.updateProduct(idParam(req.params.id, 'Product'), validated<ProductInput>(req)));
    } catch (err) {
      sendError(res, err, 'Failed to update product');
    }
  };
  router.put('/products/:id', requireStaff, validateRequest('updateProduct'), updateProduct);
  router.patch('/products/:id', requireStaff, validateRequest('updateProduct'), updateProduct);

  router.delete('/products/:id', requireStaff, async (req: AuthRequest, res) => {
    try {
      await inventory.deleteProduct(idParam(req.params.id, 'Product'));
      res.status(204).end();
    } catch (err) {
      sendError(res, err, 'Failed to delete product');
    }
  });

  // ----- lots -----
  router.get('/lots', async (req: AuthRequest, res) => {
    try {
      const list = await inventory.listLots({
        productId: intQuery(req.query.product_id, 'product_id'),
        active: boolQuery(req.query.active, 'active'),
        search: textQuery(req.query.search),
      });
      res.json(list);
    } catch (err) {
      sendError(res, err, 'Failed to list lots');
    }
  });

  router.get('/lots/expired', async (_req: AuthRequest, res) => {
    try {
      res.json(await inventory.expiredLots());
    } catch (err) {
      sendError(res, err, 'Failed to list expired lots');
    }
  });

  router.get('/lots/expiring', async (req: AuthRequest, res) => {
    try {
      res.json(await inventory.expiringLots(intQuery(req.query.days, 'days')));
    } catch (err) {
      sendError(res, err, 'Failed to list expiring lots');
    }
  });

  router.get('/lots/:id', async (req: AuthRequest, res) => {
    try {
      res.json(await inventory.getLot(idParam(req.params.id, 'Lot')));
    } catch (err) {
      sendError(res, err, 'Failed to load lot');
    }
  });

  router.post('/lots', requireStaff, validateRequest('createLot'), async (req: AuthRequest, res) => {
    try {
      res.status(201).json(await inventory.createLot(validated<LotInput>(req)));
    } catch (err) {
      sendError(res, err, 'Failed to create lot');
    }
  });

  const updateLot = async (req: AuthRequest, res: Response) => {
    try {
      res.json(await inventory.updateLot(idParam(req.params.id, 'Lot'), validated<LotInput>(req)));
    } catch (err) {
      sendError(res, err, 'Failed to update lot');
    }
  };
  router.put('/lots/:id', requireStaff, validateRequest('updateLot'), updateLot);
  router.patch('/lots/:id', requireStaff, validateRequest('updateLot'), updateLot);

  router.delete('/lots/:id', requireStaff, async (req: AuthRequest, res) => {
    try {
      await inventory.deleteLot(idParam(req.params.id, 'Lot'));
      res.status(204).end();
    } catch (err) {
      sendError(res, err, 'Failed to delete lot');
    }
  });

  // ----- stock movements: append-only ledger -----
  router.get('/movements', requireStaff, async (req: AuthRequest, res) => {
    try {
      const list = await inventory.listMovements({
        lotId: intQuery(req.query.lot_id, 'lot_id'),
        productId: intQuery(req.query.product_id, 'product_id'),
        type: enumQuery(req.query.type, 'type', MOVEMENT_TYPES),
        episodeId: intQuery(req.query.episode_id, 'episode_id'),
        limit: intQuery(req.query.limit, 'limit'),
      });
      res.json(list);
    } catch (err) {
      sendError(res, err, 'Failed to list stock movements');
    }
  });

  router.get('/movements/:id', requireStaff, async (req: AuthRequest, res) => {
    try {
      res.json(await inventory.getMovement(idParam(req.params.id, 'Stock movement')));
    } catch (err) {
      sendError(res, err, 'Failed to load stock movement');
    }
  });

  router.post('/movements', requireStaff, validateRequest('createMovement'), async (req: AuthRequest, res) => {
    try {
      res.status(201).json(await inventory.recordMovement(currentUser(req), validated<MovementRequest>(req)));
    } catch (err) {
      sendError(res, err, 'Failed to record stock movement');
    }
  });

  router.post('/movements/intake', requireStaff, validateRequest('recordIntake'), async (req: AuthRequest, res) => {
    try {
      res
        .status(201)
        .json(await inventory.recordIntake(currentUser(req), validated<Omit<MovementRequest, 'type'>>(req)));
    } catch (err) {
      sendError(res, err, 'Failed to record stock intake');
    }
  });

  router.post('/movements/outbound', requireStaff, validateRequest('recordOutbound'), async (req: AuthRequest, res) => {
    try {
      const input = validated<Omit<MovementRequest, 'type'> & { type?: OutboundType }>(req);
      res.status(201).json(await inventory.recordOutbound(currentUser(req), input));
    } catch (err) {
      sendError(res, err, 'Failed to record stock outbound');
    }
  });

  // no role may rewrite or remove ledger entries, admins included
  const immutable = (_req: AuthRequest, res: Response) => {
    sendError(
      res,
      new ForbiddenError('Stock movements cannot be modified or deleted; record a correcting adjustment instead'),
      'Request failed'
    );
  };
  router.put('/movements/:id', immutable);
  router.patch('/movements/:id', immutable);
  router.delete('/movements/:id', immutable);

  return router;
}
