import { Response, Router } from 'express';
import {
  AuthRequest,
  authMiddleware,
  currentUser,
  requireAdmin,
  requireStaff,
} from '../middleware/auth.middleware';
import { validateRequest, validated } from '../middleware/validation.middleware';
import { uploadProfilePhoto, uploadUrl } from '../middleware/upload.middleware';
import type { Services } from '../services';
import type { ProfileInput, UserInput } from './users.service';
import { ROLES } from '../types/user.types';
import { ValidationError, sendError } from '../utils/errors';
import { boolQuery, enumQuery, idParam, textQuery } from '../utils/query';

export function createUsersRouter({ users }: Services): Router {
  const router = Router();
  router.use(authMiddleware);

  router.get('/', requireStaff, async (req: AuthRequest, res) => {
    try {
      const list = await users.list({
        role: enumQuery(req.query.role, 'role', ROLES),
        active: boolQuery(req.query.active, 'active'),
        search: textQuery(req.query.search),
      });
      res.json(list);
    } catch (err) {
      sendError(res, err, 'Failed to list users');
    }
  });

  router.get('/vets', async (_req: AuthRequest, res) => {
    try {
      res.json(await users.listActive('vet'));
    } catch (err) {
      sendError(res, err, 'Failed to list vets');
    }
  });

  router.get('/guardians', async (_req: AuthRequest, res) => {
    try {
      res.json(await users.listActive('guardian'));
    } catch (err) {
      sendError(res, err, 'Failed to list guardians');
    }
  });

  // ----- own profile -----
  router.get('/me', async (req: AuthRequest, res) => {
    try {
      res.json(await users.getProfile(currentUser(req)));
    } catch (err) {
      sendError(res, err, 'Failed to load profile');
    }
  });

  router.put('/me', validateRequest('updateProfile'), async (req: AuthRequest, res) => {
    try {
      res.json(await users.updateProfile(currentUser(req), validated<ProfileInput>(req)));
    } catch (err) {
      sendError(res, err, 'Failed to update profile');
    }
  });

  router.post('/me/photo', uploadProfilePhoto.single('photo'), async (req: AuthRequest, res) => {
    try {
      if (!req.file) throw ValidationError.field('photo', 'An image file is required');
      res.json(await users.setPhoto(currentUser(req), uploadUrl('profiles', req.file)));
    } catch (err) {
      sendError(res, err, 'Failed to upload photo');
    }
  });

  // ----- administration -----
  router.get('/:id', async (req: AuthRequest, res) => {
    try {
      res.json(await users.get(currentUser(req), idParam(req.params.id, 'User')));
    } catch (err) {
      sendError(res, err, 'Failed to load user');
    }
  });

  router.post('/', requireAdmin, validateRequest('createUser'), async (req: AuthRequest, res) => {
    try {
      const user = await users.create(validated<UserInput>(req));
      console.log(`[Users] ${user.role} account ${user.email} created by user ${currentUser(req).id}`);
      res.status(201).json(user);
    } catch (err) {
      sendError(res, err, 'Failed to create user');
    }
  });

  const update = async (req: AuthRequest, res: Response) => {
    try {
      res.json(await users.update(idParam(req.params.id, 'User'), validated<UserInput>(req)));
    } catch (err) {
      sendError(res, err, 'Failed to update user');
    }
  };
  router.put('/:id', requireAdmin, validateRequest('updateUser'), update);
  router.patch('/:id', requireAdmin, validateRequest('updateUser'), update);

  router.delete('/:id', requireAdmin, async (req: AuthRequest, res) => {
    try {
      await users.delete(idParam(req.params.id, 'User'));
      res.status(204).end();
    } catch (err) {
      sendError(res, err, 'Failed to delete user');
    }
  });

  router.post('/:id/activate', requireAdmin, async (req: AuthRequest, res) => {
    try {
      res.json(await users.setActive(currentUser(req), idParam(req.params.id, 'User'), true));
    } catch (err) {
      sendError(res, err, 'Failed to activate user');
    }
  });

  router.post('/:id/deactivate', requireAdmin, async (req: AuthRequest, res) => {
    try {
      res.json(await users.setActive(currentUser(req), idParam(req.params.id, 'User'), false));
    } catch (err) {
      sendError(res, err, 'Failed to deactivate user');
    }
  });

  return router;
}
