import { Router } from 'express';
import { createAuthController } from './auth.controller';
import { authMiddleware } from '../middleware/auth.middleware';
import { validateRequest } from '../middleware/validation.middleware';
import type { Services } from '../services';

export function createAuthRouter(services: Services): Router {
  const router = Router();
  const { register, login, changePassword } = createAuthController(services.users);

  router.post('/register', validateRequest('register'), register);
  router.post('/login', validateRequest('login'), login);
  router.put('/change-password', authMiddleware, validateRequest('changePassword'), changePassword);

  return router;
}
