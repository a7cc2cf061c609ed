import { Request, Response } from 'express';
import { AuthRequest, currentUser, signToken } from '../middleware/auth.middleware';
import { validated } from '../middleware/validation.middleware';
import type { RegisterInput, UsersService } from '../users/users.service';
import { sendError } from '../utils/errors';

export function createAuthController(users: UsersService) {
  async function register(req: Request, res: Response) {
    try {
      const user = await users.register(validated<RegisterInput>(req));
      console.log(`[Auth] guardian registered: ${user.email}`);
      res.status(201).json({ user, token: signToken(user) });
    } catch (err) {
      sendError(res, err, 'Registration failed');
    }
  }

  async function login(req: Request, res: Response) {
    try {
      const { email, password } = validated<{ email: string; password: string }>(req);
      const user = await users.authenticate(email, password);
      res.json({ token: signToken(user), user });
    } catch (err) {
      sendError(res, err, 'Login failed');
    }
  }

  async function changePassword(req: AuthRequest, res: Response) {
    try {
      const { current_password, new_password } = validated<{ current_password: string; new_password: string }>(req);
      await users.changePassword(currentUser(req), current_password, new_password);
      res.json({ message: 'Password updated' });
    } catch (err) {
      sendError(res, err, 'Failed to change password');
    }
  }

  return { register, login, changePassword };
}
