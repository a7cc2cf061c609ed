import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { config } from '../config';
import { AuthUser, Role, isRole } from '../types/user.types';

export interface AuthRequest extends Request {
  user?: AuthUser;
}

function toAuthUser(payload: string | jwt.JwtPayload): AuthUser | null {
  if (typeof payload === 'string') return null;
  const { id, email, role } = payload;
  if (typeof id !== 'number' || typeof email !== 'string' || !isRole(role)) return null;
  return { id, email, role };
}

export function signToken(user: AuthUser): string {
  return jwt.sign({ id: user.id, email: user.email, role: user.role }, config.jwtSecret, {
    expiresIn: config.jwtExpiresInSeconds,
  });
}

export function authMiddleware(req: AuthRequest, res: Response, next: NextFunction) {
  const auth = req.headers.authorization;
  if (!auth) return res.status(401).json({ error: 'Missing Authorization header' });
  const token = auth.split(' ')[1];
  if (!token) return res.status(401).json({ error: 'Invalid Authorization header' });
  try {
    const user = toAuthUser(jwt.verify(token, config.jwtSecret));
    if (!user) return res.status(401).json({ error: 'Invalid token' });
    req.user = user;
    next();
  } catch (err) {
    return res.status(401).json({ error: 'Invalid token' });
  }
}

export function requireRole(...roles: Role[]) {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    if (!req.user || !roles.includes(req.user.role)) {
      return res.status(403).json({ error: `Only ${roles.join(', ')} may do this` });
    }
    next();
  };
}

export const requireStaff = requireRole('vet', 'receptionist', 'admin');
export const requireAdmin = requireRole('admin');

/** The authenticated caller; routes mounted behind authMiddleware always have one. */
export function currentUser(req: AuthRequest): AuthUser {
  if (!req.user) throw new Error('authMiddleware must run before this handler');
  return req.user;
}
