import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import bcrypt from 'bcryptjs';
import { z } from 'zod';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('auth');

const DEFAULT_SECRET_PLACEHOLDER = 'change-this-secret-in-production';

const operatorSchema = z.object({
  username: z.string().min(1),
  role: z.enum(['operator', 'viewer'])
});

export type Operator = z.infer<typeof operatorSchema>;

export interface AuthRequest extends Request {
  operator?: Operator;
}

/** Auth is on only when explicitly enabled and a password hash is configured. */
export const isAuthEnabled = (): boolean => {
  return process.env.AUTH_ENABLED === 'true' && Boolean(process.env.ADMIN_PASSWORD_HASH);
};

let ephemeralSecret: string | null = null;

function getJwtSecret(): string {
  const secret = process.env.JWT_SECRET;
  if (!secret || secret === DEFAULT_SECRET_PLACEHOLDER) {
    if (isAuthEnabled()) {
      throw new Error('JWT_SECRET must be set to a strong random value when AUTH_ENABLED=true');
    }
    // Auth disabled: tokens only need to survive this process.
    ephemeralSecret ??= `ephemeral-${Date.now()}-${Math.random()}`;
    return ephemeralSecret;
  }
  if (secret.length < 32) {
    logger.warn('JWT_SECRET is shorter than 32 characters');
  }
  return secret;
}

export const issueToken = (operator: Operator): string => {
  const expiresIn = process.env.JWT_EXPIRATION || '24h';
  return jwt.sign(operator, getJwtSecret(), { expiresIn: expiresIn as jwt.SignOptions['expiresIn'] });
};

export const verifyToken = (token: string): Operator | null => {
  let payload: string | jwt.JwtPayload;
  try {
    payload = jwt.verify(token, getJwtSecret());
  } catch {
    return null;
  }
  const parsed = operatorSchema.safeParse(payload);
  return parsed.success ? parsed.data : null;
};

export const hashPassword = (password: string): Promise<string> => bcrypt.hash(password, 12);

export const authenticateOperator = async (username: string, password: string): Promise<Operator | null> => {
  const expectedUser = process.env.ADMIN_USERNAME || 'admin';
  const hash = process.env.ADMIN_PASSWORD_HASH || '';
  if (username !== expectedUser || !hash) return null;
  return (await bcrypt.compare(password, hash)) ? { username, role: 'operator' } : null;
};

function bearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  return header && header.startsWith('Bearer ') ? header.substring(7) : null;
}

export const requireAuth = (req: AuthRequest, res: Response, next: NextFunction): void => {
  if (!isAuthEnabled()) {
    req.operator = { username: 'anonymous', role: 'operator' };
    next();
    return;
  }

  const token = bearerToken(req);
  if (!token) {
    res.status(401).json({ error: 'Missing or invalid authorization header' });
    return;
  }

  const operator = verifyToken(token);
  if (!operator) {
    res.status(401).json({ error: 'Invalid or expired token' });
    return;
  }

  req.operator = operator;
  logger.debug({ username: operator.username }, 'Operator authenticated');
  next();
};

/** Mutating routes: settings changes, run control, account connection. */
export const requireOperator = (req: AuthRequest, res: Response, next: NextFunction): void => {
  if (!req.operator || req.operator.role !== 'operator') {
    res.status(403).json({ error: 'Operator access required' });
    return;
  }
  next();
};
