import type { Request, RequestHandler } from 'express';
import { AuthFailureError } from '../errors';
import type { SessionService } from '../services/sessionService';

const extractToken = (header: string | undefined) => {
  if (!header) return undefined;
  const [scheme, token] = header.split(' ');
  if (scheme !== 'Bearer' || !token) return undefined;
  return token;
};

export const createRequireAuth = (sessions: SessionService): RequestHandler => (req, res, next) => {
  const token = extractToken(req.header('Authorization'));
  if (!token) {
    res.status(401).json({ error: 'Unauthorized' });
    return;
  }
  const payload = sessions.authenticateToken(token);
  if (!payload) {
    res.status(401).json({ error: 'Unauthorized' });
    return;
  }
  req.user = payload.user;
  req.session = payload.session;
  return next();
};

export const currentUser = (req: Request) => {
  if (!req.user) {
    throw new AuthFailureError('Unauthorized');
  }
  return req.user;
};
