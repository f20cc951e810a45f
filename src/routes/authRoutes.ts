import { Router } from 'express';
import { createRequireAuth, currentUser } from '../middleware/authMiddleware';
import type { SessionService } from '../services/sessionService';
import { asyncHandler } from '../utils/asyncHandler';

export const createAuthRouter = (sessions: SessionService) => {
  const router = Router();
  const requireAuth = createRequireAuth(sessions);

  router.post(
    '/login',
    asyncHandler(async (req, res) => {
      const { username, password } = req.body ?? {};
      if (typeof username !== 'string' || typeof password !== 'string' || !username) {
        res.status(400).json({ error: 'Username and password are required' });
        return;
      }

      const result = await sessions.login(username, password);
      res.json(result);
    })
  );

  router.post('/logout', requireAuth, (req, res) => {
    if (req.session) {
      sessions.logout(req.session.token);
    }
    res.status(204).send();
  });

  router.get(
    '/me',
    requireAuth,
    asyncHandler((req, res) => {
      res.json({ user: currentUser(req) });
    })
  );

  return router;
};
