import { Router } from 'express';
import { isItemType } from '../db/types';
import { ValidationError } from '../errors';
import { createRequireAuth, currentUser } from '../middleware/authMiddleware';
import { createUploadMiddleware } from '../middleware/uploadStorage';
import type { ItemStore } from '../services/itemStore';
import type { SessionService } from '../services/sessionService';
import { asyncHandler } from '../utils/asyncHandler';

export const createItemRouter = (items: ItemStore, sessions: SessionService, options: { maxUploadBytes: number }) => {
  const router = Router();
  const upload = createUploadMiddleware(options.maxUploadBytes);

  router.use(createRequireAuth(sessions));

  router.post(
    '/note',
    asyncHandler((req, res) => {
      const user = currentUser(req);
      const { content } = req.body ?? {};
      if (typeof content !== 'string') {
        throw new ValidationError('Note content cannot be empty.');
      }
      const id = items.save(user.id, 'note', Buffer.from(content, 'utf8'));
      res.status(201).json({ item: { id, type: 'note' } });
    })
  );

  router.post(
    '/:type',
    (req, _res, next) => {
      const { type } = req.params;
      if (!isItemType(type) || type === 'note') {
        next(new ValidationError(`Unsupported upload type: ${type}`));
        return;
      }
      next();
    },
    upload,
    asyncHandler((req, res) => {
      const user = currentUser(req);
      const type = req.params.type;
      const file = req.file;
      if (!file || !file.originalname) {
        throw new ValidationError('File not provided.');
      }
      if (!isItemType(type)) {
        throw new ValidationError(`Unsupported upload type: ${type}`);
      }
      console.log(`[items] upload - user: ${user.id} type: ${type} file: ${file.originalname}`);
      const id = items.save(user.id, type, file.buffer);
      res.status(201).json({ item: { id, type }, filename: file.originalname });
    })
  );

  return router;
};
