import type { SessionRecord } from '../db/types';
import type { AuthUser } from '../services/sessionService';

declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
      session?: SessionRecord;
    }
  }
}

export {};
