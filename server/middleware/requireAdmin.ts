import type { Request, Response, NextFunction } from 'express';
import { withSource } from '../logger';

const log = withSource('auth');

/** Runs after authenticateFirebase; only members of the admin group pass. */
export function requireAdmin(req: Request, res: Response, next: NextFunction) {
  if (!req.user?.isAdmin) {
    log.warn({ requestId: req.id, uid: req.user?.uid, path: req.path }, 'admin access denied');
    return res.status(403).json({ error: 'Forbidden', message: 'Admin access required' });
  }
  return next();
}
