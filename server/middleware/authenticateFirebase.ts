import type { Request, Response, NextFunction } from 'express';
import type { DecodedIdToken } from 'firebase-admin/auth';
import { config, hasFirebaseEnv } from '../config';
import { withSource } from '../logger';
import { toError } from '../types/errors';

const log = withSource('auth');

type VerifyIdToken = (token: string) => Promise<DecodedIdToken>;

let verifier: Promise<VerifyIdToken | null> | undefined;

async function loadVerifier(): Promise<VerifyIdToken | null> {
  try {
    const { getApps, initializeApp, cert } = await import('firebase-admin/app');
    const { getAuth } = await import('firebase-admin/auth');
    if (!getApps().length) {
      initializeApp({
        credential: cert({
          projectId: config.firebase.projectId,
          clientEmail: config.firebase.clientEmail,
          privateKey: (config.firebase.privateKey ?? '').replace(/\\n/g, '\n'),
        }),
      });
      log.info('firebase admin initialized');
    }
    const auth = getAuth();
    return (token) => auth.verifyIdToken(token);
  } catch (err) {
    // Module missing or bad credentials; every request is refused with 401
    log.error({ err: toError(err) }, 'firebase admin unavailable');
    return null;
  }
}

function getVerifier(): Promise<VerifyIdToken | null> {
  verifier ??= loadVerifier();
  return verifier;
}

function headerValue(req: Request, name: string): string {
  const raw = req.headers[name];
  return (Array.isArray(raw) ? raw[0] ?? '' : raw ?? '').trim();
}

/** Groups claim arrives as a single name, a comma list, or an array. */
export function parseGroups(raw: unknown): string[] {
  const values = Array.isArray(raw) ? raw : typeof raw === 'string' ? raw.split(',') : [];
  return values
    .filter((v): v is string => typeof v === 'string')
    .map((v) => v.trim())
    .filter(Boolean);
}

function buildUser(uid: string, groups: string[], email?: string, name?: string): Express.AuthenticatedUser {
  return {
    uid,
    email,
    username: name || email || uid,
    groups,
    isAdmin: groups.includes(config.adminGroup),
  };
}

function unauthorized(res: Response) {
  return res.status(401).json({ error: 'Unauthorized', code: 'unauthorized' });
}

export async function authenticateFirebase(req: Request, res: Response, next: NextFunction) {
  const requestId = req.id;

  try {
    // Dev fallback: header override outside production when Firebase env is missing
    if (!config.isProd && !hasFirebaseEnv()) {
      const devUid = headerValue(req, 'x-dev-firebase-uid');
      if (!devUid) {
        log.warn({ requestId, reason: 'missing_dev_uid' }, 'unauthorized (dev fallback requires x-dev-firebase-uid)');
        return unauthorized(res);
      }
      const devEmail = headerValue(req, 'x-dev-email');
      req.user = buildUser(devUid, parseGroups(headerValue(req, 'x-dev-groups')), devEmail || undefined);
      log.debug({ requestId, uid: devUid }, 'authenticated via dev fallback');
      return next();
    }

    const h = headerValue(req, 'authorization');
    if (!h.startsWith('Bearer ')) {
      log.warn({ requestId, reason: 'missing_or_invalid_scheme' }, 'unauthorized');
      return unauthorized(res);
    }

    const verify = hasFirebaseEnv() ? await getVerifier() : null;
    if (!verify) {
      log.error({ requestId, reason: 'admin_unavailable_or_env_missing' }, 'unauthorized');
      return unauthorized(res);
    }

    let claims: DecodedIdToken;
    try {
      claims = await verify(h.slice('Bearer '.length));
    } catch (err) {
      log.warn({ requestId, reason: 'verification_failed', err: toError(err) }, 'unauthorized');
      return unauthorized(res);
    }

    const name: unknown = claims['name'];
    req.user = buildUser(
      claims.uid,
      parseGroups(claims['groups']),
      claims.email,
      typeof name === 'string' ? name : undefined
    );
    log.info({ requestId, uid: claims.uid }, 'authenticated via firebase');
    return next();
  } catch (err) {
    log.error({ requestId, err: toError(err) }, 'unexpected auth error');
    return unauthorized(res);
  }
}
