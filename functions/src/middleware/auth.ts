import type { NextFunction, Request, RequestHandler, Response } from 'express';
import * as logger from 'firebase-functions/logger';
import jwt, { type JwtPayload } from 'jsonwebtoken';
import { describeError, ForbiddenError, UnauthorizedError } from '../errors';

export interface Principal {
  userId: string;
  isAdmin: boolean;
}

declare global {
  namespace Express {
    interface Request {
      principal?: Principal;
    }
  }
}

export interface CredentialService {
  /** Returns null when the token is not valid. */
  resolvePrincipal(token: string): Principal | null;
}

export class JwtCredentialService implements CredentialService {
  constructor(private readonly secret: string) {}

  resolvePrincipal(token: string): Principal | null {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.secret, { algorithms: ['HS256'] });
    } catch (error) {
      logger.debug('Rejected bearer token', { error: describeError(error) });
      return null;
    }

    if (typeof payload === 'string' || typeof payload.sub !== 'string' || payload.sub.trim().length === 0) {
      return null;
    }
    return {
      userId: payload.sub,
      isAdmin: payload.admin === true,
    };
  }
}

export const validateApiKey = (apiKey: string | null): RequestHandler => (req: Request, res: Response, next: NextFunction): void => {
  if (!apiKey) {
    logger.error('API_KEY is not configured');
    res.status(500).json({
      error: 'Internal Server Error',
      message: 'API key not configured',
    });
    return;
  }

  const provided = req.headers['x-api-key'] ?? req.query.apiKey;
  if (typeof provided !== 'string' || provided !== apiKey) {
    res.status(403).json({
      error: 'Forbidden',
      message: 'Invalid or missing API key',
    });
    return;
  }

  next();
};

export const authenticate = (credentials: CredentialService): RequestHandler => (req: Request, _res: Response, next: NextFunction): void => {
  const header = req.headers.authorization;
  const match = typeof header === 'string' ? /^Bearer\s+(.+)$/i.exec(header.trim()) : null;
  const principal = match ? credentials.resolvePrincipal(match[1]) : null;

  if (!principal) {
    next(new UnauthorizedError());
    return;
  }

  req.principal = principal;
  next();
};

export const requireAdmin = (req: Request, _res: Response, next: NextFunction): void => {
  if (!req.principal?.isAdmin) {
    next(new ForbiddenError('Admin access required'));
    return;
  }
  next();
};

/** The authenticated caller. Only valid behind `authenticate`. */
export function currentPrincipal(req: Request): Principal {
  if (!req.principal) {
    throw new UnauthorizedError();
  }
  return req.principal;
}
