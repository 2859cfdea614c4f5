import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { UnauthorizedError } from '../services/errors';
import type { Namespace, NamespaceResolver } from '../services/namespaces';
import type { SessionRegistry } from '../services/sessions';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      principal?: Namespace;
    }
  }
}

function bearerToken(header: string | undefined) {
  if (!header) return undefined;
  const match = header.match(/^Bearer\s+(\S+)$/i);
  return match ? match[1] : undefined;
}

/**
 * Resolves `Authorization: Bearer <token>` to a username and that user's
 * storage namespace.
 */
export function requireAuth(sessions: SessionRegistry, namespaces: NamespaceResolver): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    let username: string;
    try {
      username = sessions.resolve(bearerToken(req.headers.authorization));
    } catch (error) {
      next(error);
      return;
    }
    namespaces
      .resolve(username)
      .then((namespace) => {
        req.principal = namespace;
        next();
      })
      .catch(next);
  };
}

export function currentNamespace(req: Request): Namespace {
  if (!req.principal) throw new UnauthorizedError();
  return req.principal;
}

/**
 * Forwards rejected promises from async handlers to the error middleware.
 */
export function asyncHandler(handler: (req: Request, res: Response) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}
