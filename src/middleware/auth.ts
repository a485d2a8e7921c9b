import { Request, Response, NextFunction } from 'express';
import { SecurityContext } from '../agents/security/SecurityContext';
import { SecurityValidator } from '../agents/security/SecurityValidator';
import ApiResponse from '../utils/ApiResponse';

export interface AgentAuthRequest extends Request {
  securityContext?: SecurityContext;
}

/**
 * Attaches the caller's security context built from the bearer token.
 * Only the token's presence is checked here; the agent manager validates it
 * so that rejected attempts land in the audit trail.
 */
export function attachSecurityContext(req: AgentAuthRequest, res: Response, next: NextFunction): void {
  const token = extractToken(req);
  if (!token) {
    ApiResponse.unauthorized(res, 'Authentication required');
    return;
  }

  req.securityContext = SecurityContext.fromToken(token);
  next();
}

/**
 * Stricter variant for routes that do not go through the agent manager:
 * the token must verify and carry a complete set of claims.
 */
export function requireValidSecurityContext(validator: SecurityValidator) {
  return (req: AgentAuthRequest, res: Response, next: NextFunction): void => {
    const token = extractToken(req);
    if (!token) {
      ApiResponse.unauthorized(res, 'Authentication required');
      return;
    }

    const securityContext = SecurityContext.fromToken(token);
    if (!validator.validateSecurityContext(securityContext)) {
      ApiResponse.unauthorized(res, 'Invalid token');
      return;
    }

    req.securityContext = securityContext;
    next();
  };
}

/**
 * Extracts the token from `Authorization: Bearer <token>` or the `token` cookie.
 */
export function extractToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith('Bearer ')) {
    return authHeader.substring(7);
  }

  const cookieToken: unknown = req.cookies?.token;
  if (typeof cookieToken === 'string' && cookieToken) {
    return cookieToken;
  }

  return null;
}
