import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { env } from '../../config/env';
import { AgentFrameworkError, FrameworkErrorCodes, getErrorMessage } from '../../utils/errorUtils';

/**
 * Claims carried by an agent security token.
 */
export interface SecurityPayload {
  userId?: string;
  roles: string[];
  permissions: string[];
  serviceId?: string;
  serviceType?: string;
}

const payloadSchema = z.object({
  userId: z.string().optional(),
  roles: z.array(z.string()).default([]),
  permissions: z.array(z.string()).default([]),
  serviceId: z.string().optional(),
  serviceType: z.string().optional(),
});

/**
 * Sign the claims as an HS256 JWT with the configured secret and issuer.
 */
export function encodeSecurityToken(payload: SecurityPayload): string {
  return jwt.sign(
    {
      userId: payload.userId,
      roles: payload.roles,
      permissions: payload.permissions,
      serviceId: payload.serviceId,
      serviceType: payload.serviceType,
    },
    env.AGENT_JWT_SECRET,
    {
      algorithm: 'HS256',
      issuer: env.AGENT_JWT_ISSUER,
      expiresIn: env.AGENT_JWT_EXPIRES_IN_SECONDS,
    }
  );
}

/**
 * Verify signature, issuer and expiry, then parse the claims.
 *
 * @throws AgentFrameworkError (TOKEN_INVALID) for blank, forged, expired or malformed tokens
 */
export function decodeSecurityToken(token: string): SecurityPayload {
  if (!token || !token.trim()) {
    throw new AgentFrameworkError(FrameworkErrorCodes.TOKEN_INVALID, 'Token cannot be blank');
  }

  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, env.AGENT_JWT_SECRET, {
      algorithms: ['HS256'],
      issuer: env.AGENT_JWT_ISSUER,
    });
  } catch (error) {
    throw new AgentFrameworkError(FrameworkErrorCodes.TOKEN_INVALID, `Invalid token: ${getErrorMessage(error)}`);
  }

  const parsed = payloadSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new AgentFrameworkError(FrameworkErrorCodes.TOKEN_INVALID, 'Invalid token payload');
  }

  return parsed.data;
}

/**
 * Expiry of a token in epoch milliseconds, read without verification.
 * Undefined when the token carries no `exp` claim.
 */
export function tokenExpiresAt(token: string): number | undefined {
  const decoded = jwt.decode(token, { json: true });
  return typeof decoded?.exp === 'number' ? decoded.exp * 1000 : undefined;
}
