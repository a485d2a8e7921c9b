import { Agent } from '../core/Agent';
import { AgentRequest } from '../core/AgentRequest';
import { env } from '../../config/env';
import { Logger } from '../../utils/logger';
import { getErrorMessage } from '../../utils/errorUtils';
import { SecurityContext } from './SecurityContext';
import { SecurityValidator } from './SecurityValidator';
import { SecurityPayload, decodeSecurityToken, tokenExpiresAt } from './TokenCodec';

const UNKNOWN_USER = 'unknown';

function isBlank(value: string | undefined): boolean {
  return !value || !value.trim();
}

interface CachedToken {
  payload: SecurityPayload;
  expiresAt?: number;
}

/**
 * Validates against the claims inside the signed token, not the claims the
 * caller put on the context object. Decoded tokens are cached until they
 * expire; once the cache is full the oldest entry is evicted.
 */
export class DefaultSecurityValidator implements SecurityValidator {
  private readonly tokenCache = new Map<string, CachedToken>();

  constructor(private readonly maxCacheSize: number = env.AGENT_TOKEN_CACHE_SIZE) {}

  extractUserId(request: AgentRequest | null | undefined): string {
    const securityContext = request?.securityContext;
    if (!securityContext) return UNKNOWN_USER;
    if (securityContext.userId && !isBlank(securityContext.userId)) return securityContext.userId;

    const payload = this.decodeWithCache(securityContext.jwtToken);
    return payload?.userId && !isBlank(payload.userId) ? payload.userId : UNKNOWN_USER;
  }

  validateSecurityContext(securityContext: SecurityContext | null | undefined): boolean {
    if (!securityContext || isBlank(securityContext.jwtToken)) {
      return false;
    }

    const payload = this.decodeWithCache(securityContext.jwtToken);
    if (!payload) return false;

    return (
      !isBlank(payload.userId) &&
      payload.roles.length > 0 &&
      payload.permissions.length > 0 &&
      !isBlank(payload.serviceId) &&
      !isBlank(payload.serviceType)
    );
  }

  /**
   * Any one required role or permission is enough. Agents that declare no
   * requirements are open to every authenticated caller.
   */
  validateAuthorization(request: AgentRequest, agent: Agent): boolean {
    const requiredRoles = agent.getRequiredRoles();
    const requiredPermissions = agent.getRequiredPermissions();

    if (requiredRoles.length === 0 && requiredPermissions.length === 0) {
      return true;
    }

    const securityContext = request.securityContext;
    return (
      requiredRoles.some((role) => this.hasRole(securityContext, role)) ||
      requiredPermissions.some((permission) => this.hasPermission(securityContext, permission))
    );
  }

  hasRole(securityContext: SecurityContext, role: string): boolean {
    const payload = this.decodeWithCache(securityContext.jwtToken);
    const wanted = role.toLowerCase();
    return payload?.roles.some((r) => r.toLowerCase() === wanted) ?? false;
  }

  hasPermission(securityContext: SecurityContext, permission: string): boolean {
    const payload = this.decodeWithCache(securityContext.jwtToken);
    const wanted = permission.toLowerCase();
    return payload?.permissions.some((p) => p.toLowerCase() === wanted) ?? false;
  }

  clearCache(): void {
    this.tokenCache.clear();
  }

  get cacheSize(): number {
    return this.tokenCache.size;
  }

  private decodeWithCache(token: string): SecurityPayload | undefined {
    if (isBlank(token)) return undefined;

    const cached = this.tokenCache.get(token);
    if (cached) {
      if (cached.expiresAt === undefined || cached.expiresAt > Date.now()) return cached.payload;
      this.tokenCache.delete(token);
    }

    let payload: SecurityPayload;
    try {
      payload = decodeSecurityToken(token);
    } catch (error) {
      Logger.debug('Rejected security token', { reason: getErrorMessage(error) });
      return undefined;
    }

    if (this.tokenCache.size >= this.maxCacheSize) {
      const oldest = this.tokenCache.keys().next();
      if (!oldest.done) this.tokenCache.delete(oldest.value);
    }
    this.tokenCache.set(token, { payload, expiresAt: tokenExpiresAt(token) });
    return payload;
  }
}
