import { Permission, Role, toPermissions, toRoles } from '../core/Permissions';
import { Logger } from '../../utils/logger';
import { getErrorMessage } from '../../utils/errorUtils';
import { SecurityPayload, decodeSecurityToken, encodeSecurityToken } from './TokenCodec';

interface SecurityContextFields {
  jwtToken: string;
  userId?: string;
  roles: Role[];
  permissions: Permission[];
  serviceId?: string;
  serviceType?: string;
}

/**
 * Caller identity attached to every agent request: a signed bearer token
 * plus the claims it carries.
 */
export class SecurityContext {
  readonly jwtToken: string;
  readonly userId?: string;
  readonly serviceId?: string;
  readonly serviceType?: string;
  private readonly roles: readonly Role[];
  private readonly permissions: readonly Permission[];

  private constructor(fields: SecurityContextFields) {
    this.jwtToken = fields.jwtToken;
    this.userId = fields.userId;
    this.roles = Object.freeze([...fields.roles]);
    this.permissions = Object.freeze([...fields.permissions]);
    this.serviceId = fields.serviceId;
    this.serviceType = fields.serviceType;
  }

  static builder(): SecurityContextBuilder {
    return new SecurityContextBuilder();
  }

  /**
   * Rebuild a context from a bearer token alone.
   */
  static fromToken(token: string): SecurityContext {
    return SecurityContext.builder().jwtToken(token).build();
  }

  /** @internal used by the builder */
  static fromFields(fields: SecurityContextFields): SecurityContext {
    return new SecurityContext(fields);
  }

  getRoles(): Role[] {
    return [...this.roles];
  }

  getPermissions(): Permission[] {
    return [...this.permissions];
  }

  hasRole(role: string): boolean {
    const wanted = role.toUpperCase();
    return this.roles.some((r) => r === wanted);
  }

  hasPermission(permission: string): boolean {
    const wanted = permission.toUpperCase();
    return this.permissions.some((p) => p === wanted);
  }
}

/**
 * Builds a {@link SecurityContext}.
 *
 * - claims without a token: a fresh token is signed for them
 * - a verifiable token: unset claims are filled from it; the token is
 *   re-signed only when explicit claims were supplied
 * - a token that fails verification: kept verbatim together with the
 *   explicit claims, so validation rejects it later
 */
export class SecurityContextBuilder {
  private token?: string;
  private userIdValue?: string;
  private rolesValue?: Role[];
  private permissionsValue?: Permission[];
  private serviceIdValue?: string;
  private serviceTypeValue?: string;

  jwtToken(token: string | null | undefined): this {
    if (token !== null && token !== undefined) this.token = token;
    return this;
  }

  userId(userId: string | null | undefined): this {
    if (userId) this.userIdValue = userId;
    return this;
  }

  /** Unknown role names are dropped. */
  roles(roles: readonly string[] | null | undefined): this {
    if (roles) this.rolesValue = toRoles(roles);
    return this;
  }

  /** Unknown permission names are dropped. */
  permissions(permissions: readonly string[] | null | undefined): this {
    if (permissions) this.permissionsValue = toPermissions(permissions);
    return this;
  }

  serviceId(serviceId: string | null | undefined): this {
    if (serviceId) this.serviceIdValue = serviceId;
    return this;
  }

  serviceType(serviceType: string | null | undefined): this {
    if (serviceType) this.serviceTypeValue = serviceType;
    return this;
  }

  build(): SecurityContext {
    const hasExplicitClaims =
      this.userIdValue !== undefined ||
      this.rolesValue !== undefined ||
      this.permissionsValue !== undefined ||
      this.serviceIdValue !== undefined ||
      this.serviceTypeValue !== undefined;

    if (this.token === undefined || !this.token.trim()) {
      if (!hasExplicitClaims) {
        return SecurityContext.fromFields({ jwtToken: this.token ?? '', roles: [], permissions: [] });
      }
      return this.signed(this.explicitPayload());
    }

    const decoded = this.tryDecode(this.token);
    if (!decoded) {
      return SecurityContext.fromFields({
        jwtToken: this.token,
        ...this.explicitPayload(),
      });
    }

    const merged = {
      userId: this.userIdValue ?? decoded.userId,
      roles: this.rolesValue ?? toRoles(decoded.roles),
      permissions: this.permissionsValue ?? toPermissions(decoded.permissions),
      serviceId: this.serviceIdValue ?? decoded.serviceId,
      serviceType: this.serviceTypeValue ?? decoded.serviceType,
    };

    if (hasExplicitClaims) {
      return this.signed(merged);
    }
    return SecurityContext.fromFields({ jwtToken: this.token, ...merged });
  }

  private explicitPayload(): Omit<SecurityContextFields, 'jwtToken'> {
    return {
      userId: this.userIdValue,
      roles: this.rolesValue ?? [],
      permissions: this.permissionsValue ?? [],
      serviceId: this.serviceIdValue,
      serviceType: this.serviceTypeValue,
    };
  }

  private signed(fields: Omit<SecurityContextFields, 'jwtToken'>): SecurityContext {
    return SecurityContext.fromFields({ ...fields, jwtToken: encodeSecurityToken(fields) });
  }

  private tryDecode(token: string): SecurityPayload | undefined {
    try {
      return decodeSecurityToken(token);
    } catch (error) {
      Logger.debug('Security token could not be verified; keeping it unverified', {
        reason: getErrorMessage(error),
      });
      return undefined;
    }
  }
}
