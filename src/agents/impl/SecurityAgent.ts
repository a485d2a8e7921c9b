import { AbstractAgent, GuidanceRule } from '../core/AbstractAgent';
import { AgentRequest } from '../core/AgentRequest';
import { AgentResponse } from '../core/AgentResponse';
import { AgentType } from '../core/AgentType';
import { Permission, Permissions, Role, Roles } from '../core/Permissions';
import { SecurityDomainContext } from '../context/SecurityDomainContext';

/**
 * Security reviews are restricted to administrators.
 */
export class SecurityAgent extends AbstractAgent<SecurityDomainContext> {
  constructor() {
    super(AgentType.SECURITY, [
      'security-analysis',
      'vulnerability-assessment',
      'authentication',
      'authorization',
      'encryption',
    ], 'security');
  }

  protected handle(request: AgentRequest): AgentResponse {
    return this.guidance('Security recommendation: ', request);
  }

  getRequiredRoles(): Role[] {
    return [Roles.ADMIN];
  }

  getRequiredPermissions(): Permission[] {
    return [Permissions.AGENT_ADMIN, Permissions.SECURITY_VALIDATE];
  }

  protected createContext(sessionId: string): SecurityDomainContext {
    return SecurityDomainContext.builder().sessionId(sessionId).requestId(sessionId).build();
  }

  protected guidanceRules(): readonly GuidanceRule<SecurityDomainContext>[] {
    return [
      { keywords: ['oauth'], apply: (ctx) => ctx.addAuthenticationMethod('oauth2') },
      { keywords: ['jwt'], apply: (ctx) => ctx.addAuthenticationMethod('jwt') },
      { keywords: ['mtls', 'mutual tls'], apply: (ctx) => ctx.addAuthenticationMethod('mtls') },
      { keywords: ['aes'], apply: (ctx) => ctx.addEncryptionStandard('aes-256') },
      { keywords: ['tls 1.3', 'tls13'], apply: (ctx) => ctx.addEncryptionStandard('tls-1.3') },
    ];
  }
}
