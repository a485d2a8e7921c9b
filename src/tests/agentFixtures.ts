import { AgentContext } from '../agents/context/AgentContext';
import { DefaultContext } from '../agents/context/DefaultContext';
import { AgentRequest } from '../agents/core/AgentRequest';
import { SecurityContext } from '../agents/security/SecurityContext';

/**
 * Shared builders for agent and manager tests.
 */

export function securityContext(
  roles: string[] = ['ADMIN'],
  permissions: string[] = ['AGENT_READ', 'AGENT_WRITE']
): SecurityContext {
  return SecurityContext.builder()
    .userId('test-user')
    .roles(roles)
    .permissions(permissions)
    .serviceId('test-service')
    .serviceType('backend')
    .build();
}

export function defaultContext(domain: string, properties: Record<string, unknown> = {}): DefaultContext {
  return DefaultContext.builder().domain(domain).sessionId('session-test').properties(properties).build();
}

export function requestFor(
  context: AgentContext,
  description = 'Design the order service',
  security: SecurityContext = securityContext()
): AgentRequest {
  return AgentRequest.builder()
    .agentContext(context)
    .securityContext(security)
    .description(description)
    .build();
}
