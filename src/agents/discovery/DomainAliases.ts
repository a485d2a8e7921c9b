import { AgentType, agentTypeFromString } from '../core/AgentType';

/**
 * Short routing keys accepted in `AgentContext.domain`.
 */
export const DOMAIN_ALIASES: Readonly<Record<string, AgentType>> = {
  architecture: AgentType.ARCHITECTURE,
  implementation: AgentType.IMPLEMENTATION,
  deployment: AgentType.DEPLOYMENT,
  testing: AgentType.TESTING,
  security: AgentType.SECURITY,
  observability: AgentType.OBSERVABILITY,
  monitoring: AgentType.OBSERVABILITY,
  documentation: AgentType.DOCUMENTATION,
  business: AgentType.BUSINESS_DOMAIN,
  integration: AgentType.INTEGRATION_GATEWAY,
  gateway: AgentType.INTEGRATION_GATEWAY,
  'pair-programming': AgentType.PAIR_PROGRAMMING,
  'event-driven': AgentType.EVENT_DRIVEN_ARCHITECTURE,
  events: AgentType.EVENT_DRIVEN_ARCHITECTURE,
  cicd: AgentType.CICD_PIPELINE,
  'ci-cd': AgentType.CICD_PIPELINE,
  pipeline: AgentType.CICD_PIPELINE,
  configuration: AgentType.CONFIGURATION_MANAGEMENT,
  config: AgentType.CONFIGURATION_MANAGEMENT,
  resilience: AgentType.RESILIENCE_ENGINEERING,
  performance: AgentType.PERFORMANCE,
  story: AgentType.STORY_STRENGTHENING,
};

/**
 * Alias first, then any agent type name (`CICD_PIPELINE`, `cicd-pipeline`).
 */
export function agentTypeForDomain(domain: string | null | undefined): AgentType | undefined {
  if (!domain) return undefined;
  const key = domain.trim().toLowerCase();
  return Object.hasOwn(DOMAIN_ALIASES, key) ? DOMAIN_ALIASES[key] : agentTypeFromString(key);
}
