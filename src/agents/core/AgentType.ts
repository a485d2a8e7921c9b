/**
 * Catalogue of agent specialisations.
 */
export const AgentType = {
  ARCHITECTURE: 'ARCHITECTURE',
  IMPLEMENTATION: 'IMPLEMENTATION',
  DEPLOYMENT: 'DEPLOYMENT',
  TESTING: 'TESTING',
  SECURITY: 'SECURITY',
  OBSERVABILITY: 'OBSERVABILITY',
  DOCUMENTATION: 'DOCUMENTATION',
  BUSINESS_DOMAIN: 'BUSINESS_DOMAIN',
  INTEGRATION_GATEWAY: 'INTEGRATION_GATEWAY',
  PAIR_PROGRAMMING: 'PAIR_PROGRAMMING',
  EVENT_DRIVEN_ARCHITECTURE: 'EVENT_DRIVEN_ARCHITECTURE',
  CICD_PIPELINE: 'CICD_PIPELINE',
  CONFIGURATION_MANAGEMENT: 'CONFIGURATION_MANAGEMENT',
  RESILIENCE_ENGINEERING: 'RESILIENCE_ENGINEERING',
  PERFORMANCE: 'PERFORMANCE',
  STORY_STRENGTHENING: 'STORY_STRENGTHENING',
} as const;

export type AgentType = typeof AgentType[keyof typeof AgentType];

export interface AgentTypeInfo {
  displayName: string;
  description: string;
}

export const AGENT_TYPE_INFO: Record<AgentType, AgentTypeInfo> = {
  ARCHITECTURE: { displayName: 'Architecture Agent', description: 'System design and architectural guidance' },
  IMPLEMENTATION: { displayName: 'Implementation Agent', description: 'Code implementation and development' },
  DEPLOYMENT: { displayName: 'Deployment Agent', description: 'Deployment and infrastructure management' },
  TESTING: { displayName: 'Testing Agent', description: 'Testing strategy and implementation' },
  SECURITY: { displayName: 'Security Agent', description: 'Security best practices and compliance' },
  OBSERVABILITY: { displayName: 'Observability Agent', description: 'Monitoring and observability setup' },
  DOCUMENTATION: { displayName: 'Documentation Agent', description: 'Documentation generation and maintenance' },
  BUSINESS_DOMAIN: { displayName: 'Business Domain Agent', description: 'Business logic and domain validation' },
  INTEGRATION_GATEWAY: { displayName: 'Integration Gateway Agent', description: 'API gateway and integration patterns' },
  PAIR_PROGRAMMING: { displayName: 'Pair Programming Navigator Agent', description: 'Code review and pair programming' },
  EVENT_DRIVEN_ARCHITECTURE: { displayName: 'Event-Driven Architecture Agent', description: 'Event-driven patterns and messaging' },
  CICD_PIPELINE: { displayName: 'CI/CD Pipeline Agent', description: 'Continuous integration and deployment' },
  CONFIGURATION_MANAGEMENT: { displayName: 'Configuration Management Agent', description: 'Configuration and secrets management' },
  RESILIENCE_ENGINEERING: { displayName: 'Resilience Engineering Agent', description: 'Reliability and resilience patterns' },
  PERFORMANCE: { displayName: 'Performance Agent', description: 'Performance testing and tuning' },
  STORY_STRENGTHENING: { displayName: 'Story Strengthening Agent', description: 'Requirements refinement into EARS and Gherkin' },
};

const AGENT_TYPES: readonly AgentType[] = Object.values(AgentType);

export function isAgentType(value: string): value is AgentType {
  return AGENT_TYPES.some((type) => type === value);
}

/**
 * Resolve a loosely written name ("cicd-pipeline", "Event Driven Architecture")
 * to an agent type. Returns undefined when nothing matches.
 */
export function agentTypeFromString(value: string | null | undefined): AgentType | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toUpperCase().replace(/[-\s]+/g, '_');
  return isAgentType(normalized) ? normalized : undefined;
}
