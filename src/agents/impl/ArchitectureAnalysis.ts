/**
 * Rule-based architecture review: picks patterns for a system type and
 * scale, then layers recommendations and trade-offs for the stated
 * requirements and constraints.
 */

export interface ArchitectureInput {
  description: string;
  systemType: string;
  currentPatterns: readonly string[];
  requirements: readonly string[];
  constraints: Readonly<Record<string, unknown>>;
  targetScale: string;
}

export interface ArchitectureAnalysis {
  summary: string;
  confidence: number;
  recommendations: string[];
  patternsEvaluated: string[];
  tradeOffs: string[];
}

const SYSTEM_PATTERNS: Record<string, readonly string[]> = {
  microservices: ['API Gateway', 'Service Discovery', 'Circuit Breaker', 'Event Sourcing', 'CQRS', 'Saga Pattern'],
  monolith: ['Layered Architecture', 'Repository Pattern', 'Domain-Driven Design', 'CQRS'],
  serverless: ['Function as a Service', 'Event-Driven Architecture', 'Backend for Frontend', 'Strangler Fig'],
  'event-driven': ['Event Sourcing', 'CQRS', 'Saga Pattern', 'Publish-Subscribe', 'Event Streaming'],
};

const DEFAULT_PATTERNS = ['Layered Architecture', 'Repository Pattern', 'MVC'];
const LARGE_SCALE_PATTERNS = ['Service Mesh', 'API Gateway', 'Distributed Tracing'];

const SYSTEM_RATIONALE: Record<string, string> = {
  microservices: 'enables independent deployment, scaling, and technology diversity',
  monolith: 'simplifies development, deployment, and operations for smaller teams',
  serverless: 'optimizes cost with pay-per-use and eliminates infrastructure management',
  'event-driven': 'provides loose coupling, scalability, and real-time processing capabilities',
};

const PATTERN_BENEFITS: Record<string, string> = {
  'API Gateway': 'centralized API management and security',
  'Service Discovery': 'dynamic service location and load balancing',
  'Circuit Breaker': 'fault tolerance and graceful degradation',
  'Event Sourcing': 'complete audit trail and temporal queries',
  CQRS: 'optimized read/write performance',
  'Saga Pattern': 'distributed transaction management',
  'Service Mesh': 'traffic management and security',
  'Repository Pattern': 'data access abstraction',
  'Domain-Driven Design': 'business logic organization',
};

export function recommendPatterns(systemType: string, targetScale: string): string[] {
  const patterns = [...(SYSTEM_PATTERNS[systemType.toLowerCase()] ?? DEFAULT_PATTERNS)];
  const scale = targetScale.toLowerCase();
  if (scale === 'enterprise' || scale === 'large') {
    patterns.push(...LARGE_SCALE_PATTERNS);
  }
  return [...new Set(patterns)];
}

/**
 * 0.7 base, +0.1 for a known system type, +0.05 per requirement (up to 3),
 * +0.05 when constraints are given; capped at 0.95.
 */
export function architectureConfidence(
  systemType: string,
  requirements: readonly string[],
  constraints: Readonly<Record<string, unknown>>
): number {
  let confidence = 0.7;
  if (systemType !== 'unknown') confidence += 0.1;
  confidence += 0.05 * Math.min(requirements.length, 3);
  if (Object.keys(constraints).length > 0) confidence += 0.05;
  return Math.min(confidence, 0.95);
}

export function analyzeArchitecture(input: ArchitectureInput): ArchitectureAnalysis {
  const { description, systemType, currentPatterns, requirements, constraints, targetScale } = input;
  const patterns = recommendPatterns(systemType, targetScale);
  const recommendations: string[] = [];
  const tradeOffs: string[] = [];

  const rationale = SYSTEM_RATIONALE[systemType.toLowerCase()] ?? 'provides a solid foundation for application development';
  recommendations.push(`Implement ${systemType} architecture for ${description} to ${rationale}`);

  for (const pattern of patterns) {
    if (!currentPatterns.includes(pattern)) {
      recommendations.push(`Implement ${pattern} pattern for improved ${PATTERN_BENEFITS[pattern] ?? 'system quality attributes'}`);
    }
  }

  if (requirements.includes('scalability') || requirements.includes('high-availability')) {
    recommendations.push('Implement horizontal scaling with load balancing');
    recommendations.push('Consider distributed caching (Redis/Memcached) for performance');
    tradeOffs.push('Scalability vs Complexity: Distributed systems increase operational overhead');
  }
  if (requirements.includes('performance')) {
    recommendations.push('Use async/non-blocking I/O patterns where possible');
    recommendations.push('Implement read replicas for database scalability');
    tradeOffs.push('Performance vs Cost: High-performance infrastructure increases operational costs');
  }
  if (requirements.includes('security')) {
    recommendations.push('Implement API gateway with OAuth2/JWT authentication');
    recommendations.push('Use service mesh for zero-trust network security');
    tradeOffs.push('Security vs Developer Velocity: Additional security layers slow development iteration');
  }

  if (constraints.budget === 'limited') {
    recommendations.push('Consider serverless architecture to optimize costs');
    recommendations.push('Use managed services to reduce operational overhead');
  }
  if (constraints.team_size === 'small') {
    recommendations.push('Prefer monolithic or modular monolith over microservices');
    recommendations.push('Use platform-as-a-service solutions to minimize DevOps burden');
    tradeOffs.push('Team Size vs Architecture Complexity: Small teams struggle with distributed systems');
  }

  switch (targetScale.toLowerCase()) {
    case 'enterprise':
      recommendations.push('Implement comprehensive observability (metrics, logs, traces)');
      recommendations.push('Design for multi-region deployment and disaster recovery');
      tradeOffs.push('Enterprise Scale vs Time-to-Market: Complex infrastructure delays initial delivery');
      break;
    case 'large':
      recommendations.push('Implement event-driven architecture for loose coupling');
      recommendations.push('Use CQRS pattern for read/write optimization');
      break;
    case 'small':
      recommendations.push('Start with simple architecture, plan for evolution');
      recommendations.push('Avoid premature optimization and over-engineering');
      tradeOffs.push('Simplicity vs Future Growth: Simple architectures may require refactoring at scale');
      break;
    default:
      break;
  }

  recommendations.push('Implement health checks and circuit breakers for resilience');
  recommendations.push('Implement automated testing pipeline (unit, integration, performance)');

  let summary = `Architecture Analysis for '${description}':\n\n`;
  summary += `System Type: ${systemType}\n`;
  summary += `Recommended Patterns: ${patterns.join(', ')}\n`;
  if (requirements.length > 0) {
    summary += `Key Requirements: ${requirements.join(', ')}\n`;
  }

  return {
    summary,
    confidence: architectureConfidence(systemType, requirements, constraints),
    recommendations,
    patternsEvaluated: patterns,
    tradeOffs,
  };
}
