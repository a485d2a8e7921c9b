import { Agent } from '../core/Agent';
import { AgentRequest } from '../core/AgentRequest';
import { AgentDiscoveryStrategy, bestScored, discoveryHints } from './AgentDiscoveryStrategy';

/**
 * Keyword family → patterns looked for in the objective text. An agent
 * belongs to a family when its domain or one of its capabilities contains
 * the family name.
 */
const OBJECTIVE_PATTERNS: Readonly<Record<string, readonly RegExp[]>> = {
  test: [/test/i, /validation/i, /verify/i, /story/i],
  architecture: [/design/i, /architecture/i, /pattern/i, /system.*design/i],
  security: [/security/i, /authentication/i, /authorization/i, /vulnerability/i],
  performance: [/performance/i, /optimization/i, /latency/i, /throughput/i],
  integration: [/integration/i, /gateway/i, /interop/i, /api.*gateway/i],
};

const POINTS_PER_MATCH = 10;

export function objectiveScore(agent: Agent, objective: string): number {
  const traits = [agent.getTechnicalDomain(), ...agent.getCapabilities()];
  let score = 0;
  for (const [family, patterns] of Object.entries(OBJECTIVE_PATTERNS)) {
    if (!traits.some((trait) => trait.includes(family))) continue;
    score += patterns.filter((pattern) => pattern.test(objective)).length * POINTS_PER_MATCH;
  }
  return score;
}

/**
 * Scores agents against the `objective`, `task` or `goal` property.
 */
export class ObjectiveBasedDiscoveryStrategy implements AgentDiscoveryStrategy {
  readonly name = 'objective';
  readonly priority = 50;

  canHandle(request: AgentRequest): boolean {
    return discoveryHints(request).objective !== undefined;
  }

  async discoverBestAgent(request: AgentRequest, availableAgents: readonly Agent[]): Promise<Agent | undefined> {
    const { objective } = discoveryHints(request);
    if (!objective) return undefined;
    return bestScored(availableAgents, (agent) => objectiveScore(agent, objective));
  }
}
