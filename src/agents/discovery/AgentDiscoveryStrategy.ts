import { Agent } from '../core/Agent';
import { AgentRequest } from '../core/AgentRequest';

export interface AgentDiscoveryStrategy {
  readonly name: string;
  /** Higher runs first. */
  readonly priority: number;
  canHandle(request: AgentRequest): boolean;
  discoverBestAgent(request: AgentRequest, availableAgents: readonly Agent[]): Promise<Agent | undefined>;
}

/**
 * Routing hints read from a request's context.
 */
export interface DiscoveryHints {
  domain: string;
  objective?: string;
  requiredCapabilities: string[];
  sessionId: string;
}

const OBJECTIVE_KEYS = ['objective', 'task', 'goal'] as const;

export function discoveryHints(request: AgentRequest): DiscoveryHints {
  const context = request.agentContext;
  const objective = OBJECTIVE_KEYS
    .map((key) => context.getStringProperty(key))
    .find((value): value is string => Boolean(value && value.trim()));

  return {
    domain: context.domain,
    objective,
    requiredCapabilities: context.getListProperty('required-capabilities'),
    sessionId: context.sessionId,
  };
}

/**
 * Highest positive score wins; ties keep the earlier agent.
 */
export function bestScored(agents: readonly Agent[], score: (agent: Agent) => number): Agent | undefined {
  let best: Agent | undefined;
  let bestScore = 0;
  for (const agent of agents) {
    const value = score(agent);
    if (value > bestScore) {
      best = agent;
      bestScore = value;
    }
  }
  return best;
}
