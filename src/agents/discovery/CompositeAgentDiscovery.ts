import { Agent } from '../core/Agent';
import { AgentRequest } from '../core/AgentRequest';
import { Logger } from '../../utils/logger';
import { AgentDiscoveryStrategy } from './AgentDiscoveryStrategy';
import { CapabilityBasedDiscoveryStrategy } from './CapabilityBasedDiscoveryStrategy';
import { DomainBasedDiscoveryStrategy } from './DomainBasedDiscoveryStrategy';
import { HealthBasedDiscoveryStrategy } from './HealthBasedDiscoveryStrategy';
import { ObjectiveBasedDiscoveryStrategy } from './ObjectiveBasedDiscoveryStrategy';
import { ServiceAgentMapping } from './ServiceAgentMapping';

export interface DiscoveryResult {
  agent: Agent;
  strategy: string;
}

export interface AgentDiscovery {
  discoverBestAgent(request: AgentRequest, availableAgents: readonly Agent[]): Promise<DiscoveryResult | undefined>;
}

/**
 * Runs strategies in priority order over healthy agents only; the first
 * strategy that finds an agent wins.
 */
export class CompositeAgentDiscovery implements AgentDiscovery {
  private readonly strategies: AgentDiscoveryStrategy[] = [];
  private readonly health = new HealthBasedDiscoveryStrategy();

  static withDefaultStrategies(serviceMapping?: ServiceAgentMapping): CompositeAgentDiscovery {
    const discovery = new CompositeAgentDiscovery();
    discovery.registerStrategy(new DomainBasedDiscoveryStrategy(serviceMapping));
    discovery.registerStrategy(new ObjectiveBasedDiscoveryStrategy());
    discovery.registerStrategy(new CapabilityBasedDiscoveryStrategy());
    discovery.registerStrategy(new HealthBasedDiscoveryStrategy());
    return discovery;
  }

  registerStrategy(strategy: AgentDiscoveryStrategy): void {
    this.strategies.push(strategy);
    this.strategies.sort((a, b) => b.priority - a.priority);
  }

  getStrategiesByPriority(): AgentDiscoveryStrategy[] {
    return [...this.strategies];
  }

  get strategyCount(): number {
    return this.strategies.length;
  }

  async discoverBestAgent(request: AgentRequest, availableAgents: readonly Agent[]): Promise<DiscoveryResult | undefined> {
    const healthy = this.health.filterHealthyAgents(availableAgents);
    if (healthy.length === 0) return undefined;

    for (const strategy of this.strategies) {
      if (!strategy.canHandle(request)) continue;
      const agent = await strategy.discoverBestAgent(request, healthy);
      if (agent) {
        Logger.debug('Agent discovered', { strategy: strategy.name, agentType: agent.agentType, domain: request.domain });
        return { agent, strategy: strategy.name };
      }
    }
    return undefined;
  }
}
