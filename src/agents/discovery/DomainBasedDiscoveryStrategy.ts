import { Agent } from '../core/Agent';
import { AgentRequest } from '../core/AgentRequest';
import { AgentType } from '../core/AgentType';
import { AgentDiscoveryStrategy, discoveryHints } from './AgentDiscoveryStrategy';
import { agentTypeForDomain } from './DomainAliases';
import { ServiceAgentMapping } from './ServiceAgentMapping';

function findByType(agents: readonly Agent[], type: AgentType | undefined): Agent | undefined {
  return type ? agents.find((agent) => agent.agentType === type) : undefined;
}

/**
 * Resolves `domain` in order: alias or agent type name, the service's
 * primary agent, its suggested agents, then an agent with a capability
 * named like the domain.
 */
export class DomainBasedDiscoveryStrategy implements AgentDiscoveryStrategy {
  readonly name = 'domain';
  readonly priority = 100;

  constructor(private readonly serviceMapping: ServiceAgentMapping = new ServiceAgentMapping()) {}

  canHandle(request: AgentRequest): boolean {
    return discoveryHints(request).domain.trim().length > 0;
  }

  async discoverBestAgent(request: AgentRequest, availableAgents: readonly Agent[]): Promise<Agent | undefined> {
    const domain = discoveryHints(request).domain.trim();

    const direct = findByType(availableAgents, agentTypeForDomain(domain));
    if (direct) return direct;

    const primary = findByType(availableAgents, this.serviceMapping.getPrimaryAgent(domain));
    if (primary) return primary;

    for (const suggested of this.serviceMapping.getSuggestedAgents(domain)) {
      const agent = findByType(availableAgents, suggested);
      if (agent) return agent;
    }

    return availableAgents.find((agent) => agent.getCapabilities().includes(domain));
  }
}
