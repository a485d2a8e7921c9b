import { Agent } from '../core/Agent';
import { AgentRequest } from '../core/AgentRequest';
import { AgentDiscoveryStrategy, bestScored, discoveryHints } from './AgentDiscoveryStrategy';

/**
 * Picks the agent covering most of the `required-capabilities` property.
 */
export class CapabilityBasedDiscoveryStrategy implements AgentDiscoveryStrategy {
  readonly name = 'capability';
  readonly priority = 40;

  canHandle(request: AgentRequest): boolean {
    return discoveryHints(request).requiredCapabilities.length > 0;
  }

  async discoverBestAgent(request: AgentRequest, availableAgents: readonly Agent[]): Promise<Agent | undefined> {
    const required = new Set(discoveryHints(request).requiredCapabilities);
    return bestScored(
      availableAgents,
      (agent) => agent.getCapabilities().filter((capability) => required.has(capability)).length
    );
  }
}
