import { Agent } from '../core/Agent';
import { AgentDiscoveryStrategy } from './AgentDiscoveryStrategy';

/**
 * Last resort: the first healthy agent.
 */
export class HealthBasedDiscoveryStrategy implements AgentDiscoveryStrategy {
  readonly name = 'health';
  readonly priority = 10;

  canHandle(): boolean {
    return true;
  }

  async discoverBestAgent(_request: unknown, availableAgents: readonly Agent[]): Promise<Agent | undefined> {
    return availableAgents.find((agent) => agent.isHealthy());
  }

  filterHealthyAgents(agents: readonly Agent[]): Agent[] {
    return agents.filter((agent) => agent.isHealthy());
  }
}
