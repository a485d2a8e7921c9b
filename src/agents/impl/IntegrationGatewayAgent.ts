import { AbstractAgent } from '../core/AbstractAgent';
import { AgentRequest } from '../core/AgentRequest';
import { AgentResponse } from '../core/AgentResponse';
import { AgentType } from '../core/AgentType';
import { Permission, Permissions } from '../core/Permissions';
import { ArchitectureContext } from '../context/ArchitectureContext';

export class IntegrationGatewayAgent extends AbstractAgent<ArchitectureContext> {
  constructor() {
    super(AgentType.INTEGRATION_GATEWAY, [
      'api-integration',
      'service-integration',
      'data-mapping',
      'integration-patterns',
      'gateway-design',
    ], 'integration');
  }

  protected handle(request: AgentRequest): AgentResponse {
    return this.guidance('Integration guidance: ', request);
  }

  getRequiredPermissions(): Permission[] {
    return [
      Permissions.SERVICE_READ,
      Permissions.SERVICE_WRITE,
      Permissions.AGENT_READ,
      Permissions.AGENT_WRITE,
    ];
  }

  protected createContext(sessionId: string): ArchitectureContext {
    return ArchitectureContext.builder().sessionId(sessionId).requestId(sessionId).build();
  }
}
