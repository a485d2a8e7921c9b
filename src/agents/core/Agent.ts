import { AgentContext } from '../context/AgentContext';
import { AgentRequest } from './AgentRequest';
import { AgentResponse } from './AgentResponse';
import { AgentStatus } from './AgentStatus';
import { AgentType } from './AgentType';
import { Permission, Role } from './Permissions';

/**
 * Contract every guidance agent fulfils.
 */
export interface Agent {
  readonly agentType: AgentType;

  processRequest(request: AgentRequest): Promise<AgentResponse>;

  /** Status of the last processed request (PENDING before the first). */
  getStatus(): AgentStatus;
  isHealthy(): boolean;

  getCapabilities(): string[];
  /** Primary routing domain, e.g. `cicd`. */
  getTechnicalDomain(): string;
  getRequiredRoles(): Role[];
  getRequiredPermissions(): Permission[];

  generateOutput(query: string): string;

  getOrCreateContext(sessionId: string): AgentContext;
  updateContext(sessionId: string, guidance: string): void;
  removeContext(sessionId: string): boolean;
}
