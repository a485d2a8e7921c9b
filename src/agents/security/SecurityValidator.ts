import { Agent } from '../core/Agent';
import { AgentRequest } from '../core/AgentRequest';
import { SecurityContext } from './SecurityContext';

/**
 * Authentication and authorization checks applied by the agent manager.
 */
export interface SecurityValidator {
  /** Caller id for audit lines; `unknown` when absent. */
  extractUserId(request: AgentRequest | null | undefined): string;
  validateSecurityContext(securityContext: SecurityContext | null | undefined): boolean;
  validateAuthorization(request: AgentRequest, agent: Agent): boolean;
  hasRole(securityContext: SecurityContext, role: string): boolean;
  hasPermission(securityContext: SecurityContext, permission: string): boolean;
}
