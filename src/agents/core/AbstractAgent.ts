import { Agent } from './Agent';
import { AgentRequest } from './AgentRequest';
import { AgentResponse } from './AgentResponse';
import { AgentStatus } from './AgentStatus';
import { AGENT_TYPE_INFO, AgentType } from './AgentType';
import { Permission, Permissions, Role } from './Permissions';
import { AgentContext } from '../context/AgentContext';
import { Logger } from '../../utils/logger';
import { getErrorMessage } from '../../utils/errorUtils';

export const DEFAULT_RECOMMENDATIONS: readonly string[] = Object.freeze([
  'implement pattern',
  'configure system',
  'add monitoring',
]);

export const DEFAULT_CONFIDENCE = 0.8;

/**
 * Guidance keyword and the context update it triggers.
 */
export interface GuidanceRule<C extends AgentContext> {
  keywords: readonly string[];
  apply(context: C): void;
}

/**
 * Base class for all agents.
 *
 * `processRequest` is a template method: it validates the request, hands it
 * to `handle()`, turns thrown errors into FAILURE responses and stamps the
 * processing time. Subclasses only supply domain logic.
 */
export abstract class AbstractAgent<C extends AgentContext = AgentContext> implements Agent {
  readonly agentType: AgentType;
  private readonly capabilities: readonly string[];
  private readonly technicalDomain: string;
  private readonly contexts = new Map<string, C>();
  private status: AgentStatus = AgentStatus.PENDING;
  private healthy = true;

  protected constructor(agentType: AgentType, capabilities: readonly string[], technicalDomain: string) {
    this.agentType = agentType;
    this.capabilities = Object.freeze([...capabilities]);
    this.technicalDomain = technicalDomain;
  }

  async processRequest(request: AgentRequest | null | undefined): Promise<AgentResponse> {
    const startedAt = Date.now();
    const validationError = this.validateRequest(request);

    let response: AgentResponse;
    if (validationError || !request) {
      response = AgentResponse.failure(validationError ?? 'Invalid request: request is null');
    } else {
      try {
        response = await this.handle(request);
      } catch (error) {
        const message = getErrorMessage(error);
        Logger.agent(this.agentType, 'Request handling failed', { error: message });
        response = AgentResponse.failure(`Internal error: ${message}`);
      }
    }

    this.status = response.status;
    return response
      .toBuilder()
      .agentType(this.agentType)
      .processingTimeMs(Date.now() - startedAt)
      .build();
  }

  /**
   * Returns an error message, or undefined when the request is acceptable.
   */
  protected validateRequest(request: AgentRequest | null | undefined): string | undefined {
    if (!request) {
      return 'Invalid request: request is null';
    }
    if (!request.description || !request.description.trim()) {
      return 'Invalid request: description is required';
    }
    if (!request.agentContext) {
      return 'Invalid request: context is required';
    }
    if (!request.type || request.type.includes('invalid')) {
      return 'Invalid request: invalid type';
    }
    return undefined;
  }

  protected abstract handle(request: AgentRequest): Promise<AgentResponse> | AgentResponse;

  protected abstract createContext(sessionId: string): C;

  /** Keyword rules used by {@link updateContext}. */
  protected guidanceRules(): readonly GuidanceRule<C>[] {
    return [];
  }

  /**
   * Standard SUCCESS response: `<prefix><description>` with the default
   * confidence and recommendations.
   */
  protected guidance(prefix: string, request: AgentRequest): AgentResponse {
    return AgentResponse.success(`${prefix}${request.description}`, DEFAULT_CONFIDENCE, DEFAULT_RECOMMENDATIONS);
  }

  getStatus(): AgentStatus {
    return this.status;
  }

  isHealthy(): boolean {
    return this.healthy;
  }

  setHealthy(healthy: boolean): void {
    this.healthy = healthy;
  }

  getCapabilities(): string[] {
    return [...this.capabilities];
  }

  getTechnicalDomain(): string {
    return this.technicalDomain;
  }

  getRequiredRoles(): Role[] {
    return [];
  }

  getRequiredPermissions(): Permission[] {
    return [Permissions.AGENT_READ];
  }

  generateOutput(query: string): string {
    return `${AGENT_TYPE_INFO[this.agentType].displayName} guidance:\n\nFor query: ${query}\n`;
  }

  getOrCreateContext(sessionId: string): C {
    let context = this.contexts.get(sessionId);
    if (!context) {
      context = this.createContext(sessionId);
      this.contexts.set(sessionId, context);
    }
    return context;
  }

  /**
   * Scans guidance text (case-insensitive) and applies every matching rule
   * to the session's context.
   */
  updateContext(sessionId: string, guidance: string): void {
    const text = guidance.toLowerCase();
    const context = this.getOrCreateContext(sessionId);
    for (const rule of this.guidanceRules()) {
      if (rule.keywords.some((keyword) => text.includes(keyword))) {
        rule.apply(context);
      }
    }
  }

  removeContext(sessionId: string): boolean {
    return this.contexts.delete(sessionId);
  }

  hasContext(sessionId: string): boolean {
    return this.contexts.has(sessionId);
  }
}
