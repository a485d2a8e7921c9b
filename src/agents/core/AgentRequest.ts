import { AgentContext } from '../context/AgentContext';
import { SecurityContext } from '../security/SecurityContext';
import { AgentFrameworkError, FrameworkErrorCodes } from '../../utils/errorUtils';

export const RequestPriority = {
  LOW: 'LOW',
  NORMAL: 'NORMAL',
  HIGH: 'HIGH',
  URGENT: 'URGENT',
} as const;

export type RequestPriority = typeof RequestPriority[keyof typeof RequestPriority];

/**
 * Envelope routed by the agent manager. The context's `domain` selects the
 * agent; the security context authenticates the caller.
 */
export class AgentRequest {
  readonly type: string;
  readonly description: string;
  readonly agentContext: AgentContext;
  readonly securityContext: SecurityContext;
  readonly priority: RequestPriority;
  readonly requireTls13: boolean;

  private constructor(builder: AgentRequestBuilder, agentContext: AgentContext, securityContext: SecurityContext) {
    this.type = builder.typeValue;
    this.agentContext = agentContext;
    this.securityContext = securityContext;
    this.description = builder.descriptionValue ?? agentContext.getDescription() ?? '';
    this.priority = builder.priorityValue;
    this.requireTls13 = builder.requireTls13Value;
  }

  static builder(): AgentRequestBuilder {
    return new AgentRequestBuilder();
  }

  /** @internal used by the builder */
  static fromBuilder(builder: AgentRequestBuilder, agentContext: AgentContext, securityContext: SecurityContext): AgentRequest {
    return new AgentRequest(builder, agentContext, securityContext);
  }

  get domain(): string {
    return this.agentContext.domain;
  }

  get sessionId(): string {
    return this.agentContext.sessionId;
  }
}

export class AgentRequestBuilder {
  typeValue = 'consultation';
  descriptionValue?: string;
  priorityValue: RequestPriority = RequestPriority.NORMAL;
  requireTls13Value = false;
  private agentContextValue?: AgentContext;
  private securityContextValue?: SecurityContext;

  type(type: string): this {
    this.typeValue = type;
    return this;
  }

  description(description: string): this {
    this.descriptionValue = description;
    return this;
  }

  agentContext(context: AgentContext): this {
    this.agentContextValue = context;
    return this;
  }

  securityContext(context: SecurityContext): this {
    this.securityContextValue = context;
    return this;
  }

  priority(priority: RequestPriority): this {
    this.priorityValue = priority;
    return this;
  }

  requireTls13(required: boolean): this {
    this.requireTls13Value = required;
    return this;
  }

  /**
   * @throws AgentFrameworkError (MISSING_FIELD) without an agent or security context
   */
  build(): AgentRequest {
    if (!this.agentContextValue) {
      throw new AgentFrameworkError(FrameworkErrorCodes.MISSING_FIELD, 'agentContext is required');
    }
    if (!this.securityContextValue) {
      throw new AgentFrameworkError(FrameworkErrorCodes.MISSING_FIELD, 'securityContext is required');
    }
    return AgentRequest.fromBuilder(this, this.agentContextValue, this.securityContextValue);
  }
}
