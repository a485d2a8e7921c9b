import { AbstractAgent, GuidanceRule } from '../core/AbstractAgent';
import { AgentRequest } from '../core/AgentRequest';
import { AgentResponse } from '../core/AgentResponse';
import { AgentType } from '../core/AgentType';
import { AgentContext } from '../context/AgentContext';
import { ArchitectureContext } from '../context/ArchitectureContext';
import { CICDContext } from '../context/CICDContext';
import { ConfigurationContext } from '../context/ConfigurationContext';
import { EventDrivenContext } from '../context/EventDrivenContext';
import { ResilienceContext } from '../context/ResilienceContext';
import { analyzeArchitecture } from './ArchitectureAnalysis';

function recordOf(value: unknown): Record<string, unknown> {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

/**
 * Default fallback agent. Besides its own architecture context it keeps the
 * event-driven, CI/CD, configuration and resilience views of each session,
 * so a design conversation can seed the specialised agents.
 */
export class ArchitectureAgent extends AbstractAgent<ArchitectureContext> {
  private readonly eventDrivenContexts = new Map<string, EventDrivenContext>();
  private readonly cicdContexts = new Map<string, CICDContext>();
  private readonly configurationContexts = new Map<string, ConfigurationContext>();
  private readonly resilienceContexts = new Map<string, ResilienceContext>();

  constructor() {
    super(AgentType.ARCHITECTURE, [
      'system-design',
      'pattern-selection',
      'technology-stack',
      'architectural-review',
      'scalability-design',
    ], 'architecture');
  }

  protected handle(request: AgentRequest): AgentResponse {
    const context: AgentContext = request.agentContext;
    const systemType = context.getStringProperty('systemType') ?? 'unknown';
    const targetScale = context.getStringProperty('targetScale') ?? 'medium';

    const analysis = analyzeArchitecture({
      description: request.description,
      systemType,
      currentPatterns: context.getListProperty('currentPatterns'),
      requirements: context.getListProperty('requirements'),
      constraints: recordOf(context.getProperty('constraints')),
      targetScale,
    });

    return AgentResponse.builder()
      .output(analysis.summary)
      .confidence(analysis.confidence)
      .recommendations(analysis.recommendations)
      .metadata({
        patternsEvaluated: analysis.patternsEvaluated,
        tradeOffs: analysis.tradeOffs,
        systemType,
        targetScale,
      })
      .build();
  }

  protected createContext(sessionId: string): ArchitectureContext {
    return ArchitectureContext.builder().sessionId(sessionId).requestId(sessionId).build();
  }

  getEventDrivenContext(sessionId: string): EventDrivenContext {
    return getOrCreate(this.eventDrivenContexts, sessionId,
      () => EventDrivenContext.builder().sessionId(sessionId).requestId(sessionId).build());
  }

  getCICDContext(sessionId: string): CICDContext {
    return getOrCreate(this.cicdContexts, sessionId,
      () => CICDContext.builder().sessionId(sessionId).requestId(sessionId).build());
  }

  getConfigurationContext(sessionId: string): ConfigurationContext {
    return getOrCreate(this.configurationContexts, sessionId,
      () => ConfigurationContext.builder().sessionId(sessionId).requestId(sessionId).build());
  }

  getResilienceContext(sessionId: string): ResilienceContext {
    return getOrCreate(this.resilienceContexts, sessionId,
      () => ResilienceContext.builder().sessionId(sessionId).requestId(sessionId).build());
  }

  removeContext(sessionId: string): boolean {
    this.eventDrivenContexts.delete(sessionId);
    this.cicdContexts.delete(sessionId);
    this.configurationContexts.delete(sessionId);
    this.resilienceContexts.delete(sessionId);
    return super.removeContext(sessionId);
  }

  protected guidanceRules(): readonly GuidanceRule<ArchitectureContext>[] {
    return [
      { keywords: ['microservice'], apply: (ctx) => ctx.addPattern('microservices') },
      { keywords: ['cqrs'], apply: (ctx) => ctx.addPattern('CQRS') },
      { keywords: ['api gateway'], apply: (ctx) => ctx.addPattern('API Gateway') },
      { keywords: ['event sourcing'], apply: (ctx) => ctx.addPattern('Event Sourcing') },
    ];
  }
}

function getOrCreate<T>(map: Map<string, T>, key: string, create: () => T): T {
  let value = map.get(key);
  if (value === undefined) {
    value = create();
    map.set(key, value);
  }
  return value;
}
