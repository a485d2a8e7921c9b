import { AbstractAgent, GuidanceRule } from '../core/AbstractAgent';
import { AgentRequest } from '../core/AgentRequest';
import { AgentResponse } from '../core/AgentResponse';
import { AgentType } from '../core/AgentType';
import { ObservabilityContext } from '../context/ObservabilityContext';

export class ObservabilityAgent extends AbstractAgent<ObservabilityContext> {
  constructor() {
    super(AgentType.OBSERVABILITY, [
      'monitoring',
      'logging',
      'tracing',
      'metrics',
      'alerting',
    ], 'observability');
  }

  protected handle(request: AgentRequest): AgentResponse {
    return this.guidance('Observability guidance: ', request);
  }

  protected createContext(sessionId: string): ObservabilityContext {
    return ObservabilityContext.builder().sessionId(sessionId).requestId(sessionId).build();
  }

  protected guidanceRules(): readonly GuidanceRule<ObservabilityContext>[] {
    return [
      { keywords: ['prometheus'], apply: (ctx) => ctx.addMetricsCheck('prometheus') },
      { keywords: ['opentelemetry', 'jaeger'], apply: (ctx) => ctx.addTracingSystem('opentelemetry') },
      { keywords: ['elk', 'loki'], apply: (ctx) => ctx.addLogSource('centralized-logs') },
      { keywords: ['alert'], apply: (ctx) => ctx.addAlertRule('error-rate') },
      { keywords: ['grafana', 'dashboard'], apply: (ctx) => ctx.addDashboard('service-overview') },
    ];
  }
}
