import { AbstractAgent, GuidanceRule } from '../core/AbstractAgent';
import { AgentRequest } from '../core/AgentRequest';
import { AgentResponse } from '../core/AgentResponse';
import { AgentType } from '../core/AgentType';
import { ResilienceContext } from '../context/ResilienceContext';

export class ResilienceEngineeringAgent extends AbstractAgent<ResilienceContext> {
  constructor() {
    super(AgentType.RESILIENCE_ENGINEERING, [
      'fault-tolerance',
      'circuit-breakers',
      'retry-strategies',
      'disaster-recovery',
      'chaos-engineering',
    ], 'resilience');
  }

  protected handle(request: AgentRequest): AgentResponse {
    return this.guidance('Resilience pattern guidance: ', request);
  }

  protected createContext(sessionId: string): ResilienceContext {
    return ResilienceContext.builder().sessionId(sessionId).requestId(sessionId).build();
  }

  provideKubernetesHealthCheckGuidance(context: ResilienceContext): AgentResponse {
    return this.serviceGuidance('Kubernetes health check', context, [
      'Configure liveness probe to detect when container needs restart',
      'Configure readiness probe to control traffic routing',
      'Set appropriate timeout and period values',
    ]);
  }

  providePodDisruptionBudgetGuidance(context: ResilienceContext): AgentResponse {
    return this.serviceGuidance('Pod Disruption Budget', context, [
      'Set minAvailable to ensure minimum replicas during disruptions',
      'Use maxUnavailable for controlled rolling updates',
      'Consider cluster maintenance windows',
    ]);
  }

  provideHorizontalPodAutoscalerGuidance(context: ResilienceContext): AgentResponse {
    return this.serviceGuidance('Horizontal Pod Autoscaler', context, [
      'Configure CPU and memory thresholds for scaling',
      'Set appropriate min and max replica counts',
      'Use custom metrics for application-specific scaling',
    ]);
  }

  protected guidanceRules(): readonly GuidanceRule<ResilienceContext>[] {
    return [
      { keywords: ['circuit breaker', 'circuit-breaker'], apply: (ctx) => ctx.addCircuitBreaker('default-breaker') },
      { keywords: ['retry', 'backoff'], apply: (ctx) => ctx.addRetryPattern('exponential-backoff') },
      { keywords: ['bulkhead'], apply: (ctx) => ctx.addBulkheadPattern('thread-pool-isolation') },
      { keywords: ['chaos'], apply: (ctx) => ctx.addChaosExperiment('instance-termination') },
      { keywords: ['health check', 'probe'], apply: (ctx) => ctx.addHealthCheck('liveness') },
    ];
  }

  private serviceGuidance(topic: string, context: ResilienceContext, recommendations: string[]): AgentResponse {
    return AgentResponse.builder()
      .agentType(this.agentType)
      .output(`${topic} guidance for service: ${context.serviceName ?? 'unknown'}`)
      .confidence(0.85)
      .recommendations(recommendations)
      .build();
  }
}
