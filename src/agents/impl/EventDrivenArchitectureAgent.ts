import { AbstractAgent, GuidanceRule } from '../core/AbstractAgent';
import { AgentRequest } from '../core/AgentRequest';
import { AgentResponse } from '../core/AgentResponse';
import { AgentType } from '../core/AgentType';
import { EventDrivenContext } from '../context/EventDrivenContext';

export class EventDrivenArchitectureAgent extends AbstractAgent<EventDrivenContext> {
  constructor() {
    super(AgentType.EVENT_DRIVEN_ARCHITECTURE, [
      'event-sourcing',
      'message-brokers',
      'event-schema-design',
      'saga-patterns',
      'event-streaming',
    ], 'event-driven');
  }

  protected handle(request: AgentRequest): AgentResponse {
    return this.guidance('Event-driven pattern: ', request);
  }

  protected createContext(sessionId: string): EventDrivenContext {
    return EventDrivenContext.builder().sessionId(sessionId).requestId(sessionId).build();
  }

  /**
   * Schema evolution advice for one event type, recording the version in
   * the session context.
   */
  provideSchemaGuidance(sessionId: string, schema: string, version: string): AgentResponse {
    const context = this.getOrCreateContext(sessionId);
    const previous = context.getSchemaVersion(schema);
    context.updateSchemaVersion(schema, version);
    const change = previous ? `from v${previous} to v${version}` : `at v${version}`;
    return AgentResponse.builder()
      .agentType(this.agentType)
      .output(`Event schema guidance for ${schema} ${change}`)
      .confidence(0.85)
      .recommendations([
        'Register the schema in a schema registry',
        'Only add optional fields in minor versions',
        'Keep consumers tolerant of unknown fields',
      ])
      .build();
  }

  generateOutput(query: string): string {
    return 'Event-Driven Architecture Guidance:\n\n' +
      `For query: ${query}\n\n` +
      '- Use message brokers like Kafka or RabbitMQ\n' +
      '- Implement event schema versioning and validation\n' +
      '- Ensure idempotent event handlers\n' +
      '- Consider dead-letter queues for failed events\n' +
      '- Implement saga patterns for distributed transactions\n';
  }

  protected guidanceRules(): readonly GuidanceRule<EventDrivenContext>[] {
    return [
      { keywords: ['kafka'], apply: (ctx) => ctx.addMessageBroker('kafka') },
      { keywords: ['idempotent'], apply: (ctx) => ctx.addEventHandler('idempotent-handler', 'idempotency') },
      { keywords: ['dead letter', 'dead-letter'], apply: (ctx) => ctx.addDeadLetterQueue('failed-events') },
      { keywords: ['event sourcing', 'event store'], apply: (ctx) => ctx.addEventStore('event-store') },
      { keywords: ['saga'], apply: (ctx) => ctx.addSaga('saga-pattern') },
    ];
  }
}
