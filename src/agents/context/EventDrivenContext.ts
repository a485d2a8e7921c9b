import {
  AgentContext,
  AgentContextBuilder,
  AgentContextInit,
  EntriesInput,
  ListInput,
  mapOf,
  mapToRecord,
  uniqueList,
} from './AgentContext';

export interface EventDrivenFields {
  messageBrokers?: string[];
  deadLetterQueues?: string[];
  eventHandlers?: string[];
  eventStores?: string[];
  eventSources?: string[];
  eventConsumers?: string[];
  idempotencyPatterns?: string[];
  errorHandlingStrategies?: string[];
  projections?: string[];
  sagas?: string[];
  /** schema name → version */
  eventSchemas?: Record<string, string>;
  handlerTypes?: Record<string, string>;
}

export class EventDrivenContext extends AgentContext {
  private readonly messageBrokers: string[];
  private readonly deadLetterQueues: string[];
  private readonly eventHandlers: string[];
  private readonly eventStores: string[];
  private readonly eventSources: string[];
  private readonly eventConsumers: string[];
  private readonly idempotencyPatterns: string[];
  private readonly errorHandlingStrategies: string[];
  private readonly projections: string[];
  private readonly sagas: string[];
  private readonly eventSchemas: Map<string, string>;
  private readonly handlerTypes: Map<string, string>;

  constructor(init: AgentContextInit & EventDrivenFields) {
    super(init);
    this.messageBrokers = uniqueList(init.messageBrokers);
    this.deadLetterQueues = uniqueList(init.deadLetterQueues);
    this.eventHandlers = uniqueList(init.eventHandlers);
    this.eventStores = uniqueList(init.eventStores);
    this.eventSources = uniqueList(init.eventSources);
    this.eventConsumers = uniqueList(init.eventConsumers);
    this.idempotencyPatterns = uniqueList(init.idempotencyPatterns);
    this.errorHandlingStrategies = uniqueList(init.errorHandlingStrategies);
    this.projections = uniqueList(init.projections);
    this.sagas = uniqueList(init.sagas);
    this.eventSchemas = mapOf(init.eventSchemas);
    this.handlerTypes = mapOf(init.handlerTypes);
  }

  static builder(): EventDrivenContextBuilder {
    return new EventDrivenContextBuilder();
  }

  getMessageBrokers(): string[] { return [...this.messageBrokers]; }
  getDeadLetterQueues(): string[] { return [...this.deadLetterQueues]; }
  getEventHandlers(): string[] { return [...this.eventHandlers]; }
  getEventStores(): string[] { return [...this.eventStores]; }
  getEventSources(): string[] { return [...this.eventSources]; }
  getEventConsumers(): string[] { return [...this.eventConsumers]; }
  getIdempotencyPatterns(): string[] { return [...this.idempotencyPatterns]; }
  getErrorHandlingStrategies(): string[] { return [...this.errorHandlingStrategies]; }
  getProjections(): string[] { return [...this.projections]; }
  getSagas(): string[] { return [...this.sagas]; }
  getEventSchemas(): Record<string, string> { return mapToRecord(this.eventSchemas); }
  getHandlerTypes(): Record<string, string> { return mapToRecord(this.handlerTypes); }

  addMessageBroker(broker: string): boolean {
    return this.addUnique(this.messageBrokers, broker, 'message broker');
  }

  addDeadLetterQueue(queue: string): boolean {
    return this.addUnique(this.deadLetterQueues, queue, 'dead letter queue');
  }

  addEventHandler(handler: string, handlerType?: string): boolean {
    const added = this.addUnique(this.eventHandlers, handler, 'event handler');
    if (handlerType) this.putEntry(this.handlerTypes, handler, handlerType, 'handler type');
    return added;
  }

  addEventStore(store: string): boolean {
    return this.addUnique(this.eventStores, store, 'event store');
  }

  addIdempotencyPattern(pattern: string): boolean {
    return this.addUnique(this.idempotencyPatterns, pattern, 'idempotency pattern');
  }

  addErrorHandlingStrategy(strategy: string): boolean {
    return this.addUnique(this.errorHandlingStrategies, strategy, 'error handling strategy');
  }

  addSaga(saga: string): boolean {
    return this.addUnique(this.sagas, saga, 'saga');
  }

  /**
   * Register a schema or move it to a new version.
   */
  updateSchemaVersion(schema: string, version: string): void {
    this.putEntry(this.eventSchemas, schema, version, 'event schema');
  }

  getSchemaVersion(schema: string): string | undefined {
    return this.eventSchemas.get(schema);
  }

  isValid(): boolean {
    return this.messageBrokers.length > 0 || this.eventSchemas.size > 0;
  }

  hasEventSourcing(): boolean {
    return this.eventStores.length > 0;
  }

  hasResiliencePatterns(): boolean {
    return this.idempotencyPatterns.length > 0 || this.errorHandlingStrategies.length > 0;
  }

  summarize(): string {
    const parts: string[] = [];
    if (this.messageBrokers.length) parts.push(`brokers: ${this.messageBrokers.join(', ')}`);
    if (this.eventSchemas.size) {
      parts.push(`schemas: ${[...this.eventSchemas].map(([name, version]) => `${name}@${version}`).join(', ')}`);
    }
    if (this.eventStores.length) parts.push(`stores: ${this.eventStores.join(', ')}`);
    if (this.sagas.length) parts.push(`sagas: ${this.sagas.join(', ')}`);
    return parts.length ? parts.join('; ') : 'no event topology recorded';
  }
}

export class EventDrivenContextBuilder extends AgentContextBuilder<EventDrivenContext> {
  private readonly fields: EventDrivenFields = {};

  constructor() {
    super('event-driven', 'event-driven-context');
  }

  messageBrokers(values: ListInput): this {
    this.fields.messageBrokers = this.mergeList(this.fields.messageBrokers, values);
    return this;
  }

  deadLetterQueues(values: ListInput): this {
    this.fields.deadLetterQueues = this.mergeList(this.fields.deadLetterQueues, values);
    return this;
  }

  eventHandlers(values: ListInput): this {
    this.fields.eventHandlers = this.mergeList(this.fields.eventHandlers, values);
    return this;
  }

  eventStores(values: ListInput): this {
    this.fields.eventStores = this.mergeList(this.fields.eventStores, values);
    return this;
  }

  eventSources(values: ListInput): this {
    this.fields.eventSources = this.mergeList(this.fields.eventSources, values);
    return this;
  }

  eventConsumers(values: ListInput): this {
    this.fields.eventConsumers = this.mergeList(this.fields.eventConsumers, values);
    return this;
  }

  idempotencyPatterns(values: ListInput): this {
    this.fields.idempotencyPatterns = this.mergeList(this.fields.idempotencyPatterns, values);
    return this;
  }

  errorHandlingStrategies(values: ListInput): this {
    this.fields.errorHandlingStrategies = this.mergeList(this.fields.errorHandlingStrategies, values);
    return this;
  }

  projections(values: ListInput): this {
    this.fields.projections = this.mergeList(this.fields.projections, values);
    return this;
  }

  sagas(values: ListInput): this {
    this.fields.sagas = this.mergeList(this.fields.sagas, values);
    return this;
  }

  eventSchemas(entries: EntriesInput): this {
    this.fields.eventSchemas = this.mergeEntries(this.fields.eventSchemas, entries);
    return this;
  }

  handlerTypes(entries: EntriesInput): this {
    this.fields.handlerTypes = this.mergeEntries(this.fields.handlerTypes, entries);
    return this;
  }

  build(): EventDrivenContext {
    return new EventDrivenContext({ ...this.baseInit(), ...this.fields });
  }
}
