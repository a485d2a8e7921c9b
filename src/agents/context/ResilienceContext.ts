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

export interface ResilienceFields {
  circuitBreakers?: string[];
  retryPatterns?: string[];
  backoffStrategies?: string[];
  bulkheadPatterns?: string[];
  threadPools?: string[];
  chaosExperiments?: string[];
  healthChecks?: string[];
  circuitBreakerConfigurations?: Record<string, string>;
  retryConfigurations?: Record<string, string>;
  sliSloDefinitions?: Record<string, string>;
  serviceName?: string;
  platform?: string;
  failureType?: string;
  scalingType?: string;
}

/**
 * Fault-tolerance setup of a service: breakers, retries, bulkheads and the
 * chaos experiments that exercise them.
 */
export class ResilienceContext extends AgentContext {
  private readonly circuitBreakers: string[];
  private readonly retryPatterns: string[];
  private readonly backoffStrategies: string[];
  private readonly bulkheadPatterns: string[];
  private readonly threadPools: string[];
  private readonly chaosExperiments: string[];
  private readonly healthChecks: string[];
  private readonly circuitBreakerConfigurations: Map<string, string>;
  private readonly retryConfigurations: Map<string, string>;
  private readonly sliSloDefinitions: Map<string, string>;
  readonly serviceName?: string;
  readonly platform?: string;
  readonly failureType?: string;
  readonly scalingType?: string;

  constructor(init: AgentContextInit & ResilienceFields) {
    super(init);
    this.circuitBreakers = uniqueList(init.circuitBreakers);
    this.retryPatterns = uniqueList(init.retryPatterns);
    this.backoffStrategies = uniqueList(init.backoffStrategies);
    this.bulkheadPatterns = uniqueList(init.bulkheadPatterns);
    this.threadPools = uniqueList(init.threadPools);
    this.chaosExperiments = uniqueList(init.chaosExperiments);
    this.healthChecks = uniqueList(init.healthChecks);
    this.circuitBreakerConfigurations = mapOf(init.circuitBreakerConfigurations);
    this.retryConfigurations = mapOf(init.retryConfigurations);
    this.sliSloDefinitions = mapOf(init.sliSloDefinitions);
    this.serviceName = init.serviceName;
    this.platform = init.platform;
    this.failureType = init.failureType;
    this.scalingType = init.scalingType;
  }

  static builder(): ResilienceContextBuilder {
    return new ResilienceContextBuilder();
  }

  getCircuitBreakers(): string[] { return [...this.circuitBreakers]; }
  getRetryPatterns(): string[] { return [...this.retryPatterns]; }
  getBackoffStrategies(): string[] { return [...this.backoffStrategies]; }
  getBulkheadPatterns(): string[] { return [...this.bulkheadPatterns]; }
  getThreadPools(): string[] { return [...this.threadPools]; }
  getChaosExperiments(): string[] { return [...this.chaosExperiments]; }
  getHealthChecks(): string[] { return [...this.healthChecks]; }
  getCircuitBreakerConfigurations(): Record<string, string> { return mapToRecord(this.circuitBreakerConfigurations); }
  getRetryConfigurations(): Record<string, string> { return mapToRecord(this.retryConfigurations); }
  getSliSloDefinitions(): Record<string, string> { return mapToRecord(this.sliSloDefinitions); }

  addCircuitBreaker(name: string): boolean {
    return this.addUnique(this.circuitBreakers, name, 'circuit breaker');
  }

  addRetryPattern(pattern: string): boolean {
    return this.addUnique(this.retryPatterns, pattern, 'retry pattern');
  }

  addBulkheadPattern(pattern: string): boolean {
    return this.addUnique(this.bulkheadPatterns, pattern, 'bulkhead pattern');
  }

  addChaosExperiment(experiment: string): boolean {
    return this.addUnique(this.chaosExperiments, experiment, 'chaos experiment');
  }

  addHealthCheck(check: string): boolean {
    return this.addUnique(this.healthChecks, check, 'health check');
  }

  defineSlo(indicator: string, objective: string): void {
    this.putEntry(this.sliSloDefinitions, indicator, objective, 'SLI');
  }

  isValid(): boolean {
    return this.circuitBreakers.length > 0 || this.retryPatterns.length > 0 || this.healthChecks.length > 0;
  }

  hasFaultTolerance(): boolean {
    return this.circuitBreakers.length > 0 && this.retryPatterns.length > 0;
  }

  hasChaosEngineering(): boolean {
    return this.chaosExperiments.length > 0;
  }
}

export class ResilienceContextBuilder extends AgentContextBuilder<ResilienceContext> {
  private readonly fields: ResilienceFields = {};

  constructor() {
    super('resilience', 'resilience-context');
  }

  circuitBreakers(values: ListInput): this {
    this.fields.circuitBreakers = this.mergeList(this.fields.circuitBreakers, values);
    return this;
  }

  retryPatterns(values: ListInput): this {
    this.fields.retryPatterns = this.mergeList(this.fields.retryPatterns, values);
    return this;
  }

  backoffStrategies(values: ListInput): this {
    this.fields.backoffStrategies = this.mergeList(this.fields.backoffStrategies, values);
    return this;
  }

  bulkheadPatterns(values: ListInput): this {
    this.fields.bulkheadPatterns = this.mergeList(this.fields.bulkheadPatterns, values);
    return this;
  }

  threadPools(values: ListInput): this {
    this.fields.threadPools = this.mergeList(this.fields.threadPools, values);
    return this;
  }

  chaosExperiments(values: ListInput): this {
    this.fields.chaosExperiments = this.mergeList(this.fields.chaosExperiments, values);
    return this;
  }

  healthChecks(values: ListInput): this {
    this.fields.healthChecks = this.mergeList(this.fields.healthChecks, values);
    return this;
  }

  circuitBreakerConfigurations(entries: EntriesInput): this {
    this.fields.circuitBreakerConfigurations = this.mergeEntries(this.fields.circuitBreakerConfigurations, entries);
    return this;
  }

  retryConfigurations(entries: EntriesInput): this {
    this.fields.retryConfigurations = this.mergeEntries(this.fields.retryConfigurations, entries);
    return this;
  }

  sliSloDefinitions(entries: EntriesInput): this {
    this.fields.sliSloDefinitions = this.mergeEntries(this.fields.sliSloDefinitions, entries);
    return this;
  }

  serviceName(name: string | null | undefined): this {
    if (name) this.fields.serviceName = name;
    return this;
  }

  platform(platform: string | null | undefined): this {
    if (platform) this.fields.platform = platform;
    return this;
  }

  failureType(type: string | null | undefined): this {
    if (type) this.fields.failureType = type;
    return this;
  }

  scalingType(type: string | null | undefined): this {
    if (type) this.fields.scalingType = type;
    return this;
  }

  build(): ResilienceContext {
    return new ResilienceContext({ ...this.baseInit(), ...this.fields });
  }
}
