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

export interface ObservabilityFields {
  metricsChecks?: string[];
  metricCollectors?: string[];
  logSources?: string[];
  logAggregators?: string[];
  tracingSystems?: string[];
  spanProcessors?: string[];
  alertRules?: string[];
  notificationChannels?: string[];
  dashboards?: string[];
  healthEndpoints?: string[];
  /** endpoint → status (UP, HEALTHY, DOWN...) */
  healthStatuses?: Record<string, string>;
  logLevels?: Record<string, string>;
  alertConfigurations?: Record<string, string>;
}

const HEALTHY_STATUSES = ['HEALTHY', 'UP'] as const;

export class ObservabilityContext extends AgentContext {
  private readonly metricsChecks: string[];
  private readonly metricCollectors: string[];
  private readonly logSources: string[];
  private readonly logAggregators: string[];
  private readonly tracingSystems: string[];
  private readonly spanProcessors: string[];
  private readonly alertRules: string[];
  private readonly notificationChannels: string[];
  private readonly dashboards: string[];
  private readonly healthEndpoints: string[];
  private readonly healthStatuses: Map<string, string>;
  private readonly logLevels: Map<string, string>;
  private readonly alertConfigurations: Map<string, string>;

  constructor(init: AgentContextInit & ObservabilityFields) {
    super(init);
    this.metricsChecks = uniqueList(init.metricsChecks);
    this.metricCollectors = uniqueList(init.metricCollectors);
    this.logSources = uniqueList(init.logSources);
    this.logAggregators = uniqueList(init.logAggregators);
    this.tracingSystems = uniqueList(init.tracingSystems);
    this.spanProcessors = uniqueList(init.spanProcessors);
    this.alertRules = uniqueList(init.alertRules);
    this.notificationChannels = uniqueList(init.notificationChannels);
    this.dashboards = uniqueList(init.dashboards);
    this.healthEndpoints = uniqueList(init.healthEndpoints);
    this.healthStatuses = mapOf(init.healthStatuses);
    this.logLevels = mapOf(init.logLevels);
    this.alertConfigurations = mapOf(init.alertConfigurations);
  }

  static builder(): ObservabilityContextBuilder {
    return new ObservabilityContextBuilder();
  }

  getMetricsChecks(): string[] { return [...this.metricsChecks]; }
  getMetricCollectors(): string[] { return [...this.metricCollectors]; }
  getLogSources(): string[] { return [...this.logSources]; }
  getLogAggregators(): string[] { return [...this.logAggregators]; }
  getTracingSystems(): string[] { return [...this.tracingSystems]; }
  getSpanProcessors(): string[] { return [...this.spanProcessors]; }
  getAlertRules(): string[] { return [...this.alertRules]; }
  getNotificationChannels(): string[] { return [...this.notificationChannels]; }
  getDashboards(): string[] { return [...this.dashboards]; }
  getHealthEndpoints(): string[] { return [...this.healthEndpoints]; }
  getHealthStatuses(): Record<string, string> { return mapToRecord(this.healthStatuses); }
  getLogLevels(): Record<string, string> { return mapToRecord(this.logLevels); }
  getAlertConfigurations(): Record<string, string> { return mapToRecord(this.alertConfigurations); }

  addMetricsCheck(check: string): boolean {
    return this.addUnique(this.metricsChecks, check, 'metrics check');
  }

  addLogSource(source: string): boolean {
    return this.addUnique(this.logSources, source, 'log source');
  }

  addTracingSystem(system: string): boolean {
    return this.addUnique(this.tracingSystems, system, 'tracing system');
  }

  addAlertRule(rule: string): boolean {
    return this.addUnique(this.alertRules, rule, 'alert rule');
  }

  addDashboard(dashboard: string): boolean {
    return this.addUnique(this.dashboards, dashboard, 'dashboard');
  }

  /**
   * Record the latest status of a health endpoint, registering it if new.
   */
  updateHealthStatus(endpoint: string, status: string): void {
    this.addUnique(this.healthEndpoints, endpoint, 'health endpoint');
    this.putEntry(this.healthStatuses, endpoint, status, 'health endpoint');
  }

  isValid(): boolean {
    return this.metricsChecks.length > 0 || this.logSources.length > 0 || this.tracingSystems.length > 0;
  }

  hasMetrics(): boolean {
    return this.metricsChecks.length > 0 || this.metricCollectors.length > 0;
  }

  hasLogging(): boolean {
    return this.logSources.length > 0 || this.logAggregators.length > 0;
  }

  hasTracing(): boolean {
    return this.tracingSystems.length > 0;
  }

  hasAlerting(): boolean {
    return this.alertRules.length > 0;
  }

  isHealthy(): boolean {
    return this.healthEndpoints.length > 0 && this.healthEndpoints.every((endpoint) => {
      const status = (this.healthStatuses.get(endpoint) ?? '').toUpperCase();
      return HEALTHY_STATUSES.some((healthy) => healthy === status);
    });
  }
}

export class ObservabilityContextBuilder extends AgentContextBuilder<ObservabilityContext> {
  private readonly fields: ObservabilityFields = {};

  constructor() {
    super('observability', 'observability-context');
  }

  metricsChecks(values: ListInput): this {
    this.fields.metricsChecks = this.mergeList(this.fields.metricsChecks, values);
    return this;
  }

  metricCollectors(values: ListInput): this {
    this.fields.metricCollectors = this.mergeList(this.fields.metricCollectors, values);
    return this;
  }

  logSources(values: ListInput): this {
    this.fields.logSources = this.mergeList(this.fields.logSources, values);
    return this;
  }

  logAggregators(values: ListInput): this {
    this.fields.logAggregators = this.mergeList(this.fields.logAggregators, values);
    return this;
  }

  tracingSystems(values: ListInput): this {
    this.fields.tracingSystems = this.mergeList(this.fields.tracingSystems, values);
    return this;
  }

  spanProcessors(values: ListInput): this {
    this.fields.spanProcessors = this.mergeList(this.fields.spanProcessors, values);
    return this;
  }

  alertRules(values: ListInput): this {
    this.fields.alertRules = this.mergeList(this.fields.alertRules, values);
    return this;
  }

  notificationChannels(values: ListInput): this {
    this.fields.notificationChannels = this.mergeList(this.fields.notificationChannels, values);
    return this;
  }

  dashboards(values: ListInput): this {
    this.fields.dashboards = this.mergeList(this.fields.dashboards, values);
    return this;
  }

  healthEndpoints(values: ListInput): this {
    this.fields.healthEndpoints = this.mergeList(this.fields.healthEndpoints, values);
    return this;
  }

  healthStatuses(entries: EntriesInput): this {
    this.fields.healthStatuses = this.mergeEntries(this.fields.healthStatuses, entries);
    return this;
  }

  logLevels(entries: EntriesInput): this {
    this.fields.logLevels = this.mergeEntries(this.fields.logLevels, entries);
    return this;
  }

  alertConfigurations(entries: EntriesInput): this {
    this.fields.alertConfigurations = this.mergeEntries(this.fields.alertConfigurations, entries);
    return this;
  }

  build(): ObservabilityContext {
    return new ObservabilityContext({ ...this.baseInit(), ...this.fields });
  }
}
