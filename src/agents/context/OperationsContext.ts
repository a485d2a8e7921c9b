import {
  AgentContext,
  AgentContextBuilder,
  AgentContextInit,
  EntriesInput,
  ListInput,
  allMatch,
  mapOf,
  mapToRecord,
  uniqueList,
} from './AgentContext';

export interface OperationsFields {
  readinessChecks?: string[];
  healthChecks?: string[];
  environments?: string[];
  deploymentTargets?: string[];
  monitoringTools?: string[];
  alertRules?: string[];
  dashboards?: string[];
  /** check → READY / PASSED / FAILED ... */
  checkStatuses?: Record<string, string>;
  healthStatuses?: Record<string, string>;
  metrics?: Record<string, number>;
}

const READY = ['READY', 'PASSED'];

export class OperationsContext extends AgentContext {
  private readonly readinessChecks: string[];
  private readonly healthChecks: string[];
  private readonly environments: string[];
  private readonly deploymentTargets: string[];
  private readonly monitoringTools: string[];
  private readonly alertRules: string[];
  private readonly dashboards: string[];
  private readonly checkStatuses: Map<string, string>;
  private readonly healthStatuses: Map<string, string>;
  private readonly metrics: Map<string, number>;

  constructor(init: AgentContextInit & OperationsFields) {
    super(init);
    this.readinessChecks = uniqueList(init.readinessChecks);
    this.healthChecks = uniqueList(init.healthChecks);
    this.environments = uniqueList(init.environments);
    this.deploymentTargets = uniqueList(init.deploymentTargets);
    this.monitoringTools = uniqueList(init.monitoringTools);
    this.alertRules = uniqueList(init.alertRules);
    this.dashboards = uniqueList(init.dashboards);
    this.checkStatuses = mapOf(init.checkStatuses);
    this.healthStatuses = mapOf(init.healthStatuses);
    this.metrics = new Map(Object.entries(init.metrics ?? {}));
  }

  static builder(): OperationsContextBuilder {
    return new OperationsContextBuilder();
  }

  getReadinessChecks(): string[] { return [...this.readinessChecks]; }
  getHealthChecks(): string[] { return [...this.healthChecks]; }
  getEnvironments(): string[] { return [...this.environments]; }
  getDeploymentTargets(): string[] { return [...this.deploymentTargets]; }
  getMonitoringTools(): string[] { return [...this.monitoringTools]; }
  getAlertRules(): string[] { return [...this.alertRules]; }
  getDashboards(): string[] { return [...this.dashboards]; }
  getCheckStatuses(): Record<string, string> { return mapToRecord(this.checkStatuses); }
  getHealthStatuses(): Record<string, string> { return mapToRecord(this.healthStatuses); }
  getMetrics(): Record<string, number> { return Object.fromEntries(this.metrics); }

  addMonitoringTool(tool: string): boolean {
    return this.addUnique(this.monitoringTools, tool, 'monitoring tool');
  }

  addDeploymentTarget(target: string): boolean {
    return this.addUnique(this.deploymentTargets, target, 'deployment target');
  }

  recordReadiness(check: string, status: string): void {
    this.addUnique(this.readinessChecks, check, 'readiness check');
    this.putEntry(this.checkStatuses, check, status, 'readiness check');
  }

  isValid(): boolean {
    return this.readinessChecks.length > 0 || this.healthChecks.length > 0 || this.environments.length > 0;
  }

  hasMonitoring(): boolean {
    return this.monitoringTools.length > 0 || this.metrics.size > 0;
  }

  hasDeploymentTargets(): boolean {
    return this.deploymentTargets.length > 0;
  }

  isReady(): boolean {
    return allMatch(this.readinessChecks.map((check) => this.checkStatuses.get(check) ?? ''), READY);
  }
}

export class OperationsContextBuilder extends AgentContextBuilder<OperationsContext> {
  private readonly fields: OperationsFields = {};

  constructor() {
    super('operations', 'operations-context');
  }

  readinessChecks(values: ListInput): this {
    this.fields.readinessChecks = this.mergeList(this.fields.readinessChecks, values);
    return this;
  }

  healthChecks(values: ListInput): this {
    this.fields.healthChecks = this.mergeList(this.fields.healthChecks, values);
    return this;
  }

  environments(values: ListInput): this {
    this.fields.environments = this.mergeList(this.fields.environments, values);
    return this;
  }

  deploymentTargets(values: ListInput): this {
    this.fields.deploymentTargets = this.mergeList(this.fields.deploymentTargets, values);
    return this;
  }

  monitoringTools(values: ListInput): this {
    this.fields.monitoringTools = this.mergeList(this.fields.monitoringTools, values);
    return this;
  }

  alertRules(values: ListInput): this {
    this.fields.alertRules = this.mergeList(this.fields.alertRules, values);
    return this;
  }

  dashboards(values: ListInput): this {
    this.fields.dashboards = this.mergeList(this.fields.dashboards, values);
    return this;
  }

  checkStatuses(entries: EntriesInput): this {
    this.fields.checkStatuses = this.mergeEntries(this.fields.checkStatuses, entries);
    return this;
  }

  healthStatuses(entries: EntriesInput): this {
    this.fields.healthStatuses = this.mergeEntries(this.fields.healthStatuses, entries);
    return this;
  }

  metrics(values: Readonly<Record<string, number>> | null | undefined): this {
    if (values) this.fields.metrics = { ...this.fields.metrics, ...values };
    return this;
  }

  build(): OperationsContext {
    return new OperationsContext({ ...this.baseInit(), ...this.fields });
  }
}
