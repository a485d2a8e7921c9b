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

export interface CICDFields {
  buildTools?: string[];
  buildStages?: string[];
  artifactRepositories?: string[];
  testingFrameworks?: string[];
  testTypes?: string[];
  codeQualityTools?: string[];
  securityScanners?: string[];
  vulnerabilityChecks?: string[];
  complianceChecks?: string[];
  deploymentStrategies?: string[];
  environments?: string[];
  rollbackStrategies?: string[];
  orchestrationTools?: string[];
  triggers?: string[];
  notifications?: string[];
  securityPolicies?: Record<string, string>;
  serviceName?: string;
  deploymentTarget?: string;
  deploymentStrategy?: string;
  packagingTool?: string;
  environment?: string;
}

/**
 * Pipeline knowledge for one service: how it is built, tested, scanned
 * and rolled out.
 */
export class CICDContext extends AgentContext {
  private readonly buildTools: string[];
  private readonly buildStages: string[];
  private readonly artifactRepositories: string[];
  private readonly testingFrameworks: string[];
  private readonly testTypes: string[];
  private readonly codeQualityTools: string[];
  private readonly securityScanners: string[];
  private readonly vulnerabilityChecks: string[];
  private readonly complianceChecks: string[];
  private readonly deploymentStrategies: string[];
  private readonly environments: string[];
  private readonly rollbackStrategies: string[];
  private readonly orchestrationTools: string[];
  private readonly triggers: string[];
  private readonly notifications: string[];
  private readonly securityPolicies: Map<string, string>;
  readonly serviceName?: string;
  readonly deploymentTarget?: string;
  readonly deploymentStrategy?: string;
  readonly packagingTool?: string;
  readonly environment?: string;

  constructor(init: AgentContextInit & CICDFields) {
    super(init);
    this.buildTools = uniqueList(init.buildTools);
    this.buildStages = uniqueList(init.buildStages);
    this.artifactRepositories = uniqueList(init.artifactRepositories);
    this.testingFrameworks = uniqueList(init.testingFrameworks);
    this.testTypes = uniqueList(init.testTypes);
    this.codeQualityTools = uniqueList(init.codeQualityTools);
    this.securityScanners = uniqueList(init.securityScanners);
    this.vulnerabilityChecks = uniqueList(init.vulnerabilityChecks);
    this.complianceChecks = uniqueList(init.complianceChecks);
    this.deploymentStrategies = uniqueList(init.deploymentStrategies);
    this.environments = uniqueList(init.environments);
    this.rollbackStrategies = uniqueList(init.rollbackStrategies);
    this.orchestrationTools = uniqueList(init.orchestrationTools);
    this.triggers = uniqueList(init.triggers);
    this.notifications = uniqueList(init.notifications);
    this.securityPolicies = mapOf(init.securityPolicies);
    this.serviceName = init.serviceName;
    this.deploymentTarget = init.deploymentTarget;
    this.deploymentStrategy = init.deploymentStrategy;
    this.packagingTool = init.packagingTool;
    this.environment = init.environment;
  }

  static builder(): CICDContextBuilder {
    return new CICDContextBuilder();
  }

  getBuildTools(): string[] { return [...this.buildTools]; }
  getBuildStages(): string[] { return [...this.buildStages]; }
  getArtifactRepositories(): string[] { return [...this.artifactRepositories]; }
  getTestingFrameworks(): string[] { return [...this.testingFrameworks]; }
  getTestTypes(): string[] { return [...this.testTypes]; }
  getCodeQualityTools(): string[] { return [...this.codeQualityTools]; }
  getSecurityScanners(): string[] { return [...this.securityScanners]; }
  getVulnerabilityChecks(): string[] { return [...this.vulnerabilityChecks]; }
  getComplianceChecks(): string[] { return [...this.complianceChecks]; }
  getDeploymentStrategies(): string[] { return [...this.deploymentStrategies]; }
  getEnvironments(): string[] { return [...this.environments]; }
  getRollbackStrategies(): string[] { return [...this.rollbackStrategies]; }
  getOrchestrationTools(): string[] { return [...this.orchestrationTools]; }
  getTriggers(): string[] { return [...this.triggers]; }
  getNotifications(): string[] { return [...this.notifications]; }
  getSecurityPolicies(): Record<string, string> { return mapToRecord(this.securityPolicies); }

  addBuildTool(tool: string): boolean {
    return this.addUnique(this.buildTools, tool, 'build tool');
  }

  addTestingFramework(framework: string): boolean {
    return this.addUnique(this.testingFrameworks, framework, 'testing framework');
  }

  addTestType(type: string): boolean {
    return this.addUnique(this.testTypes, type, 'test type');
  }

  addSecurityScanner(scanner: string): boolean {
    return this.addUnique(this.securityScanners, scanner, 'security scanner');
  }

  addDeploymentStrategy(strategy: string): boolean {
    return this.addUnique(this.deploymentStrategies, strategy, 'deployment strategy');
  }

  addEnvironment(environment: string): boolean {
    return this.addUnique(this.environments, environment, 'environment');
  }

  addOrchestrationTool(tool: string): boolean {
    return this.addUnique(this.orchestrationTools, tool, 'orchestration tool');
  }

  addTrigger(trigger: string): boolean {
    return this.addUnique(this.triggers, trigger, 'trigger');
  }

  setSecurityPolicy(name: string, value: string): void {
    this.putEntry(this.securityPolicies, name, value, 'security policy');
  }

  isValid(): boolean {
    return this.buildTools.length > 0 || this.testingFrameworks.length > 0 || this.deploymentStrategies.length > 0;
  }

  hasSecurityIntegration(): boolean {
    return this.securityScanners.length > 0;
  }

  hasTestingAutomation(): boolean {
    return this.testingFrameworks.length > 0 && this.testTypes.length > 0;
  }

  hasDeploymentAutomation(): boolean {
    return this.deploymentStrategies.length > 0 && this.environments.length > 0;
  }

  /**
   * One-paragraph summary used when the context is shared with other agents.
   */
  summarize(): string {
    const parts: string[] = [];
    if (this.buildTools.length) parts.push(`build: ${this.buildTools.join(', ')}`);
    if (this.testingFrameworks.length) parts.push(`tests: ${this.testingFrameworks.join(', ')}`);
    if (this.securityScanners.length) parts.push(`security: ${this.securityScanners.join(', ')}`);
    if (this.deploymentStrategies.length) parts.push(`deploy: ${this.deploymentStrategies.join(', ')}`);
    if (this.orchestrationTools.length) parts.push(`orchestration: ${this.orchestrationTools.join(', ')}`);
    return parts.length ? parts.join('; ') : 'no pipeline details recorded';
  }
}

export class CICDContextBuilder extends AgentContextBuilder<CICDContext> {
  private readonly fields: CICDFields = {};

  constructor() {
    super('cicd', 'cicd-context');
  }

  buildTools(values: ListInput): this {
    this.fields.buildTools = this.mergeList(this.fields.buildTools, values);
    return this;
  }

  buildStages(values: ListInput): this {
    this.fields.buildStages = this.mergeList(this.fields.buildStages, values);
    return this;
  }

  artifactRepositories(values: ListInput): this {
    this.fields.artifactRepositories = this.mergeList(this.fields.artifactRepositories, values);
    return this;
  }

  testingFrameworks(values: ListInput): this {
    this.fields.testingFrameworks = this.mergeList(this.fields.testingFrameworks, values);
    return this;
  }

  testTypes(values: ListInput): this {
    this.fields.testTypes = this.mergeList(this.fields.testTypes, values);
    return this;
  }

  codeQualityTools(values: ListInput): this {
    this.fields.codeQualityTools = this.mergeList(this.fields.codeQualityTools, values);
    return this;
  }

  securityScanners(values: ListInput): this {
    this.fields.securityScanners = this.mergeList(this.fields.securityScanners, values);
    return this;
  }

  vulnerabilityChecks(values: ListInput): this {
    this.fields.vulnerabilityChecks = this.mergeList(this.fields.vulnerabilityChecks, values);
    return this;
  }

  complianceChecks(values: ListInput): this {
    this.fields.complianceChecks = this.mergeList(this.fields.complianceChecks, values);
    return this;
  }

  deploymentStrategies(values: ListInput): this {
    this.fields.deploymentStrategies = this.mergeList(this.fields.deploymentStrategies, values);
    return this;
  }

  environments(values: ListInput): this {
    this.fields.environments = this.mergeList(this.fields.environments, values);
    return this;
  }

  rollbackStrategies(values: ListInput): this {
    this.fields.rollbackStrategies = this.mergeList(this.fields.rollbackStrategies, values);
    return this;
  }

  orchestrationTools(values: ListInput): this {
    this.fields.orchestrationTools = this.mergeList(this.fields.orchestrationTools, values);
    return this;
  }

  triggers(values: ListInput): this {
    this.fields.triggers = this.mergeList(this.fields.triggers, values);
    return this;
  }

  notifications(values: ListInput): this {
    this.fields.notifications = this.mergeList(this.fields.notifications, values);
    return this;
  }

  securityPolicies(entries: EntriesInput): this {
    this.fields.securityPolicies = this.mergeEntries(this.fields.securityPolicies, entries);
    return this;
  }

  serviceName(name: string | null | undefined): this {
    if (name) this.fields.serviceName = name;
    return this;
  }

  deploymentTarget(target: string | null | undefined): this {
    if (target) this.fields.deploymentTarget = target;
    return this;
  }

  deploymentStrategy(strategy: string | null | undefined): this {
    if (strategy) this.fields.deploymentStrategy = strategy;
    return this;
  }

  packagingTool(tool: string | null | undefined): this {
    if (tool) this.fields.packagingTool = tool;
    return this;
  }

  environment(environment: string | null | undefined): this {
    if (environment) this.fields.environment = environment;
    return this;
  }

  build(): CICDContext {
    return new CICDContext({ ...this.baseInit(), ...this.fields });
  }
}
