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

export interface DeploymentFields {
  artifacts?: string[];
  deploymentTargets?: string[];
  environments?: string[];
  approvals?: string[];
  maintenanceWindows?: string[];
  artifactVersions?: Record<string, string>;
  targetStrategies?: Record<string, string>;
}

export class DeploymentContext extends AgentContext {
  private readonly artifacts: string[];
  private readonly deploymentTargets: string[];
  private readonly environments: string[];
  private readonly approvals: string[];
  private readonly maintenanceWindows: string[];
  private readonly artifactVersions: Map<string, string>;
  private readonly targetStrategies: Map<string, string>;

  constructor(init: AgentContextInit & DeploymentFields) {
    super(init);
    this.artifacts = uniqueList(init.artifacts);
    this.deploymentTargets = uniqueList(init.deploymentTargets);
    this.environments = uniqueList(init.environments);
    this.approvals = uniqueList(init.approvals);
    this.maintenanceWindows = uniqueList(init.maintenanceWindows);
    this.artifactVersions = mapOf(init.artifactVersions);
    this.targetStrategies = mapOf(init.targetStrategies);
  }

  static builder(): DeploymentContextBuilder {
    return new DeploymentContextBuilder();
  }

  getArtifacts(): string[] { return [...this.artifacts]; }
  getDeploymentTargets(): string[] { return [...this.deploymentTargets]; }
  getEnvironments(): string[] { return [...this.environments]; }
  getApprovals(): string[] { return [...this.approvals]; }
  getMaintenanceWindows(): string[] { return [...this.maintenanceWindows]; }
  getArtifactVersions(): Record<string, string> { return mapToRecord(this.artifactVersions); }
  getTargetStrategies(): Record<string, string> { return mapToRecord(this.targetStrategies); }

  addArtifact(artifact: string, version?: string): boolean {
    const added = this.addUnique(this.artifacts, artifact, 'artifact');
    if (version) this.putEntry(this.artifactVersions, artifact, version, 'artifact');
    return added;
  }

  addDeploymentTarget(target: string): boolean {
    return this.addUnique(this.deploymentTargets, target, 'deployment target');
  }

  addApproval(approver: string): boolean {
    return this.addUnique(this.approvals, approver, 'approval');
  }

  isValid(): boolean {
    return this.artifacts.length > 0 || this.deploymentTargets.length > 0;
  }

  isReadyForRollout(): boolean {
    return this.isValid() && this.approvals.length > 0;
  }
}

export class DeploymentContextBuilder extends AgentContextBuilder<DeploymentContext> {
  private readonly fields: DeploymentFields = {};

  constructor() {
    super('deployment', 'deployment-context');
  }

  artifacts(values: ListInput): this {
    this.fields.artifacts = this.mergeList(this.fields.artifacts, values);
    return this;
  }

  deploymentTargets(values: ListInput): this {
    this.fields.deploymentTargets = this.mergeList(this.fields.deploymentTargets, values);
    return this;
  }

  environments(values: ListInput): this {
    this.fields.environments = this.mergeList(this.fields.environments, values);
    return this;
  }

  approvals(values: ListInput): this {
    this.fields.approvals = this.mergeList(this.fields.approvals, values);
    return this;
  }

  maintenanceWindows(values: ListInput): this {
    this.fields.maintenanceWindows = this.mergeList(this.fields.maintenanceWindows, values);
    return this;
  }

  artifactVersions(entries: EntriesInput): this {
    this.fields.artifactVersions = this.mergeEntries(this.fields.artifactVersions, entries);
    return this;
  }

  targetStrategies(entries: EntriesInput): this {
    this.fields.targetStrategies = this.mergeEntries(this.fields.targetStrategies, entries);
    return this;
  }

  build(): DeploymentContext {
    return new DeploymentContext({ ...this.baseInit(), ...this.fields });
  }
}
