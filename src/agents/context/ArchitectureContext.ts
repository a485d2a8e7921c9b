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

export interface ArchitectureFields {
  services?: string[];
  patterns?: string[];
  decisions?: string[];
  constraints?: string[];
  qualityAttributes?: string[];
  integrations?: string[];
  dataFlows?: string[];
  /** decision → ADR reference */
  decisionRecords?: Record<string, string>;
  serviceOwners?: Record<string, string>;
  interfaces?: Record<string, string>;
}

export class ArchitectureContext extends AgentContext {
  private readonly services: string[];
  private readonly patterns: string[];
  private readonly decisions: string[];
  private readonly constraints: string[];
  private readonly qualityAttributes: string[];
  private readonly integrations: string[];
  private readonly dataFlows: string[];
  private readonly decisionRecords: Map<string, string>;
  private readonly serviceOwners: Map<string, string>;
  private readonly interfaces: Map<string, string>;

  constructor(init: AgentContextInit & ArchitectureFields) {
    super(init);
    this.services = uniqueList(init.services);
    this.patterns = uniqueList(init.patterns);
    this.decisions = uniqueList(init.decisions);
    this.constraints = uniqueList(init.constraints);
    this.qualityAttributes = uniqueList(init.qualityAttributes);
    this.integrations = uniqueList(init.integrations);
    this.dataFlows = uniqueList(init.dataFlows);
    this.decisionRecords = mapOf(init.decisionRecords);
    this.serviceOwners = mapOf(init.serviceOwners);
    this.interfaces = mapOf(init.interfaces);
  }

  static builder(): ArchitectureContextBuilder {
    return new ArchitectureContextBuilder();
  }

  getServices(): string[] { return [...this.services]; }
  getPatterns(): string[] { return [...this.patterns]; }
  getDecisions(): string[] { return [...this.decisions]; }
  getConstraints(): string[] { return [...this.constraints]; }
  getQualityAttributes(): string[] { return [...this.qualityAttributes]; }
  getIntegrations(): string[] { return [...this.integrations]; }
  getDataFlows(): string[] { return [...this.dataFlows]; }
  getDecisionRecords(): Record<string, string> { return mapToRecord(this.decisionRecords); }
  getServiceOwners(): Record<string, string> { return mapToRecord(this.serviceOwners); }
  getInterfaces(): Record<string, string> { return mapToRecord(this.interfaces); }

  addService(service: string): boolean {
    return this.addUnique(this.services, service, 'service');
  }

  addPattern(pattern: string): boolean {
    return this.addUnique(this.patterns, pattern, 'pattern');
  }

  addConstraint(constraint: string): boolean {
    return this.addUnique(this.constraints, constraint, 'constraint');
  }

  /**
   * Record a decision, optionally linking it to its decision record.
   */
  recordDecision(decision: string, record?: string): boolean {
    const added = this.addUnique(this.decisions, decision, 'decision');
    if (record) this.putEntry(this.decisionRecords, decision, record, 'decision');
    return added;
  }

  isValid(): boolean {
    return this.services.length > 0 || this.patterns.length > 0 || this.decisions.length > 0;
  }

  isDocumented(): boolean {
    return this.decisions.length > 0 && this.decisionRecords.size > 0;
  }
}

export class ArchitectureContextBuilder extends AgentContextBuilder<ArchitectureContext> {
  private readonly fields: ArchitectureFields = {};

  constructor() {
    super('architecture', 'architecture-context');
  }

  services(values: ListInput): this {
    this.fields.services = this.mergeList(this.fields.services, values);
    return this;
  }

  patterns(values: ListInput): this {
    this.fields.patterns = this.mergeList(this.fields.patterns, values);
    return this;
  }

  decisions(values: ListInput): this {
    this.fields.decisions = this.mergeList(this.fields.decisions, values);
    return this;
  }

  constraints(values: ListInput): this {
    this.fields.constraints = this.mergeList(this.fields.constraints, values);
    return this;
  }

  qualityAttributes(values: ListInput): this {
    this.fields.qualityAttributes = this.mergeList(this.fields.qualityAttributes, values);
    return this;
  }

  integrations(values: ListInput): this {
    this.fields.integrations = this.mergeList(this.fields.integrations, values);
    return this;
  }

  dataFlows(values: ListInput): this {
    this.fields.dataFlows = this.mergeList(this.fields.dataFlows, values);
    return this;
  }

  decisionRecords(entries: EntriesInput): this {
    this.fields.decisionRecords = this.mergeEntries(this.fields.decisionRecords, entries);
    return this;
  }

  serviceOwners(entries: EntriesInput): this {
    this.fields.serviceOwners = this.mergeEntries(this.fields.serviceOwners, entries);
    return this;
  }

  interfaces(entries: EntriesInput): this {
    this.fields.interfaces = this.mergeEntries(this.fields.interfaces, entries);
    return this;
  }

  build(): ArchitectureContext {
    return new ArchitectureContext({ ...this.baseInit(), ...this.fields });
  }
}
