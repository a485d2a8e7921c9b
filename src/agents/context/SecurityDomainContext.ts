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

export type RiskLevel = 'low' | 'medium' | 'high' | 'critical';

export interface SecurityDomainFields {
  controls?: string[];
  policies?: string[];
  standards?: string[];
  authenticationMethods?: string[];
  encryptionStandards?: string[];
  complianceRequirements?: string[];
  threats?: Record<string, string>;
  mitigations?: Record<string, string>;
  auditFindings?: Record<string, string>;
  riskLevel?: RiskLevel;
}

/**
 * Security posture of a service: controls in place, policies, standards and
 * known threats with their mitigations.
 */
export class SecurityDomainContext extends AgentContext {
  private readonly controls: string[];
  private readonly policies: string[];
  private readonly standards: string[];
  private readonly authenticationMethods: string[];
  private readonly encryptionStandards: string[];
  private readonly complianceRequirements: string[];
  private readonly threats: Map<string, string>;
  private readonly mitigations: Map<string, string>;
  private readonly auditFindings: Map<string, string>;
  readonly riskLevel: RiskLevel;

  constructor(init: AgentContextInit & SecurityDomainFields) {
    super(init);
    this.controls = uniqueList(init.controls);
    this.policies = uniqueList(init.policies);
    this.standards = uniqueList(init.standards);
    this.authenticationMethods = uniqueList(init.authenticationMethods);
    this.encryptionStandards = uniqueList(init.encryptionStandards);
    this.complianceRequirements = uniqueList(init.complianceRequirements);
    this.threats = mapOf(init.threats);
    this.mitigations = mapOf(init.mitigations);
    this.auditFindings = mapOf(init.auditFindings);
    this.riskLevel = init.riskLevel ?? 'medium';
  }

  static builder(): SecurityDomainContextBuilder {
    return new SecurityDomainContextBuilder();
  }

  getControls(): string[] { return [...this.controls]; }
  getPolicies(): string[] { return [...this.policies]; }
  getStandards(): string[] { return [...this.standards]; }
  getAuthenticationMethods(): string[] { return [...this.authenticationMethods]; }
  getEncryptionStandards(): string[] { return [...this.encryptionStandards]; }
  getComplianceRequirements(): string[] { return [...this.complianceRequirements]; }
  getThreats(): Record<string, string> { return mapToRecord(this.threats); }
  getMitigations(): Record<string, string> { return mapToRecord(this.mitigations); }
  getAuditFindings(): Record<string, string> { return mapToRecord(this.auditFindings); }

  addControl(control: string): boolean {
    return this.addUnique(this.controls, control, 'control');
  }

  addPolicy(policy: string): boolean {
    return this.addUnique(this.policies, policy, 'policy');
  }

  addAuthenticationMethod(method: string): boolean {
    return this.addUnique(this.authenticationMethods, method, 'authentication method');
  }

  addEncryptionStandard(standard: string): boolean {
    return this.addUnique(this.encryptionStandards, standard, 'encryption standard');
  }

  recordThreat(threat: string, mitigation: string): void {
    this.putEntry(this.threats, threat, mitigation, 'threat');
  }

  isValid(): boolean {
    return this.controls.length > 0 || this.policies.length > 0 || this.standards.length > 0;
  }

  isHardened(): boolean {
    return this.controls.length > 0 && this.authenticationMethods.length > 0 && this.encryptionStandards.length > 0;
  }
}

export class SecurityDomainContextBuilder extends AgentContextBuilder<SecurityDomainContext> {
  private readonly fields: SecurityDomainFields = {};

  constructor() {
    super('security', 'security-context');
  }

  controls(values: ListInput): this {
    this.fields.controls = this.mergeList(this.fields.controls, values);
    return this;
  }

  policies(values: ListInput): this {
    this.fields.policies = this.mergeList(this.fields.policies, values);
    return this;
  }

  standards(values: ListInput): this {
    this.fields.standards = this.mergeList(this.fields.standards, values);
    return this;
  }

  authenticationMethods(values: ListInput): this {
    this.fields.authenticationMethods = this.mergeList(this.fields.authenticationMethods, values);
    return this;
  }

  encryptionStandards(values: ListInput): this {
    this.fields.encryptionStandards = this.mergeList(this.fields.encryptionStandards, values);
    return this;
  }

  complianceRequirements(values: ListInput): this {
    this.fields.complianceRequirements = this.mergeList(this.fields.complianceRequirements, values);
    return this;
  }

  threats(entries: EntriesInput): this {
    this.fields.threats = this.mergeEntries(this.fields.threats, entries);
    return this;
  }

  mitigations(entries: EntriesInput): this {
    this.fields.mitigations = this.mergeEntries(this.fields.mitigations, entries);
    return this;
  }

  auditFindings(entries: EntriesInput): this {
    this.fields.auditFindings = this.mergeEntries(this.fields.auditFindings, entries);
    return this;
  }

  riskLevel(level: RiskLevel | null | undefined): this {
    if (level) this.fields.riskLevel = level;
    return this;
  }

  build(): SecurityDomainContext {
    return new SecurityDomainContext({ ...this.baseInit(), ...this.fields });
  }
}
