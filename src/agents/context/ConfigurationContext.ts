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

export interface ConfigurationFields {
  configSources?: string[];
  configFormats?: string[];
  configProfiles?: string[];
  environments?: string[];
  featureFlags?: string[];
  rolloutStrategies?: string[];
  secretsManagers?: string[];
  rotationPolicies?: string[];
  validationRules?: string[];
  profileMappings?: Record<string, string>;
  flagTargeting?: Record<string, string>;
  accessPolicies?: Record<string, string>;
  serviceName?: string;
  platform?: string;
  configurationType?: string;
}

export class ConfigurationContext extends AgentContext {
  private readonly configSources: string[];
  private readonly configFormats: string[];
  private readonly configProfiles: string[];
  private readonly environments: string[];
  private readonly featureFlags: string[];
  private readonly rolloutStrategies: string[];
  private readonly secretsManagers: string[];
  private readonly rotationPolicies: string[];
  private readonly validationRules: string[];
  private readonly profileMappings: Map<string, string>;
  private readonly flagTargeting: Map<string, string>;
  private readonly accessPolicies: Map<string, string>;
  readonly serviceName?: string;
  readonly platform?: string;
  readonly configurationType?: string;

  constructor(init: AgentContextInit & ConfigurationFields) {
    super(init);
    this.configSources = uniqueList(init.configSources);
    this.configFormats = uniqueList(init.configFormats);
    this.configProfiles = uniqueList(init.configProfiles);
    this.environments = uniqueList(init.environments);
    this.featureFlags = uniqueList(init.featureFlags);
    this.rolloutStrategies = uniqueList(init.rolloutStrategies);
    this.secretsManagers = uniqueList(init.secretsManagers);
    this.rotationPolicies = uniqueList(init.rotationPolicies);
    this.validationRules = uniqueList(init.validationRules);
    this.profileMappings = mapOf(init.profileMappings);
    this.flagTargeting = mapOf(init.flagTargeting);
    this.accessPolicies = mapOf(init.accessPolicies);
    this.serviceName = init.serviceName;
    this.platform = init.platform;
    this.configurationType = init.configurationType;
  }

  static builder(): ConfigurationContextBuilder {
    return new ConfigurationContextBuilder();
  }

  getConfigSources(): string[] { return [...this.configSources]; }
  getConfigFormats(): string[] { return [...this.configFormats]; }
  getConfigProfiles(): string[] { return [...this.configProfiles]; }
  getEnvironments(): string[] { return [...this.environments]; }
  getFeatureFlags(): string[] { return [...this.featureFlags]; }
  getRolloutStrategies(): string[] { return [...this.rolloutStrategies]; }
  getSecretsManagers(): string[] { return [...this.secretsManagers]; }
  getRotationPolicies(): string[] { return [...this.rotationPolicies]; }
  getValidationRules(): string[] { return [...this.validationRules]; }
  getProfileMappings(): Record<string, string> { return mapToRecord(this.profileMappings); }
  getFlagTargeting(): Record<string, string> { return mapToRecord(this.flagTargeting); }
  getAccessPolicies(): Record<string, string> { return mapToRecord(this.accessPolicies); }

  addConfigSource(source: string): boolean {
    return this.addUnique(this.configSources, source, 'config source');
  }

  addEnvironment(environment: string): boolean {
    return this.addUnique(this.environments, environment, 'environment');
  }

  addFeatureFlag(flag: string): boolean {
    return this.addUnique(this.featureFlags, flag, 'feature flag');
  }

  addSecretsManager(manager: string): boolean {
    return this.addUnique(this.secretsManagers, manager, 'secrets manager');
  }

  addValidationRule(rule: string): boolean {
    return this.addUnique(this.validationRules, rule, 'validation rule');
  }

  mapProfile(environment: string, profile: string): void {
    this.putEntry(this.profileMappings, environment, profile, 'profile mapping');
  }

  isValid(): boolean {
    return this.configSources.length > 0 || this.featureFlags.length > 0 || this.secretsManagers.length > 0;
  }

  hasFeatureFlags(): boolean {
    return this.featureFlags.length > 0 && this.rolloutStrategies.length > 0;
  }

  hasSecretsManagement(): boolean {
    return this.secretsManagers.length > 0 && this.rotationPolicies.length > 0;
  }

  hasEnvironmentIsolation(): boolean {
    return this.environments.length >= 2;
  }

  hasConfigValidation(): boolean {
    return this.validationRules.length > 0;
  }
}

export class ConfigurationContextBuilder extends AgentContextBuilder<ConfigurationContext> {
  private readonly fields: ConfigurationFields = {};

  constructor() {
    super('configuration', 'configuration-context');
  }

  configSources(values: ListInput): this {
    this.fields.configSources = this.mergeList(this.fields.configSources, values);
    return this;
  }

  configFormats(values: ListInput): this {
    this.fields.configFormats = this.mergeList(this.fields.configFormats, values);
    return this;
  }

  configProfiles(values: ListInput): this {
    this.fields.configProfiles = this.mergeList(this.fields.configProfiles, values);
    return this;
  }

  environments(values: ListInput): this {
    this.fields.environments = this.mergeList(this.fields.environments, values);
    return this;
  }

  featureFlags(values: ListInput): this {
    this.fields.featureFlags = this.mergeList(this.fields.featureFlags, values);
    return this;
  }

  rolloutStrategies(values: ListInput): this {
    this.fields.rolloutStrategies = this.mergeList(this.fields.rolloutStrategies, values);
    return this;
  }

  secretsManagers(values: ListInput): this {
    this.fields.secretsManagers = this.mergeList(this.fields.secretsManagers, values);
    return this;
  }

  rotationPolicies(values: ListInput): this {
    this.fields.rotationPolicies = this.mergeList(this.fields.rotationPolicies, values);
    return this;
  }

  validationRules(values: ListInput): this {
    this.fields.validationRules = this.mergeList(this.fields.validationRules, values);
    return this;
  }

  profileMappings(entries: EntriesInput): this {
    this.fields.profileMappings = this.mergeEntries(this.fields.profileMappings, entries);
    return this;
  }

  flagTargeting(entries: EntriesInput): this {
    this.fields.flagTargeting = this.mergeEntries(this.fields.flagTargeting, entries);
    return this;
  }

  accessPolicies(entries: EntriesInput): this {
    this.fields.accessPolicies = this.mergeEntries(this.fields.accessPolicies, entries);
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

  configurationType(type: string | null | undefined): this {
    if (type) this.fields.configurationType = type;
    return this;
  }

  build(): ConfigurationContext {
    return new ConfigurationContext({ ...this.baseInit(), ...this.fields });
  }
}
