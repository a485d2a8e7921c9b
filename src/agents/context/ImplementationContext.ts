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

export interface ImplementationFields {
  components?: string[];
  tasks?: string[];
  languages?: string[];
  frameworks?: string[];
  repositories?: string[];
  /** task → TODO / IN_PROGRESS / DONE / COMPLETED */
  taskStatuses?: Record<string, string>;
  componentStatuses?: Record<string, string>;
  dependencies?: Record<string, string>;
  branches?: Record<string, string>;
  buildTools?: Record<string, string>;
}

const FINISHED = ['DONE', 'COMPLETED'];

export class ImplementationContext extends AgentContext {
  private readonly components: string[];
  private readonly tasks: string[];
  private readonly languages: string[];
  private readonly frameworks: string[];
  private readonly repositories: string[];
  private readonly taskStatuses: Map<string, string>;
  private readonly componentStatuses: Map<string, string>;
  private readonly dependencies: Map<string, string>;
  private readonly branches: Map<string, string>;
  private readonly buildTools: Map<string, string>;

  constructor(init: AgentContextInit & ImplementationFields) {
    super(init);
    this.components = uniqueList(init.components);
    this.tasks = uniqueList(init.tasks);
    this.languages = uniqueList(init.languages);
    this.frameworks = uniqueList(init.frameworks);
    this.repositories = uniqueList(init.repositories);
    this.taskStatuses = mapOf(init.taskStatuses);
    this.componentStatuses = mapOf(init.componentStatuses);
    this.dependencies = mapOf(init.dependencies);
    this.branches = mapOf(init.branches);
    this.buildTools = mapOf(init.buildTools);
  }

  static builder(): ImplementationContextBuilder {
    return new ImplementationContextBuilder();
  }

  getComponents(): string[] { return [...this.components]; }
  getTasks(): string[] { return [...this.tasks]; }
  getLanguages(): string[] { return [...this.languages]; }
  getFrameworks(): string[] { return [...this.frameworks]; }
  getRepositories(): string[] { return [...this.repositories]; }
  getTaskStatuses(): Record<string, string> { return mapToRecord(this.taskStatuses); }
  getComponentStatuses(): Record<string, string> { return mapToRecord(this.componentStatuses); }
  getDependencies(): Record<string, string> { return mapToRecord(this.dependencies); }
  getBranches(): Record<string, string> { return mapToRecord(this.branches); }
  getBuildTools(): Record<string, string> { return mapToRecord(this.buildTools); }

  addComponent(component: string): boolean {
    return this.addUnique(this.components, component, 'component');
  }

  addLanguage(language: string): boolean {
    return this.addUnique(this.languages, language, 'language');
  }

  addFramework(framework: string): boolean {
    return this.addUnique(this.frameworks, framework, 'framework');
  }

  updateTaskStatus(task: string, status: string): void {
    this.addUnique(this.tasks, task, 'task');
    this.putEntry(this.taskStatuses, task, status, 'task');
  }

  isValid(): boolean {
    return this.components.length > 0 || this.tasks.length > 0;
  }

  isReady(): boolean {
    return allMatch(this.tasks.map((task) => this.taskStatuses.get(task) ?? ''), FINISHED);
  }
}

export class ImplementationContextBuilder extends AgentContextBuilder<ImplementationContext> {
  private readonly fields: ImplementationFields = {};

  constructor() {
    super('implementation', 'implementation-context');
  }

  components(values: ListInput): this {
    this.fields.components = this.mergeList(this.fields.components, values);
    return this;
  }

  tasks(values: ListInput): this {
    this.fields.tasks = this.mergeList(this.fields.tasks, values);
    return this;
  }

  languages(values: ListInput): this {
    this.fields.languages = this.mergeList(this.fields.languages, values);
    return this;
  }

  frameworks(values: ListInput): this {
    this.fields.frameworks = this.mergeList(this.fields.frameworks, values);
    return this;
  }

  repositories(values: ListInput): this {
    this.fields.repositories = this.mergeList(this.fields.repositories, values);
    return this;
  }

  taskStatuses(entries: EntriesInput): this {
    this.fields.taskStatuses = this.mergeEntries(this.fields.taskStatuses, entries);
    return this;
  }

  componentStatuses(entries: EntriesInput): this {
    this.fields.componentStatuses = this.mergeEntries(this.fields.componentStatuses, entries);
    return this;
  }

  dependencies(entries: EntriesInput): this {
    this.fields.dependencies = this.mergeEntries(this.fields.dependencies, entries);
    return this;
  }

  branches(entries: EntriesInput): this {
    this.fields.branches = this.mergeEntries(this.fields.branches, entries);
    return this;
  }

  buildTools(entries: EntriesInput): this {
    this.fields.buildTools = this.mergeEntries(this.fields.buildTools, entries);
    return this;
  }

  build(): ImplementationContext {
    return new ImplementationContext({ ...this.baseInit(), ...this.fields });
  }
}
