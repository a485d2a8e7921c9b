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

export interface TestingFields {
  testSuites?: string[];
  frameworks?: string[];
  environments?: string[];
  defects?: string[];
  /** suite → PASSED / FAILED / SUCCESS ... */
  suiteStatuses?: Record<string, string>;
  coverageMetrics?: Record<string, number>;
}

const PASSING = ['PASSED', 'SUCCESS'];

export class TestingContext extends AgentContext {
  private readonly testSuites: string[];
  private readonly frameworks: string[];
  private readonly environments: string[];
  private readonly defects: string[];
  private readonly suiteStatuses: Map<string, string>;
  private readonly coverageMetrics: Map<string, number>;

  constructor(init: AgentContextInit & TestingFields) {
    super(init);
    this.testSuites = uniqueList(init.testSuites);
    this.frameworks = uniqueList(init.frameworks);
    this.environments = uniqueList(init.environments);
    this.defects = uniqueList(init.defects);
    this.suiteStatuses = mapOf(init.suiteStatuses);
    this.coverageMetrics = new Map(Object.entries(init.coverageMetrics ?? {}));
  }

  static builder(): TestingContextBuilder {
    return new TestingContextBuilder();
  }

  getTestSuites(): string[] { return [...this.testSuites]; }
  getFrameworks(): string[] { return [...this.frameworks]; }
  getEnvironments(): string[] { return [...this.environments]; }
  getDefects(): string[] { return [...this.defects]; }
  getSuiteStatuses(): Record<string, string> { return mapToRecord(this.suiteStatuses); }
  getCoverageMetrics(): Record<string, number> { return Object.fromEntries(this.coverageMetrics); }

  addFramework(framework: string): boolean {
    return this.addUnique(this.frameworks, framework, 'framework');
  }

  addDefect(defect: string): boolean {
    return this.addUnique(this.defects, defect, 'defect');
  }

  recordSuiteResult(suite: string, status: string): void {
    this.addUnique(this.testSuites, suite, 'test suite');
    this.putEntry(this.suiteStatuses, suite, status, 'test suite');
  }

  isValid(): boolean {
    return this.testSuites.length > 0 || this.frameworks.length > 0;
  }

  isPassing(): boolean {
    return allMatch(this.testSuites.map((suite) => this.suiteStatuses.get(suite) ?? ''), PASSING);
  }
}

export class TestingContextBuilder extends AgentContextBuilder<TestingContext> {
  private readonly fields: TestingFields = {};

  constructor() {
    super('testing', 'testing-context');
  }

  testSuites(values: ListInput): this {
    this.fields.testSuites = this.mergeList(this.fields.testSuites, values);
    return this;
  }

  frameworks(values: ListInput): this {
    this.fields.frameworks = this.mergeList(this.fields.frameworks, values);
    return this;
  }

  environments(values: ListInput): this {
    this.fields.environments = this.mergeList(this.fields.environments, values);
    return this;
  }

  defects(values: ListInput): this {
    this.fields.defects = this.mergeList(this.fields.defects, values);
    return this;
  }

  suiteStatuses(entries: EntriesInput): this {
    this.fields.suiteStatuses = this.mergeEntries(this.fields.suiteStatuses, entries);
    return this;
  }

  coverageMetrics(values: Readonly<Record<string, number>> | null | undefined): this {
    if (values) this.fields.coverageMetrics = { ...this.fields.coverageMetrics, ...values };
    return this;
  }

  build(): TestingContext {
    return new TestingContext({ ...this.baseInit(), ...this.fields });
  }
}
