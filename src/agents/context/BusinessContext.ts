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

export interface BusinessFields {
  businessGoals?: string[];
  products?: string[];
  regulations?: string[];
  /** role → owner */
  stakeholders?: Record<string, string>;
  processes?: Record<string, string>;
  kpis?: Record<string, number>;
}

export class BusinessContext extends AgentContext {
  private readonly businessGoals: string[];
  private readonly products: string[];
  private readonly regulations: string[];
  private readonly stakeholders: Map<string, string>;
  private readonly processes: Map<string, string>;
  private readonly kpis: Map<string, number>;

  constructor(init: AgentContextInit & BusinessFields) {
    super(init);
    this.businessGoals = uniqueList(init.businessGoals);
    this.products = uniqueList(init.products);
    this.regulations = uniqueList(init.regulations);
    this.stakeholders = mapOf(init.stakeholders);
    this.processes = mapOf(init.processes);
    this.kpis = new Map(Object.entries(init.kpis ?? {}));
  }

  static builder(): BusinessContextBuilder {
    return new BusinessContextBuilder();
  }

  getBusinessGoals(): string[] { return [...this.businessGoals]; }
  getProducts(): string[] { return [...this.products]; }
  getRegulations(): string[] { return [...this.regulations]; }
  getStakeholders(): Record<string, string> { return mapToRecord(this.stakeholders); }
  getProcesses(): Record<string, string> { return mapToRecord(this.processes); }
  getKpis(): Record<string, number> { return Object.fromEntries(this.kpis); }

  addBusinessGoal(goal: string): boolean {
    return this.addUnique(this.businessGoals, goal, 'business goal');
  }

  addProduct(product: string): boolean {
    return this.addUnique(this.products, product, 'product');
  }

  recordKpi(name: string, value: number): void {
    if (this.kpis.get(name) === value) return;
    this.kpis.set(name, value);
    this.touch();
  }

  isValid(): boolean {
    return this.businessGoals.length > 0 || this.products.length > 0;
  }

  isAlignedWithGoal(goal: string | null | undefined): boolean {
    if (!goal) return false;
    const wanted = goal.toLowerCase();
    return this.businessGoals.some((g) => g.toLowerCase() === wanted);
  }
}

export class BusinessContextBuilder extends AgentContextBuilder<BusinessContext> {
  private readonly fields: BusinessFields = {};

  constructor() {
    super('business', 'business-context');
  }

  businessGoals(values: ListInput): this {
    this.fields.businessGoals = this.mergeList(this.fields.businessGoals, values);
    return this;
  }

  products(values: ListInput): this {
    this.fields.products = this.mergeList(this.fields.products, values);
    return this;
  }

  regulations(values: ListInput): this {
    this.fields.regulations = this.mergeList(this.fields.regulations, values);
    return this;
  }

  stakeholders(entries: EntriesInput): this {
    this.fields.stakeholders = this.mergeEntries(this.fields.stakeholders, entries);
    return this;
  }

  processes(entries: EntriesInput): this {
    this.fields.processes = this.mergeEntries(this.fields.processes, entries);
    return this;
  }

  kpis(values: Readonly<Record<string, number>> | null | undefined): this {
    if (values) this.fields.kpis = { ...this.fields.kpis, ...values };
    return this;
  }

  build(): BusinessContext {
    return new BusinessContext({ ...this.baseInit(), ...this.fields });
  }
}
