import { AgentContext, AgentContextBuilder, AgentContextInit, ListInput, uniqueList } from './AgentContext';

export interface StoryFields {
  repositoryUrl?: string;
  issueId?: number;
  issueTitle?: string;
  issueBody?: string;
  moduleName?: string;
  dependencies?: string[];
}

/**
 * A tracker issue to be refined into testable requirements.
 */
export class StoryContext extends AgentContext {
  readonly repositoryUrl?: string;
  readonly issueId?: number;
  readonly issueTitle?: string;
  readonly issueBody?: string;
  readonly moduleName?: string;
  private readonly dependencies: string[];

  constructor(init: AgentContextInit & StoryFields) {
    super(init);
    this.repositoryUrl = init.repositoryUrl;
    this.issueId = init.issueId;
    this.issueTitle = init.issueTitle;
    this.issueBody = init.issueBody;
    this.moduleName = init.moduleName;
    this.dependencies = uniqueList(init.dependencies);
  }

  static builder(): StoryContextBuilder {
    return new StoryContextBuilder();
  }

  getDependencies(): string[] {
    return [...this.dependencies];
  }

  addDependency(dependency: string): boolean {
    return this.addUnique(this.dependencies, dependency, 'dependency');
  }

  isValid(): boolean {
    return Boolean(this.issueTitle?.trim() || this.issueBody?.trim());
  }
}

export class StoryContextBuilder extends AgentContextBuilder<StoryContext> {
  private readonly fields: StoryFields = {};

  constructor() {
    super('story', 'story-context');
  }

  repositoryUrl(url: string | null | undefined): this {
    if (url) this.fields.repositoryUrl = url;
    return this;
  }

  issueId(id: number | null | undefined): this {
    if (id !== null && id !== undefined) this.fields.issueId = id;
    return this;
  }

  issueTitle(title: string | null | undefined): this {
    if (title) this.fields.issueTitle = title;
    return this;
  }

  issueBody(body: string | null | undefined): this {
    if (body) this.fields.issueBody = body;
    return this;
  }

  moduleName(name: string | null | undefined): this {
    if (name) this.fields.moduleName = name;
    return this;
  }

  dependencies(values: ListInput): this {
    this.fields.dependencies = this.mergeList(this.fields.dependencies, values);
    return this;
  }

  build(): StoryContext {
    return new StoryContext({ ...this.baseInit(), ...this.fields });
  }
}
