import { AgentContext, AgentContextBuilder, AgentContextInit } from './AgentContext';

/**
 * Context with no domain-specific fields. The routing domain defaults to
 * `default` but is usually set explicitly by callers.
 */
export class DefaultContext extends AgentContext {
  constructor(init: AgentContextInit) {
    super(init);
  }

  static builder(): DefaultContextBuilder {
    return new DefaultContextBuilder();
  }

  isValid(): boolean {
    return true;
  }
}

export class DefaultContextBuilder extends AgentContextBuilder<DefaultContext> {
  constructor() {
    super('default', 'default-context');
  }

  build(): DefaultContext {
    return new DefaultContext(this.baseInit());
  }
}
