import { AbstractAgent, GuidanceRule } from '../core/AbstractAgent';
import { AgentRequest } from '../core/AgentRequest';
import { AgentResponse } from '../core/AgentResponse';
import { AgentType } from '../core/AgentType';
import { ImplementationContext } from '../context/ImplementationContext';

export class ImplementationAgent extends AbstractAgent<ImplementationContext> {
  constructor() {
    super(AgentType.IMPLEMENTATION, [
      'code-implementation',
      'best-practices',
      'refactoring',
      'code-quality',
      'design-patterns',
    ], 'implementation');
  }

  protected handle(request: AgentRequest): AgentResponse {
    return this.guidance('Implementation guidance: ', request);
  }

  protected createContext(sessionId: string): ImplementationContext {
    return ImplementationContext.builder().sessionId(sessionId).requestId(sessionId).build();
  }

  protected guidanceRules(): readonly GuidanceRule<ImplementationContext>[] {
    return [
      { keywords: ['typescript'], apply: (ctx) => ctx.addLanguage('typescript') },
      { keywords: ['java'], apply: (ctx) => ctx.addLanguage('java') },
      { keywords: ['spring'], apply: (ctx) => ctx.addFramework('spring') },
      { keywords: ['express'], apply: (ctx) => ctx.addFramework('express') },
    ];
  }
}
