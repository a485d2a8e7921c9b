import { AbstractAgent, GuidanceRule } from '../core/AbstractAgent';
import { AgentRequest } from '../core/AgentRequest';
import { AgentResponse } from '../core/AgentResponse';
import { AgentType } from '../core/AgentType';
import { TestingContext } from '../context/TestingContext';

export class TestingAgent extends AbstractAgent<TestingContext> {
  constructor() {
    super(AgentType.TESTING, [
      'test-strategy',
      'unit-testing',
      'integration-testing',
      'test-automation',
      'tdd-bdd',
    ], 'testing');
  }

  protected handle(request: AgentRequest): AgentResponse {
    return this.guidance('Testing pattern recommendation: ', request);
  }

  protected createContext(sessionId: string): TestingContext {
    return TestingContext.builder().sessionId(sessionId).requestId(sessionId).build();
  }

  protected guidanceRules(): readonly GuidanceRule<TestingContext>[] {
    return [
      { keywords: ['jest'], apply: (ctx) => ctx.addFramework('jest') },
      { keywords: ['junit'], apply: (ctx) => ctx.addFramework('junit') },
      { keywords: ['cucumber', 'gherkin'], apply: (ctx) => ctx.addFramework('cucumber') },
    ];
  }
}
