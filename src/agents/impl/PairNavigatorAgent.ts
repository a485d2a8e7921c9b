import { AbstractAgent } from '../core/AbstractAgent';
import { AgentRequest } from '../core/AgentRequest';
import { AgentResponse } from '../core/AgentResponse';
import { AgentType } from '../core/AgentType';
import { ImplementationContext } from '../context/ImplementationContext';
import { Logger } from '../../utils/logger';

export const MAX_PAIR_ITERATIONS = 3;

interface IterationState {
  count: number;
  lastDescription?: string;
}

const STOP_RECOMMENDATIONS = [
  'Summarize the current state before continuing',
  'Reset the session to start a new review',
];

/**
 * Code review navigator with a loop breaker: each session gets at most
 * {@link MAX_PAIR_ITERATIONS} exchanges, and a description repeated
 * back-to-back stops the session.
 */
export class PairNavigatorAgent extends AbstractAgent<ImplementationContext> {
  private readonly iterations = new Map<string, IterationState>();

  constructor() {
    super(AgentType.PAIR_PROGRAMMING, [
      'pair-programming',
      'code-review',
      'collaborative-development',
      'knowledge-sharing',
      'code-quality-feedback',
    ], 'pair-programming');
  }

  protected handle(request: AgentRequest): AgentResponse {
    const sessionId = request.sessionId;
    const state = this.iterations.get(sessionId) ?? { count: 0 };

    if (state.lastDescription === request.description) {
      Logger.agent(this.agentType, 'Loop breaker: repeated request', { sessionId });
      return AgentResponse.stopped(`Loop detected: repeated request in session ${sessionId}`, STOP_RECOMMENDATIONS);
    }
    if (state.count >= MAX_PAIR_ITERATIONS) {
      Logger.agent(this.agentType, 'Loop breaker: iteration limit reached', { sessionId, count: state.count });
      return AgentResponse.stopped(
        `Iteration limit reached (${MAX_PAIR_ITERATIONS}) in session ${sessionId}`,
        STOP_RECOMMENDATIONS
      );
    }

    this.iterations.set(sessionId, { count: state.count + 1, lastDescription: request.description });
    return this.guidance('Code review guidance: ', request)
      .withMetadata({ iteration: state.count + 1, maxIterations: MAX_PAIR_ITERATIONS });
  }

  getIterationCount(sessionId: string): number {
    return this.iterations.get(sessionId)?.count ?? 0;
  }

  resetIterationCounter(sessionId: string): void {
    this.iterations.delete(sessionId);
  }

  protected createContext(sessionId: string): ImplementationContext {
    return ImplementationContext.builder().sessionId(sessionId).requestId(sessionId).build();
  }

  removeContext(sessionId: string): boolean {
    this.resetIterationCounter(sessionId);
    return super.removeContext(sessionId);
  }
}
