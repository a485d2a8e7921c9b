import { AbstractAgent } from '../core/AbstractAgent';
import { AgentRequest } from '../core/AgentRequest';
import { AgentResponse } from '../core/AgentResponse';
import { AgentType } from '../core/AgentType';
import { StoryContext } from '../context/StoryContext';
import { breakDownStory, renderStoryDocument } from '../story/StoryRequirements';
import { Logger } from '../../utils/logger';

export interface StoryLimits {
  maxRequirements: number;
  maxOpenQuestions: number;
}

export const DEFAULT_STORY_LIMITS: StoryLimits = {
  maxRequirements: 25,
  maxOpenQuestions: 10,
};

interface StoryIssue {
  title: string;
  body: string;
}

/**
 * Rewrites a tracker story into EARS requirements plus Gherkin acceptance
 * criteria. Stories that are empty or too large to refine in one pass are
 * stopped with a `STOP:` phrase instead of being processed.
 */
export class StoryStrengtheningAgent extends AbstractAgent<StoryContext> {
  private readonly limits: StoryLimits;

  constructor(limits: Partial<StoryLimits> = {}) {
    super(AgentType.STORY_STRENGTHENING, [
      'story-analysis',
      'requirement-analysis',
      'requirement-transformation',
      'quality-improvement',
      'loop-detection',
    ], 'story');
    this.limits = { ...DEFAULT_STORY_LIMITS, ...limits };
  }

  protected handle(request: AgentRequest): AgentResponse {
    const issue = this.extractIssue(request);
    const breakdown = breakDownStory(issue.body);
    const { requirements, openQuestions } = breakdown;

    let stopPhrase: string | undefined;
    if (requirements.length === 0) {
      stopPhrase = 'STOP: No functional requirements found';
    } else if (requirements.length > this.limits.maxRequirements) {
      stopPhrase = `STOP: Too many acceptance criteria: ${requirements.length} exceeds ${this.limits.maxRequirements}`;
    } else if (openQuestions.length > this.limits.maxOpenQuestions) {
      stopPhrase = `STOP: Too many open questions: ${openQuestions.length} exceeds ${this.limits.maxOpenQuestions}`;
    }

    if (stopPhrase) {
      Logger.agent(this.agentType, stopPhrase, { requirements: requirements.length, openQuestions: openQuestions.length });
      return AgentResponse.stopped(stopPhrase, ['Split the story or answer open questions before refining']);
    }

    return AgentResponse.builder()
      .output(renderStoryDocument(issue.title, breakdown))
      .confidence(0.9)
      .recommendations(['Review and refine the strengthened requirements'])
      .metadata({ requirementCount: requirements.length, openQuestionCount: openQuestions.length })
      .build();
  }

  protected createContext(sessionId: string): StoryContext {
    return StoryContext.builder().sessionId(sessionId).requestId(sessionId).build();
  }

  /**
   * Title and body come from a {@link StoryContext} when given, else from
   * the `title`/`body` properties, else from the request description.
   */
  private extractIssue(request: AgentRequest): StoryIssue {
    const context = request.agentContext;
    if (context instanceof StoryContext) {
      return {
        title: context.issueTitle ?? request.description,
        body: context.issueBody ?? request.description,
      };
    }
    return {
      title: context.getStringProperty('title') ?? request.description,
      body: context.getStringProperty('body') ?? request.description,
    };
  }
}
