import { AgentStatus } from '../core/AgentStatus';
import { StoryContext } from '../context/StoryContext';
import { defaultContext, requestFor } from '../../tests/agentFixtures';
import { StoryStrengtheningAgent } from './StoryStrengtheningAgent';

const STORY_BODY = [
  '- The system shall record every sale',
  '- When a payment is declined, notify the cashier',
  '- While offline, queue receipts locally',
  '- If the printer fails, show an error banner',
  '- Should refunds need approval?',
].join('\n');

describe('StoryStrengtheningAgent', () => {
  it('renders EARS requirements, scenarios and open questions', async () => {
    const context = StoryContext.builder().issueTitle('Checkout receipts').issueBody(STORY_BODY).build();

    const response = await new StoryStrengtheningAgent().processRequest(requestFor(context, 'Strengthen the story'));
    const lines = response.output.split('\n');

    expect(response.status).toBe(AgentStatus.SUCCESS);
    expect(response.confidence).toBe(0.9);
    expect(lines[0]).toBe('# Strengthened Requirements: Checkout receipts');
    expect(lines).toContain('1. THE system SHALL record every sale');
    expect(lines).toContain('2. WHEN a payment is declined, THE system SHALL notify the cashier');
    expect(lines).toContain('3. WHILE offline, THE system SHALL queue receipts locally');
    expect(lines).toContain('4. IF the printer fails, THEN THE system SHALL show an error banner');
    expect(lines).toContain('Scenario: Record every sale');
    expect(lines[lines.length - 2]).toBe('- Should refunds need approval?');
    expect(response.metadata).toEqual({ requirementCount: 4, openQuestionCount: 1 });
  });

  it('reads title and body from plain properties', async () => {
    const context = defaultContext('story', { title: 'Loyalty points', body: '- Award one point per euro spent' });

    const response = await new StoryStrengtheningAgent().processRequest(requestFor(context, 'Strengthen'));

    expect(response.output.split('\n')[0]).toBe('# Strengthened Requirements: Loyalty points');
    expect(response.output).toContain('1. THE system SHALL award one point per euro spent');
  });

  it('stops when no requirements are found', async () => {
    const response = await new StoryStrengtheningAgent().processRequest(
      requestFor(defaultContext('story'), 'Make checkout nicer')
    );

    expect(response.status).toBe(AgentStatus.STOPPED);
    expect(response.output).toBe('STOP: No functional requirements found');
  });

  it('stops when the story is too large', async () => {
    const context = StoryContext.builder().issueTitle('Receipts').issueBody(STORY_BODY).build();

    const response = await new StoryStrengtheningAgent({ maxRequirements: 2 }).processRequest(requestFor(context, 'x'));

    expect(response.status).toBe(AgentStatus.STOPPED);
    expect(response.output).toBe('STOP: Too many acceptance criteria: 4 exceeds 2');
  });

  it('stops when too many questions are open', async () => {
    const context = StoryContext.builder().issueTitle('Receipts').issueBody(STORY_BODY).build();

    const response = await new StoryStrengtheningAgent({ maxOpenQuestions: 0 }).processRequest(requestFor(context, 'x'));

    expect(response.output).toBe('STOP: Too many open questions: 1 exceeds 0');
  });
});
