import { AbstractAgent, DEFAULT_RECOMMENDATIONS } from './AbstractAgent';
import { AgentRequest } from './AgentRequest';
import { AgentResponse } from './AgentResponse';
import { AgentStatus } from './AgentStatus';
import { AgentType } from './AgentType';
import { DefaultContext } from '../context/DefaultContext';
import { defaultContext, requestFor, securityContext } from '../../tests/agentFixtures';

class EchoAgent extends AbstractAgent<DefaultContext> {
  failWith?: string;

  constructor() {
    super(AgentType.IMPLEMENTATION, ['echo'], 'echo');
  }

  protected async handle(request: AgentRequest): Promise<AgentResponse> {
    if (this.failWith) throw new Error(this.failWith);
    return this.guidance('Echo: ', request);
  }

  protected createContext(sessionId: string): DefaultContext {
    return DefaultContext.builder().sessionId(sessionId).build();
  }

  protected guidanceRules() {
    return [{ keywords: ['redis'], apply: (ctx: DefaultContext) => ctx.setSessionId('touched') }];
  }
}

describe('AbstractAgent', () => {
  let agent: EchoAgent;

  beforeEach(() => {
    agent = new EchoAgent();
  });

  it('delegates valid requests and stamps the agent type', async () => {
    const response = await agent.processRequest(requestFor(defaultContext('echo'), 'hello'));

    expect(response.status).toBe(AgentStatus.SUCCESS);
    expect(response.output).toBe('Echo: hello');
    expect(response.confidence).toBe(0.8);
    expect(response.recommendations).toEqual(DEFAULT_RECOMMENDATIONS);
    expect(response.agentType).toBe(AgentType.IMPLEMENTATION);
    expect(response.processingTimeMs).toBeGreaterThanOrEqual(0);
    expect(agent.getStatus()).toBe(AgentStatus.SUCCESS);
  });

  it('reports PENDING before the first request', () => {
    expect(agent.getStatus()).toBe(AgentStatus.PENDING);
  });

  it('rejects a missing request', async () => {
    const response = await agent.processRequest(null);

    expect(response.status).toBe(AgentStatus.FAILURE);
    expect(response.output).toBe('Invalid request: request is null');
    expect(response.confidence).toBe(0);
  });

  it('rejects a blank description', async () => {
    const response = await agent.processRequest(requestFor(defaultContext('echo'), '   '));

    expect(response.output).toBe('Invalid request: description is required');
    expect(agent.getStatus()).toBe(AgentStatus.FAILURE);
  });

  it('rejects request types containing "invalid"', async () => {
    const request = AgentRequest.builder()
      .agentContext(defaultContext('echo'))
      .securityContext(securityContext())
      .description('hello')
      .type('invalid-type')
      .build();

    const response = await agent.processRequest(request);

    expect(response.output).toBe('Invalid request: invalid type');
  });

  it('turns thrown errors into failures without changing health', async () => {
    agent.failWith = 'boom';

    const response = await agent.processRequest(requestFor(defaultContext('echo'), 'hello'));

    expect(response.status).toBe(AgentStatus.FAILURE);
    expect(response.output).toBe('Internal error: boom');
    expect(response.errorMessage).toBe('Internal error: boom');
    expect(agent.isHealthy()).toBe(true);
  });

  it('toggles health explicitly', () => {
    agent.setHealthy(false);
    expect(agent.isHealthy()).toBe(false);
  });

  it('requires AGENT_READ and no roles by default', () => {
    expect(agent.getRequiredPermissions()).toEqual(['AGENT_READ']);
    expect(agent.getRequiredRoles()).toEqual([]);
  });

  it('keeps one context per session until removed', () => {
    const first = agent.getOrCreateContext('s-1');

    expect(agent.getOrCreateContext('s-1')).toBe(first);
    expect(first.sessionId).toBe('s-1');
    expect(agent.removeContext('s-1')).toBe(true);
    expect(agent.removeContext('s-1')).toBe(false);
    expect(agent.getOrCreateContext('s-1')).not.toBe(first);
  });

  it('applies guidance rules case-insensitively', () => {
    agent.updateContext('s-2', 'Put REDIS in front of the database');

    expect(agent.getOrCreateContext('s-2').sessionId).toBe('touched');
  });

  it('renders a generic guidance text', () => {
    expect(agent.generateOutput('caching')).toBe('Implementation Agent guidance:\n\nFor query: caching\n');
  });
});
