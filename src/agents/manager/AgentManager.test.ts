import { AgentResponse } from '../core/AgentResponse';
import { AgentStatus } from '../core/AgentStatus';
import { AgentType } from '../core/AgentType';
import { AgentDiscovery, DiscoveryResult } from '../discovery/CompositeAgentDiscovery';
import { ArchitectureAgent } from '../impl/ArchitectureAgent';
import { CICDPipelineAgent } from '../impl/CICDPipelineAgent';
import { EventDrivenArchitectureAgent } from '../impl/EventDrivenArchitectureAgent';
import { PairNavigatorAgent } from '../impl/PairNavigatorAgent';
import { SecurityContext } from '../security/SecurityContext';
import { createDefaultAgentManager } from '../index';
import { defaultContext, requestFor, securityContext } from '../../tests/agentFixtures';
import { AgentManager } from './AgentManager';
import { AuditActions } from './AuditTrailManager';

describe('AgentManager', () => {
  describe('registry', () => {
    it('registers every built-in agent', () => {
      const manager = createDefaultAgentManager();
      const agents = manager.listAgents();

      expect(agents).toHaveLength(15);
      expect(Object.isFrozen(agents)).toBe(true);
      expect(manager.getHealthStatus()).toEqual({ totalAgents: 15, availableAgents: 15 });
    });

    it('counts only healthy agents as available', () => {
      const manager = new AgentManager();
      const architecture = new ArchitectureAgent();
      manager.registerAgent(architecture);
      manager.registerAgent(new CICDPipelineAgent());
      architecture.setHealthy(false);

      expect(manager.getHealthStatus()).toEqual({ totalAgents: 2, availableAgents: 1 });
    });

    it('ignores a second registration of the same instance', () => {
      const manager = new AgentManager();
      const agent = new CICDPipelineAgent();
      manager.registerAgent(agent);
      manager.registerAgent(agent);

      expect(manager.listAgents()).toHaveLength(1);
    });

    it('reports whether an agent was unregistered', () => {
      const manager = new AgentManager();
      const agent = new CICDPipelineAgent();
      manager.registerAgent(agent);

      expect(manager.unregisterAgent(agent)).toBe(true);
      expect(manager.unregisterAgent(agent)).toBe(false);
    });

    it('clears every agent', () => {
      const manager = createDefaultAgentManager();
      manager.clearAgents();

      expect(manager.getHealthStatus()).toEqual({ totalAgents: 0, availableAgents: 0 });
    });

    it('queries by capability, technical domain and type', () => {
      const manager = createDefaultAgentManager();

      expect(manager.getAgentsWithCapabilities(['code-review']).map((a) => a.agentType))
        .toContain(AgentType.PAIR_PROGRAMMING);
      expect(manager.getAgentsForTechnicalDomain('CICD').map((a) => a.agentType)).toEqual([AgentType.CICD_PIPELINE]);
      expect(manager.getAgentsForAgentType(AgentType.STORY_STRENGTHENING)).toHaveLength(1);
      expect(manager.getAgentsForAgentType(AgentType.PERFORMANCE)).toEqual([]);
    });
  });

  describe('processRequest', () => {
    it('routes by domain and stamps routing metadata', async () => {
      const manager = createDefaultAgentManager();

      const response = await manager.processRequest(requestFor(defaultContext('cicd'), 'Set up the pipeline'));

      expect(response.status).toBe(AgentStatus.SUCCESS);
      expect(response.output).toBe('CI/CD pipeline guidance: Set up the pipeline');
      expect(response.metadata.agentType).toBe(AgentType.CICD_PIPELINE);
      expect(response.metadata.routedBy).toBe('domain');

      const [entry] = manager.auditTrail.getAllAuditEntries();
      expect(entry.action).toBe(AuditActions.REQUEST_PROCESSED);
      expect(entry.agentType).toBe('cicd');
      expect(entry.userId).toBe('test-user');
      expect(entry.success).toBe(true);
    });

    it('rejects a token that does not verify', async () => {
      const manager = createDefaultAgentManager();
      const request = requestFor(defaultContext('cicd'), 'Set up the pipeline', SecurityContext.fromToken('not-a-token'));

      const response = await manager.processRequest(request);

      expect(response.status).toBe(AgentStatus.FAILURE);
      expect(response.errorMessage).toBe('Authentication failed: Invalid security credentials');
      expect(response.metadata.auditAction).toBe(AuditActions.AUTHENTICATION_FAILED);
      expect(manager.auditTrail.getAllAuditEntries().map((e) => [e.action, e.userId]))
        .toEqual([[AuditActions.AUTHENTICATION_FAILED, 'unknown']]);
    });

    it('rejects callers without the agent\'s roles or permissions', async () => {
      const manager = createDefaultAgentManager();
      const request = requestFor(defaultContext('security'), 'Review the login flow',
        securityContext(['DEVELOPER'], ['AGENT_READ']));

      const response = await manager.processRequest(request);

      expect(response.status).toBe(AgentStatus.FAILURE);
      expect(response.errorMessage).toBe('Authorization failed: Insufficient permissions for security');
      expect(response.metadata.auditAction).toBe(AuditActions.AUTHORIZATION_FAILED);
    });

    it('falls back to an architecture agent when no agent is registered', async () => {
      const manager = new AgentManager();

      const response = await manager.processRequest(requestFor(defaultContext('quantum-ledger')));

      expect(response.status).toBe(AgentStatus.SUCCESS);
      expect(response.metadata.agentType).toBe(AgentType.ARCHITECTURE);
      expect(response.metadata.routedBy).toBe('fallback');
    });

    it('skips an unhealthy architecture agent when falling back', async () => {
      const manager = new AgentManager();
      const architecture = new ArchitectureAgent();
      architecture.setHealthy(false);
      manager.registerAgent(architecture);

      const response = await manager.processRequest(requestFor(defaultContext('quantum-ledger')));

      expect(response.status).toBe(AgentStatus.SUCCESS);
      expect(response.metadata.routedBy).toBe('fallback');
      expect(architecture.getStatus()).toBe(AgentStatus.PENDING);
    });

    it('fails routing when the fallback is disabled', async () => {
      const manager = new AgentManager({ fallbackAgent: null });

      const response = await manager.processRequest(requestFor(defaultContext('quantum-ledger')));

      expect(response.status).toBe(AgentStatus.FAILURE);
      expect(response.errorMessage).toBe('No agent available for domain: quantum-ledger');
      expect(manager.auditTrail.getAllAuditEntries()[0].action).toBe(AuditActions.ROUTING_FAILED);
    });

    it('uses the fallback when discovery times out', async () => {
      const stalled: AgentDiscovery = {
        discoverBestAgent: () => new Promise<DiscoveryResult | undefined>(() => undefined),
      };
      const manager = new AgentManager({ discovery: stalled, discoveryTimeoutMs: 10 });

      const response = await manager.processRequest(requestFor(defaultContext('cicd')));

      expect(response.metadata.routedBy).toBe('fallback');
      expect(response.metadata.agentType).toBe(AgentType.ARCHITECTURE);
    });

    it('audits and rethrows discovery errors', async () => {
      const broken: AgentDiscovery = {
        discoverBestAgent: () => Promise.reject(new Error('registry offline')),
      };
      const manager = new AgentManager({ discovery: broken });

      await expect(manager.processRequest(requestFor(defaultContext('cicd')))).rejects.toThrow('registry offline');
      expect(manager.auditTrail.getAllAuditEntries().map((e) => e.action)).toEqual([AuditActions.REQUEST_FAILED]);
    });

    it('audits a deliberate stop as processed', async () => {
      const manager = createDefaultAgentManager();

      const response = await manager.processRequest(requestFor(defaultContext('story'), 'Checkout story without bullets'));

      expect(response.status).toBe(AgentStatus.STOPPED);
      expect(response.output).toBe('STOP: No functional requirements found');
      expect(response.metadata.routedBy).toBe('domain');
      expect(manager.auditTrail.getAllAuditEntries()[0].action).toBe(AuditActions.REQUEST_PROCESSED);
    });
  });

  describe('sessions', () => {
    it('records session progress', () => {
      const manager = new AgentManager();
      manager.updateSessionProgress('s1', 'Build checkout', { database: 'postgres' }, ['write tests']);

      const session = manager.getSessionContext('s1');
      expect(session?.taskObjective).toBe('Build checkout');
      expect(session?.getArchitecturalDecisions()).toEqual({ database: 'postgres' });
      expect(session?.getNextSteps()).toEqual(['write tests']);
      expect(manager.sessionCount).toBe(1);
    });

    it('removes sessions idle past the timeout', () => {
      const manager = new AgentManager({ sessionTimeoutMinutes: 30 });
      manager.updateSessionProgress('old', 'Old task');
      manager.updateSessionProgress('fresh', 'New task');
      manager.getSessionContext('old')?.setLastUpdated(new Date(Date.now() - 31 * 60_000));

      expect(manager.isSessionStale('old')).toBe(true);
      expect(manager.isSessionStale('fresh')).toBe(false);
      expect(manager.cleanupStaleContexts()).toBe(1);
      expect(manager.getSessionContext('old')).toBeUndefined();
      expect(manager.getSessionContext('fresh')).toBeDefined();
    });

    it('clears agent session state once it goes idle', async () => {
      const manager = new AgentManager({ sessionTimeoutMinutes: 30 });
      const pair = new PairNavigatorAgent();
      manager.registerAgent(pair);

      await manager.processRequest(requestFor(defaultContext('pair-programming'), 'Review the cart module'));
      expect(pair.getIterationCount('session-test')).toBe(1);

      expect(manager.cleanupStaleContexts()).toBe(0);
      expect(pair.getIterationCount('session-test')).toBe(1);

      expect(manager.cleanupStaleContexts(Date.now() + 31 * 60_000)).toBe(1);
      expect(pair.getIterationCount('session-test')).toBe(0);
    });

    it('clears the specialised architecture views of idle sessions', () => {
      const manager = new AgentManager({ sessionTimeoutMinutes: 30 });
      const architecture = new ArchitectureAgent();
      manager.registerAgent(architecture);

      manager.getSharedContextForAgent('s2', architecture);
      const cicd = architecture.getCICDContext('s2');
      expect(architecture.hasContext('s2')).toBe(true);

      expect(manager.cleanupStaleContexts(Date.now() + 31 * 60_000)).toBe(1);
      expect(architecture.hasContext('s2')).toBe(false);
      expect(architecture.getCICDContext('s2')).not.toBe(cicd);
    });

    it('archives a session together with the agent context', () => {
      const manager = new AgentManager();
      const agent = new PairNavigatorAgent();
      manager.updateSessionProgress('s1', 'Review');
      agent.getOrCreateContext('s1');

      expect(manager.archiveSessionContext('s1', agent)).toBe(true);
      expect(agent.hasContext('s1')).toBe(false);
      expect(manager.archiveSessionContext('s1', agent)).toBe(false);
    });
  });

  describe('validateContext', () => {
    it('lists the missing keys', () => {
      const manager = new AgentManager();
      const request = requestFor(defaultContext('architecture', { 'session-id': 's1', 'project-context': 'pos' }));

      const result = manager.validateContext(request);

      expect(result.sufficient).toBe(false);
      expect(result.missingInputs).toEqual([
        'architectural-decisions',
        'current-task',
        'domain-constraints',
        'event-driven-context',
        'cicd-context',
        'configuration-context',
        'resilience-context',
      ]);
      expect(result.insufficientContextMessage).toBe(
        'Context insufficient – re-anchor needed.\nMissing inputs: architectural-decisions, current-task, ' +
        'domain-constraints, event-driven-context, cicd-context, configuration-context, resilience-context\n'
      );
    });

    it('flags a stale session even when every key is present', () => {
      const manager = new AgentManager({ sessionTimeoutMinutes: 30 });
      manager.updateSessionProgress('s1', 'Task');
      manager.getSessionContext('s1')?.setLastUpdated(new Date(Date.now() - 60 * 60_000));
      const properties = Object.fromEntries([
        'session-id', 'project-context', 'architectural-decisions', 'current-task', 'domain-constraints',
        'event-driven-context', 'cicd-context', 'configuration-context', 'resilience-context',
      ].map((key) => [key, key === 'session-id' ? 's1' : 'set']));

      const result = manager.validateContext(requestFor(defaultContext('architecture', properties)));

      expect(result.missingInputs).toEqual(['stale-session-context']);
    });

    it('is sufficient with every key and a fresh session', () => {
      const manager = new AgentManager();
      const properties = Object.fromEntries([
        'session-id', 'project-context', 'architectural-decisions', 'current-task', 'domain-constraints',
        'event-driven-context', 'cicd-context', 'configuration-context', 'resilience-context',
      ].map((key) => [key, 'set']));

      const result = manager.validateContext(requestFor(defaultContext('architecture', properties)));

      expect(result.sufficient).toBe(true);
      expect(result.insufficientContextMessage).toBe('');
    });
  });

  describe('specialised contexts', () => {
    it('feeds agent guidance into the agent\'s session context', () => {
      const manager = new AgentManager();
      const agent = new EventDrivenArchitectureAgent();

      manager.updateSpecializedContext('s1', agent, AgentResponse.success('Use Kafka with a dead letter queue', 0.8));

      expect(agent.getOrCreateContext('s1').getMessageBrokers()).toEqual(['kafka']);
      expect(agent.getOrCreateContext('s1').getDeadLetterQueues()).toEqual(['failed-events']);
    });

    it('shares every specialised view with the architecture agent', () => {
      const manager = new AgentManager();

      const shared = manager.getSharedContextForAgent('s1', new ArchitectureAgent());

      expect(Object.keys(shared)).toEqual(['architecture', 'event-driven', 'cicd', 'configuration', 'resilience']);
    });

    it('includes the session when one exists', () => {
      const manager = new AgentManager();
      manager.updateSessionProgress('s1', 'Task');

      const shared = manager.getSharedContextForAgent('s1', new CICDPipelineAgent());

      expect(Object.keys(shared)).toEqual(['session', 'cicd']);
    });

    it('adds session and pipeline context to CI/CD guidance', () => {
      const manager = new AgentManager();
      const agent = new CICDPipelineAgent();
      agent.updateContext('session-test', 'Use Maven and a blue-green rollout');
      manager.updateSessionProgress('session-test', 'Ship it', { ci: 'jenkins' }, ['a', 'b']);

      const enhanced = manager.enhanceWithContext(
        AgentResponse.success('base', 0.8, ['r1']),
        requestFor(defaultContext('cicd')),
        agent
      );

      expect(enhanced.output).toBe(
        '=== Context-Aware Guidance ===\n\n' +
        'Original Guidance:\nbase\n\n' +
        'Session Context:\n- Task: Ship it\n- Decisions: {"ci":"jenkins"}\n- Next Steps: a, b\n\n' +
        'CI/CD Pipeline Context:\n- build: maven; deploy: blue-green\n\n'
      );
      expect(enhanced.recommendations).toEqual([
        'r1',
        'Integrate security scanning in CI/CD pipeline',
        'Consider deployment strategies: blue-green',
      ]);
      expect(enhanced.confidence).toBe(0.8);
    });

    it('adds broker recommendations to event-driven guidance', () => {
      const manager = new AgentManager();
      const agent = new EventDrivenArchitectureAgent();

      const enhanced = manager.enhanceWithContext(
        AgentResponse.success('base', 0.8),
        requestFor(defaultContext('event-driven')),
        agent
      );

      expect(enhanced.output).toContain('Event-Driven Architecture Context:\n- no event topology recorded\n\n');
      expect(enhanced.recommendations).toEqual([
        'Consider event schema versioning for all brokers',
        'Ensure idempotent event handlers for reliability',
      ]);
      expect(manager.getSessionContext('session-test')).toBeDefined();
    });
  });
});
