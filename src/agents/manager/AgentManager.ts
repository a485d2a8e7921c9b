import { Agent } from '../core/Agent';
import { AgentRequest } from '../core/AgentRequest';
import { AgentResponse } from '../core/AgentResponse';
import { AgentStatus } from '../core/AgentStatus';
import { AgentType } from '../core/AgentType';
import { CICDContext } from '../context/CICDContext';
import { EventDrivenContext } from '../context/EventDrivenContext';
import { AgentDiscovery, CompositeAgentDiscovery } from '../discovery/CompositeAgentDiscovery';
import { ServiceAgentMapping } from '../discovery/ServiceAgentMapping';
import { ArchitectureAgent } from '../impl/ArchitectureAgent';
import { DefaultSecurityValidator } from '../security/DefaultSecurityValidator';
import { SecurityValidator } from '../security/SecurityValidator';
import { env } from '../../config/env';
import { Logger } from '../../utils/logger';
import { ensureError } from '../../utils/errorUtils';
import { AuditAction, AuditActions, AuditTrailManager } from './AuditTrailManager';
import { ContextValidationResult, REQUIRED_CONTEXT_KEYS, STALE_SESSION_MARKER } from './ContextValidationResult';
import { SessionContext } from './SessionContext';

export interface RegistryHealthStatus {
  totalAgents: number;
  availableAgents: number;
}

export interface AgentManagerOptions {
  auditTrail?: AuditTrailManager;
  serviceMapping?: ServiceAgentMapping;
  securityValidator?: SecurityValidator;
  discovery?: AgentDiscovery;
  /**
   * Agent used when discovery finds nothing or times out. `null` disables
   * the fallback; by default a registered architecture agent is used, or
   * one owned by the manager.
   */
  fallbackAgent?: (() => Agent | undefined) | null;
  discoveryTimeoutMs?: number;
  sessionTimeoutMinutes?: number;
}

interface RoutedAgent {
  agent: Agent;
  routedBy: string;
}

const DISCOVERY_TIMED_OUT = Symbol('discovery-timeout');

/**
 * Registry of agents and entry point for every consultation: authenticates
 * the caller, discovers an agent, authorizes the caller against that agent,
 * delegates and audits the outcome. Also keeps per-session progress.
 */
export class AgentManager {
  readonly auditTrail: AuditTrailManager;
  private readonly agents: Agent[] = [];
  private readonly sessions = new Map<string, SessionContext>();
  /** Last time each session's state was touched inside an agent. */
  private readonly agentSessionActivity = new Map<string, number>();
  private readonly securityValidator: SecurityValidator;
  private readonly discovery: AgentDiscovery;
  private readonly fallbackAgent: (() => Agent | undefined) | null;
  private readonly discoveryTimeoutMs: number;
  private readonly sessionTimeoutMs: number;
  private ownFallback?: ArchitectureAgent;

  constructor(options: AgentManagerOptions = {}) {
    this.auditTrail = options.auditTrail ?? new AuditTrailManager();
    this.securityValidator = options.securityValidator ?? new DefaultSecurityValidator();
    this.discovery = options.discovery ?? CompositeAgentDiscovery.withDefaultStrategies(options.serviceMapping);
    this.fallbackAgent = options.fallbackAgent === undefined ? () => this.defaultFallback() : options.fallbackAgent;
    this.discoveryTimeoutMs = options.discoveryTimeoutMs ?? env.AGENT_DISCOVERY_TIMEOUT_MS;
    this.sessionTimeoutMs = (options.sessionTimeoutMinutes ?? env.AGENT_SESSION_TIMEOUT_MINUTES) * 60_000;
  }

  // ==================== REGISTRY ====================

  registerAgent(agent: Agent): void {
    if (this.agents.includes(agent)) return;
    this.agents.push(agent);
    Logger.debug('Agent registered', { agentType: agent.agentType });
  }

  unregisterAgent(agent: Agent): boolean {
    const index = this.agents.indexOf(agent);
    if (index === -1) return false;
    this.agents.splice(index, 1);
    return true;
  }

  clearAgents(): void {
    this.agents.length = 0;
  }

  listAgents(): readonly Agent[] {
    return Object.freeze([...this.agents]);
  }

  getHealthStatus(): RegistryHealthStatus {
    return {
      totalAgents: this.agents.length,
      availableAgents: this.agents.filter((agent) => agent.isHealthy()).length,
    };
  }

  /** Agents with at least one of the given capabilities. */
  getAgentsWithCapabilities(capabilities: Iterable<string>): Agent[] {
    const wanted = new Set(capabilities);
    return this.agents.filter((agent) => agent.getCapabilities().some((capability) => wanted.has(capability)));
  }

  getAgentsForTechnicalDomain(technicalDomain: string): Agent[] {
    const wanted = technicalDomain.toLowerCase();
    return this.agents.filter((agent) => agent.getTechnicalDomain().toLowerCase() === wanted);
  }

  getAgentsForAgentType(agentType: AgentType): Agent[] {
    return this.agents.filter((agent) => agent.agentType === agentType);
  }

  // ==================== REQUEST PROCESSING ====================

  async processRequest(request: AgentRequest): Promise<AgentResponse> {
    const startedAt = Date.now();
    const domain = request.domain;
    const userId = this.securityValidator.extractUserId(request);

    try {
      if (!this.securityValidator.validateSecurityContext(request.securityContext)) {
        return this.reject(domain, userId, AuditActions.AUTHENTICATION_FAILED,
          'Authentication failed: Invalid security credentials', startedAt);
      }

      const routed = await this.route(request);
      if (!routed) {
        return this.reject(domain, userId, AuditActions.ROUTING_FAILED,
          `No agent available for domain: ${domain}`, startedAt);
      }

      if (!this.securityValidator.validateAuthorization(request, routed.agent)) {
        return this.reject(domain, userId, AuditActions.AUTHORIZATION_FAILED,
          `Authorization failed: Insufficient permissions for ${domain}`, startedAt);
      }

      this.touchAgentSession(request.sessionId);
      const response = await routed.agent.processRequest(request);
      // A deliberate stop is a processed request, not a failure.
      const processed = response.status !== AgentStatus.FAILURE;
      this.auditTrail.record(domain, userId,
        processed ? AuditActions.REQUEST_PROCESSED : AuditActions.REQUEST_FAILED, processed);

      return response
        .toBuilder()
        .metadata({ ...response.metadata, agentType: routed.agent.agentType, routedBy: routed.routedBy })
        .processingTimeMs(Date.now() - startedAt)
        .build();
    } catch (error) {
      this.auditTrail.record(domain, userId, AuditActions.REQUEST_FAILED, false);
      Logger.error(`Request for domain ${domain} failed`, ensureError(error));
      throw error;
    }
  }

  private reject(domain: string, userId: string, action: AuditAction, message: string, startedAt: number): AgentResponse {
    this.auditTrail.record(domain, userId, action, false);
    return AgentResponse.builder()
      .errorMessage(message)
      .metadata({ auditAction: action })
      .processingTimeMs(Date.now() - startedAt)
      .build();
  }

  private async route(request: AgentRequest): Promise<RoutedAgent | undefined> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<typeof DISCOVERY_TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(DISCOVERY_TIMED_OUT), this.discoveryTimeoutMs);
    });

    try {
      const result = await Promise.race([this.discovery.discoverBestAgent(request, this.agents), timeout]);
      if (result === DISCOVERY_TIMED_OUT) {
        Logger.warn('Agent discovery timed out, using fallback', {
          domain: request.domain,
          timeoutMs: this.discoveryTimeoutMs,
        });
      } else if (result) {
        return { agent: result.agent, routedBy: result.strategy };
      }
    } finally {
      clearTimeout(timer);
    }

    const fallback = this.fallbackAgent?.();
    return fallback ? { agent: fallback, routedBy: 'fallback' } : undefined;
  }

  private defaultFallback(): Agent {
    const registered = this.getAgentsForAgentType(AgentType.ARCHITECTURE).find((agent) => agent.isHealthy());
    if (registered) return registered;
    if (!this.ownFallback) {
      this.ownFallback = new ArchitectureAgent();
    }
    return this.ownFallback;
  }

  // ==================== SESSION CONTEXT ====================

  updateSessionProgress(
    sessionId: string,
    taskObjective: string | undefined,
    decisions: Readonly<Record<string, unknown>> = {},
    nextSteps: readonly string[] = []
  ): SessionContext {
    const session = this.sessionFor(sessionId);
    session.setTaskObjective(taskObjective);
    session.setArchitecturalDecisions(decisions);
    session.setNextSteps(nextSteps);
    return session;
  }

  getSessionContext(sessionId: string): SessionContext | undefined {
    return this.sessions.get(sessionId);
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  isSessionStale(sessionId: string, now: number = Date.now()): boolean {
    return this.sessions.get(sessionId)?.isStale(this.sessionTimeoutMs, now) ?? false;
  }

  /**
   * Drops sessions idle for longer than the session timeout, both here and
   * in every agent holding state for them. A session is idle only when its
   * progress and its agent activity are both older than the timeout.
   * @returns number of sessions removed
   */
  cleanupStaleContexts(now: number = Date.now()): number {
    const stale = new Set<string>();
    for (const sessionId of new Set([...this.sessions.keys(), ...this.agentSessionActivity.keys()])) {
      const progressStale = this.sessions.get(sessionId)?.isStale(this.sessionTimeoutMs, now) ?? true;
      const lastActivity = this.agentSessionActivity.get(sessionId);
      const activityStale = lastActivity === undefined || now - lastActivity > this.sessionTimeoutMs;
      if (progressStale && activityStale) stale.add(sessionId);
    }

    const holders = this.ownFallback ? [...this.agents, this.ownFallback] : this.agents;
    for (const sessionId of stale) {
      this.sessions.delete(sessionId);
      this.agentSessionActivity.delete(sessionId);
      holders.forEach((agent) => agent.removeContext(sessionId));
    }

    if (stale.size > 0) Logger.info('Removed stale session contexts', { removed: stale.size });
    return stale.size;
  }

  /**
   * Forgets a session here and in the agent's per-session context.
   * @returns whether the manager held the session
   */
  archiveSessionContext(sessionId: string, agent?: Agent): boolean {
    agent?.removeContext(sessionId);
    return this.sessions.delete(sessionId);
  }

  validateContext(request: AgentRequest): ContextValidationResult {
    const startedAt = Date.now();
    const properties = request.agentContext.getProperties();
    const missing = REQUIRED_CONTEXT_KEYS.filter((key) => !(key in properties));

    const sessionId = properties['session-id'];
    if (typeof sessionId === 'string' && this.isSessionStale(sessionId)) {
      missing.push(STALE_SESSION_MARKER);
    }

    return new ContextValidationResult(missing, Date.now() - startedAt);
  }

  // ==================== SPECIALISED CONTEXTS ====================

  updateSpecializedContext(sessionId: string, agent: Agent, response: AgentResponse): void {
    this.touchAgentSession(sessionId);
    agent.updateContext(sessionId, response.output.toLowerCase());
  }

  /**
   * Session progress plus the agent's own context, keyed by its technical
   * domain. The architecture agent also sees every specialised view.
   */
  getSharedContextForAgent(sessionId: string, agent: Agent): Record<string, unknown> {
    const shared: Record<string, unknown> = {};
    const session = this.sessions.get(sessionId);
    if (session) shared.session = session;

    this.touchAgentSession(sessionId);
    shared[agent.getTechnicalDomain()] = agent.getOrCreateContext(sessionId);

    if (agent instanceof ArchitectureAgent) {
      shared['event-driven'] = agent.getEventDrivenContext(sessionId);
      shared.cicd = agent.getCICDContext(sessionId);
      shared.configuration = agent.getConfigurationContext(sessionId);
      shared.resilience = agent.getResilienceContext(sessionId);
    }
    return shared;
  }

  enhanceWithContext(response: AgentResponse, request: AgentRequest, agent: Agent): AgentResponse {
    const sessionId = request.sessionId;
    const session = this.sessionFor(sessionId);
    const recommendations = [...response.recommendations];

    let guidance = '=== Context-Aware Guidance ===\n\n';
    guidance += `Original Guidance:\n${response.output}\n\n`;
    guidance += 'Session Context:\n';
    guidance += `- Task: ${session.taskObjective ?? ''}\n`;
    guidance += `- Decisions: ${JSON.stringify(session.getArchitecturalDecisions())}\n`;
    guidance += `- Next Steps: ${session.getNextSteps().join(', ')}\n\n`;

    this.touchAgentSession(sessionId);
    const context = agent.getOrCreateContext(sessionId);
    if (context instanceof EventDrivenContext) {
      const brokers = context.getMessageBrokers();
      guidance += `Event-Driven Architecture Context:\n- ${context.summarize()}\n\n`;
      recommendations.push(`Consider event schema versioning for ${brokers.length ? brokers.join(', ') : 'all brokers'}`);
      recommendations.push('Ensure idempotent event handlers for reliability');
    }
    if (context instanceof CICDContext) {
      const strategies = context.getDeploymentStrategies();
      guidance += `CI/CD Pipeline Context:\n- ${context.summarize()}\n\n`;
      recommendations.push('Integrate security scanning in CI/CD pipeline');
      recommendations.push(`Consider deployment strategies: ${strategies.length ? strategies.join(', ') : 'none recorded'}`);
    }

    return response.toBuilder().output(guidance).recommendations(recommendations).build();
  }

  private touchAgentSession(sessionId: string): void {
    this.agentSessionActivity.set(sessionId, Date.now());
  }

  private sessionFor(sessionId: string): SessionContext {
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = new SessionContext(sessionId);
      this.sessions.set(sessionId, session);
    }
    return session;
  }
}
