/**
 * Agent Consultation Router
 *
 * - GET    /                          - Registered agents
 * - GET    /health                    - Registry health
 * - GET    /domain/:domain            - Agents for a technical domain
 * - POST   /consult                   - Route a guidance request
 * - GET    /sessions/:sessionId       - Session progress
 * - POST   /sessions/:sessionId/progress - Update session progress
 * - DELETE /sessions/stale            - Drop idle sessions
 * - GET    /audit/compliance          - Audit compliance report
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { Agent } from '../agents/core/Agent';
import { AgentRequest, RequestPriority } from '../agents/core/AgentRequest';
import { AgentResponse } from '../agents/core/AgentResponse';
import { AgentStatus } from '../agents/core/AgentStatus';
import { AGENT_TYPE_INFO } from '../agents/core/AgentType';
import { DefaultContext } from '../agents/context/DefaultContext';
import { AgentManager } from '../agents/manager/AgentManager';
import { AuditActions } from '../agents/manager/AuditTrailManager';
import { SecurityValidator } from '../agents/security/SecurityValidator';
import { DefaultSecurityValidator } from '../agents/security/DefaultSecurityValidator';
import { AgentAuthRequest, attachSecurityContext, requireValidSecurityContext } from '../middleware/auth';
import ApiResponse, { HttpStatus } from '../utils/ApiResponse';
import { Logger } from '../utils/logger';

const consultSchema = z.object({
  domain: z.string().trim().min(1),
  description: z.string().trim().min(1),
  type: z.string().trim().min(1).optional(),
  priority: z.nativeEnum(RequestPriority).optional(),
  properties: z.record(z.unknown()).optional(),
  sessionId: z.string().trim().min(1).optional(),
});

const progressSchema = z.object({
  taskObjective: z.string().optional(),
  decisions: z.record(z.unknown()).default({}),
  nextSteps: z.array(z.string()).default([]),
});

export function describeAgent(agent: Agent) {
  return {
    agentType: agent.agentType,
    displayName: AGENT_TYPE_INFO[agent.agentType].displayName,
    technicalDomain: agent.getTechnicalDomain(),
    capabilities: agent.getCapabilities(),
    status: agent.getStatus(),
    healthy: agent.isHealthy(),
  };
}

/**
 * HTTP status for a consultation outcome: deliberate stops are answered
 * like successes, rejected credentials map to 401/403.
 */
export function statusForResponse(response: AgentResponse): number {
  if (response.status !== AgentStatus.FAILURE) return HttpStatus.OK;
  switch (response.metadata.auditAction) {
    case AuditActions.AUTHENTICATION_FAILED:
      return HttpStatus.UNAUTHORIZED;
    case AuditActions.AUTHORIZATION_FAILED:
      return HttpStatus.FORBIDDEN;
    default:
      return HttpStatus.BAD_REQUEST;
  }
}

export function createAgentRoutes(
  manager: AgentManager,
  validator: SecurityValidator = new DefaultSecurityValidator()
): Router {
  const router = Router();
  const requireCaller = requireValidSecurityContext(validator);

  /**
   * GET /api/agents
   */
  router.get('/', (_req: Request, res: Response) => {
    return ApiResponse.success(res, manager.listAgents().map(describeAgent));
  });

  /**
   * GET /api/agents/health
   */
  router.get('/health', (_req: Request, res: Response) => {
    return ApiResponse.success(res, manager.getHealthStatus());
  });

  /**
   * GET /api/agents/domain/:domain
   */
  router.get('/domain/:domain', (req: Request, res: Response) => {
    return ApiResponse.success(res, manager.getAgentsForTechnicalDomain(req.params.domain).map(describeAgent));
  });

  /**
   * POST /api/agents/consult
   * Body: { domain, description, type?, priority?, properties?, sessionId? }
   */
  router.post('/consult', attachSecurityContext, async (req: AgentAuthRequest, res: Response) => {
    try {
      const body = consultSchema.parse(req.body);
      const { securityContext } = req;
      if (!securityContext) {
        return ApiResponse.unauthorized(res);
      }

      const context = DefaultContext.builder()
        .domain(body.domain)
        .sessionId(body.sessionId)
        .properties(body.properties)
        .build();

      const builder = AgentRequest.builder()
        .agentContext(context)
        .securityContext(securityContext)
        .description(body.description);
      if (body.type) builder.type(body.type);
      if (body.priority) builder.priority(body.priority);

      const response = await manager.processRequest(builder.build());
      Logger.api('/consult', `${body.domain} -> ${response.status}`, {
        agentType: response.metadata.agentType,
        processingTimeMs: response.processingTimeMs,
      });

      return res.status(statusForResponse(response)).json(response.toJSON());
    } catch (error) {
      return ApiResponse.handleException(res, error, 'Agent consultation');
    }
  });

  /**
   * GET /api/agents/sessions/:sessionId
   */
  router.get('/sessions/:sessionId', requireCaller, (req: Request, res: Response) => {
    const session = manager.getSessionContext(req.params.sessionId);
    if (!session) {
      return ApiResponse.notFound(res, 'Session');
    }
    return ApiResponse.success(res, session.toJSON());
  });

  /**
   * POST /api/agents/sessions/:sessionId/progress
   * Body: { taskObjective?, decisions?, nextSteps? }
   */
  router.post('/sessions/:sessionId/progress', requireCaller, (req: Request, res: Response) => {
    try {
      const body = progressSchema.parse(req.body);
      const session = manager.updateSessionProgress(
        req.params.sessionId,
        body.taskObjective,
        body.decisions,
        body.nextSteps
      );
      return ApiResponse.success(res, session.toJSON(), 'Session progress updated');
    } catch (error) {
      return ApiResponse.handleException(res, error, 'Session progress update');
    }
  });

  /**
   * DELETE /api/agents/sessions/stale
   */
  router.delete('/sessions/stale', requireCaller, (_req: Request, res: Response) => {
    return ApiResponse.success(res, { removed: manager.cleanupStaleContexts() });
  });

  /**
   * GET /api/agents/audit/compliance
   */
  router.get('/audit/compliance', requireCaller, (_req: Request, res: Response) => {
    return ApiResponse.success(res, manager.auditTrail.generateComplianceReport());
  });

  return router;
}
