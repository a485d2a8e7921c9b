/**
 * Health Check Routes
 *
 * - /health       - Basic health (for load balancers, always fast)
 * - /health/live  - Liveness probe (is the process alive?)
 * - /health/ready - Readiness probe (is at least one agent available?)
 */

import { Router, Request, Response } from 'express';
import { AgentManager } from '../agents/manager/AgentManager';
import { HttpStatus } from '../utils/ApiResponse';

interface HealthCheck {
  status: 'ok' | 'error' | 'degraded';
  message?: string;
}

interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  uptime: number;
  version: string;
  checks: Record<string, HealthCheck>;
}

// Track start time for uptime calculation
const startTime = Date.now();

function uptimeSeconds(): number {
  return Math.floor((Date.now() - startTime) / 1000);
}

export function createHealthRoutes(manager: AgentManager): Router {
  const router = Router();

  /**
   * GET /health
   */
  router.get('/', (_req: Request, res: Response) => {
    res.status(HttpStatus.OK).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * GET /health/live
   */
  router.get('/live', (_req: Request, res: Response) => {
    res.status(HttpStatus.OK).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
      uptime: uptimeSeconds(),
    });
  });

  /**
   * GET /health/ready
   * Ready while at least one registered agent is healthy.
   */
  router.get('/ready', (_req: Request, res: Response) => {
    const { totalAgents, availableAgents } = manager.getHealthStatus();
    const checks: Record<string, HealthCheck> = {};

    if (availableAgents === 0) {
      checks.agents = { status: 'error', message: `0/${totalAgents} agents available` };
    } else if (availableAgents < totalAgents) {
      checks.agents = { status: 'degraded', message: `${availableAgents}/${totalAgents} agents available` };
    } else {
      checks.agents = { status: 'ok', message: `${availableAgents}/${totalAgents} agents available` };
    }

    const memUsage = process.memoryUsage();
    const heapUsedMB = Math.round(memUsage.heapUsed / 1024 / 1024);
    const heapTotalMB = Math.round(memUsage.heapTotal / 1024 / 1024);
    const heapPercentage = (memUsage.heapUsed / memUsage.heapTotal) * 100;
    checks.memory = {
      status: heapPercentage > 90 ? 'degraded' : 'ok',
      message: `${heapUsedMB}MB / ${heapTotalMB}MB (${heapPercentage.toFixed(1)}%)`,
    };

    const isReady = availableAgents > 0;
    const degraded = Object.values(checks).some((check) => check.status === 'degraded');
    const status: HealthStatus = {
      status: !isReady ? 'unhealthy' : degraded ? 'degraded' : 'healthy',
      timestamp: new Date().toISOString(),
      uptime: uptimeSeconds(),
      version: process.env.npm_package_version || '1.0.0',
      checks,
    };

    res.status(isReady ? HttpStatus.OK : HttpStatus.SERVICE_UNAVAILABLE).json(status);
  });

  return router;
}
