import { createServer, Server } from 'http';
import { env } from './config/env';
import { createApp } from './app';
import { createDefaultAgentManager } from './agents';
import { AgentManager } from './agents/manager/AgentManager';
import { Logger } from './utils/logger';

const STALE_SESSION_SWEEP_MS = 5 * 60 * 1000;

/**
 * Agent guidance router: HTTP server plus the periodic sweep of idle
 * consultation sessions.
 */
class AgentRouterServer {
  private readonly manager: AgentManager;
  private readonly httpServer: Server;
  private readonly port: number;
  private sweepTimer?: NodeJS.Timeout;
  private isShuttingDown = false;

  constructor() {
    this.port = env.PORT;
    this.manager = createDefaultAgentManager();
    this.httpServer = createServer(createApp(this.manager));
  }

  public start(): void {
    this.httpServer.listen(this.port, () => {
      const { totalAgents } = this.manager.getHealthStatus();
      Logger.info('Agent guidance router started', {
        port: this.port,
        environment: env.NODE_ENV,
        agents: totalAgents,
      });
    });

    this.sweepTimer = setInterval(() => this.manager.cleanupStaleContexts(), STALE_SESSION_SWEEP_MS);
    this.sweepTimer.unref();

    process.on('SIGTERM', () => this.shutdown('SIGTERM'));
    process.on('SIGINT', () => this.shutdown('SIGINT'));
  }

  private shutdown(signal: string): void {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;
    Logger.info('Shutting down', { signal });

    if (this.sweepTimer) clearInterval(this.sweepTimer);

    this.httpServer.close((error) => {
      if (error) {
        Logger.error('Error while closing HTTP server', error);
        process.exit(1);
      }
      process.exit(0);
    });
  }
}

const server = new AgentRouterServer();
server.start();

export default server;
