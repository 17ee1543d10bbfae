import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from '../config.js';
import { IPageSessionFactory } from '../core/interfaces/IPageSession.js';
import { SearchEngine } from '../application/services/SearchEngine.js';
import { HttpPageSessionFactory } from '../infrastructure/browser/HttpPageSession.js';
import { SocketManager } from '../infrastructure/transport/SocketManager.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { Logger, createLogger } from '../utils/logger.js';
import { registerSearchTools } from './tools/SearchTools.js';

/**
 * Wires the engine to its adapters: the REST + WebSocket API and, optionally,
 * an MCP server on stdio
 */
export class HarvestServer {
  readonly engine: SearchEngine;
  readonly sockets: SocketManager;
  private webServer: WebServer | null = null;
  private mcpServer: McpServer | null = null;
  private logger: Logger;

  constructor(
    private config: Config,
    sessionFactory?: IPageSessionFactory
  ) {
    const loggerFor = (scope: string) => createLogger(scope, config.server.debug);
    this.logger = loggerFor('HarvestServer');

    this.sockets = new SocketManager(loggerFor('SocketManager'));

    this.engine = new SearchEngine(
      {
        maxWorkers: config.scheduler.maxWorkers,
        historyCapacity: config.scheduler.historyCapacity,
        timing: {
          waitTimeoutMs: config.crawler.waitTimeoutMs,
          pageLoadDelayMs: config.crawler.pageLoadDelayMs,
          itemDelayMs: config.crawler.itemDelayMs,
        },
        discovery: {
          clickDelayMs: config.crawler.clickDelayMs,
          maxShowMoreClicks: config.crawler.maxShowMoreClicks,
        },
      },
      {
        sessionFactory:
          sessionFactory ??
          new HttpPageSessionFactory(
            { userAgent: config.crawler.userAgent, requestTimeoutMs: config.crawler.requestTimeoutMs },
            loggerFor('PageSession')
          ),
        publisher: this.sockets,
        loggerFor,
      }
    );

    this.engine.onJobFinished((snapshot) => {
      this.logger.debug(`${snapshot.id} archived: ${snapshot.items.length} items, ${snapshot.skippedCount} skipped`);
    });

    if (config.web.enabled) {
      this.webServer = new WebServer(
        this.engine,
        this.sockets,
        { port: config.web.port, corsOrigins: config.web.corsOrigins },
        loggerFor('WebServer')
      );
    }

    if (config.mcp.enabled) {
      this.mcpServer = new McpServer({
        name: config.server.name,
        version: config.server.version,
      });
      registerSearchTools(this.mcpServer, this.engine);
    }
  }

  async start(): Promise<void> {
    if (this.webServer) {
      await this.webServer.start();
    }

    if (this.mcpServer) {
      const transport = new StdioServerTransport();
      await this.mcpServer.connect(transport);
      this.logger.info('MCP server running on stdio');
    }

    this.logger.info(`Ready with ${this.config.scheduler.maxWorkers} workers`);
  }

  /**
   * Stops intake, lets in-flight jobs finish (unless `wait` is false), then closes adapters
   */
  async shutdown(options: { wait: boolean } = { wait: true }): Promise<void> {
    this.logger.info('Shutting down...');
    await this.engine.shutdown(options);

    if (this.webServer) {
      await this.webServer.stop();
    }
    if (this.mcpServer) {
      await this.mcpServer.close();
    }
    this.logger.info('Shutdown complete');
  }
}
