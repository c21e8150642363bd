import { createLogger } from './logger.js';
import defaultConfig, { ServerConfig } from './config.js';
import { SSHRuntime } from './runtime.js';
import { SSHTools } from './tools.js';
import { TransportFactory } from './transport.js';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

export class SSHSessionServer {
  private runtime: SSHRuntime;
  private tools: SSHTools;
  private logger = createLogger('SSHSessionServer');
  private server: Server;

  constructor(private readonly config: ServerConfig = defaultConfig, transportFactory?: TransportFactory) {
    this.runtime = new SSHRuntime({ ...config, profiles: config.connections }, transportFactory);
    this.tools = new SSHTools(this.runtime);

    // Create MCP server instance
    this.server = new Server(
      {
        name: config.serverName,
        version: config.serverVersion,
      },
      {
        capabilities: { tools: {} },
      }
    );

    this.setupHandlers();
  }

  private setupHandlers(): void {
    // Handle tool listing
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return {
        tools: this.tools.getAllTools(),
      };
    });

    // Handle tool execution; failures come back as isError results
    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      this.logger.debug(`Tool call: ${name}`);
      return this.tools.callTool(name, args ?? {});
    });
  }

  async start(): Promise<void> {
    this.logger.info('Starting SSH session server...');
    this.logger.info(`Server name: ${this.config.serverName}`);
    this.logger.info(`Server version: ${this.config.serverVersion}`);
    this.logger.info(`Debug mode: ${this.config.debug}`);
    this.logger.info(`Max connections: ${this.config.maxConnections}`);
    this.logger.info(`Max sessions: ${this.config.maxSessions}`);

    const profiles = Object.keys(this.config.connections);
    if (profiles.length > 0) {
      this.logger.info(`Connection profiles: ${profiles.join(', ')}`);
    }

    try {
      this.runtime.start();

      // Create stdio transport
      const transport = new StdioServerTransport();

      // Connect server to transport
      await this.server.connect(transport);

      this.logger.info('SSH session server started successfully with stdio transport');
    } catch (error) {
      this.logger.error('Failed to start SSH session server', {
        error: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }
  }

  async stop(): Promise<void> {
    this.logger.info('Stopping SSH session server...');

    try {
      // Close MCP server
      await this.server.close();
      this.logger.info('MCP server closed');

      // Close shells, sessions and SSH connections
      await this.runtime.shutdown();

      this.logger.info('SSH session server stopped successfully');
    } catch (error) {
      this.logger.error('Error stopping SSH session server', {
        error: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }
  }

  // Get server info
  getServerInfo(): { name: string; version: string; debug: boolean; maxConnections: number; maxSessions: number } {
    return {
      name: this.config.serverName,
      version: this.config.serverVersion,
      debug: this.config.debug,
      maxConnections: this.config.maxConnections,
      maxSessions: this.config.maxSessions,
    };
  }

  getTools(): SSHTools {
    return this.tools;
  }
}
