#!/usr/bin/env node

/**
 * SSH session server - main entry point
 *
 * Parses CLI flags, loads configuration, starts the MCP server on stdio and
 * shuts it down on SIGINT/SIGTERM.
 */

import { SSHSessionServer } from './mcp-server.js';
import { logger, setLogLevel } from './logger.js';
import { ConfigManager, ServerConfig } from './config.js';
import { ErrorFactory } from './errors.js';

export interface CliArguments {
  version: boolean;
  help: boolean;
  debug: boolean;
}

// CLI argument parsing
export function parseArguments(argv: string[] = process.argv.slice(2)): CliArguments {
  const result: CliArguments = {
    version: false,
    help: false,
    debug: false
  };

  for (const arg of argv) {
    switch (arg) {
      case '--version':
      case '-v':
        result.version = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--debug':
      case '-d':
        result.debug = true;
        break;
    }
  }

  return result;
}

// Print version information
function printVersion(config: ServerConfig): void {
  console.log(`SSH session server v${config.serverVersion}`);
  console.log(`Node.js Version: ${process.version}`);
  console.log(`Platform: ${process.platform} ${process.arch}`);
}

// Print help information
function printHelp(): void {
  console.log('SSH session server - Model Context Protocol server for SSH connections, sessions and shells');
  console.log('');
  console.log('Usage: ssh-session-mcp [options]');
  console.log('');
  console.log('Options:');
  console.log('  -h, --help     Show this help message');
  console.log('  -v, --version  Show version information');
  console.log('  -d, --debug    Enable debug logging');
  console.log('');
  console.log('Environment Variables:');
  console.log('  MCP_SSH_CONFIG                   Connection profile file (default: ~/.mcp_ssh_config.json)');
  console.log('  MCP_SSH_MAX_CONNECTIONS          Maximum SSH connections (default: 10)');
  console.log('  MCP_SSH_MAX_SESSIONS             Maximum sessions (default: 100)');
  console.log('  MCP_SSH_TIMEOUT                  Default command timeout in seconds (default: 30)');
  console.log('  MCP_SSH_CONNECTION_TIMEOUT       Connection timeout in seconds (default: 30)');
  console.log('  MCP_SSH_SESSION_IDLE_TIMEOUT     Idle session cleanup in seconds (default: 86400)');
  console.log('  MCP_SSH_CONNECTION_IDLE_TIMEOUT  Idle connection cleanup in seconds (default: 3600)');
  console.log('  MCP_SSH_HISTORY_LIMIT            History entries kept per session, 0 = all (default: 0)');
  console.log('  MCP_SSH_LOG_LEVEL                Log level (default: INFO)');
  console.log('  MCP_SSH_LOG_FILE                 Log file path (optional)');
  console.log('');
  console.log('Examples:');
  console.log('  ssh-session-mcp                    # Start server normally');
  console.log('  ssh-session-mcp --debug            # Start with debug logging');
  console.log('  ssh-session-mcp --version          # Show version info');
}

// Main application entry point
async function main(): Promise<void> {
  const args = parseArguments();

  // Set debug mode before configuration is read
  if (args.debug) {
    process.env.MCP_SSH_DEBUG = 'true';
  }

  let config: ServerConfig;
  try {
    config = new ConfigManager().getConfig();
  } catch (error) {
    const failure = ErrorFactory.from(error);
    console.error(`[${failure.code}] ${failure.message}`);
    process.exit(1);
  }

  if (args.version) {
    printVersion(config);
    process.exit(0);
  }

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  setLogLevel(config.logLevel);

  const server = new SSHSessionServer(config);
  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, shutting down`);
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  try {
    await server.start();
  } catch (error) {
    logger.error('Failed to start SSH session server', {
      error: error instanceof Error ? error.message : String(error)
    });

    if (ErrorFactory.isSSHSessionError(error)) {
      console.error(`[${error.code}] ${error.message}`);
      if (Object.keys(error.details).length > 0) {
        console.error('Details:', error.details);
      }
    } else {
      console.error('Unexpected error:', error);
    }

    process.exit(1);
  }
}

// Start the application if this is the main module
if (require.main === module) {
  // Handle unhandled promise rejections
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
    process.exit(1);
  });

  // Handle uncaught exceptions
  process.on('uncaughtException', (error) => {
    logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
    process.exit(1);
  });

  main().catch((error: unknown) => {
    logger.error('Application failed to start', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  });
}
