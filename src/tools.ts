import { z } from 'zod';
import { createLogger } from './logger.js';
import { ErrorFactory } from './errors.js';
import { SSHRuntime } from './runtime.js';
import {
  CommandResult,
  ConnectionSummary,
  FileTransferRecord,
  HistoryEntry,
  MCPTool,
  RemoteFileEntry,
  SessionContext,
  SessionSummary,
  ShellOutput,
  ToolResult
} from './types.js';

const nonEmpty = z.string().min(1);
const timeout = z.number().positive().optional();

const connectArgs = z.object({
  name: nonEmpty,
  host: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65535).optional(),
  username: z.string().min(1).optional(),
  password: z.string().optional(),
  key_filename: z.string().min(1).optional(),
  passphrase: z.string().optional(),
  use_agent: z.boolean().optional(),
  timeout
});

const disconnectArgs = z.object({ name: nonEmpty });

const executeArgs = z.object({ connection: nonEmpty, command: z.string().min(1), timeout });

const uploadArgs = z.object({ connection: nonEmpty, local_path: nonEmpty, remote_path: nonEmpty });

const downloadArgs = z.object({ connection: nonEmpty, remote_path: nonEmpty, local_path: nonEmpty });

const listArgs = z.object({
  connection: nonEmpty,
  path: z.string().min(1).default('.'),
  detailed: z.boolean().default(false)
});

const shellArgs = z
  .object({
    connection: nonEmpty.optional(),
    session_id: nonEmpty.optional(),
    term: z.string().min(1).optional(),
    name: nonEmpty.optional()
  })
  .refine(args => (args.connection === undefined) !== (args.session_id === undefined), {
    message: 'exactly one of connection or session_id is required'
  });

const shellSendArgs = z.object({ session_id: nonEmpty, command: z.string() });

const sessionIdArgs = z.object({ session_id: nonEmpty });

const sessionCreateArgs = z.object({ name: nonEmpty, connection: nonEmpty });

const sessionExecuteArgs = z.object({ session_id: nonEmpty, command: z.string().min(1), timeout });

const sessionHistoryArgs = z.object({ session_id: nonEmpty, count: z.number().int().positive().default(20) });

const sessionImportArgs = z.object({ document: z.string().min(1) });

export class SSHTools {
  private logger = createLogger('SSHTools');

  constructor(private readonly runtime: SSHRuntime) {}

  // SSH Connect Tool
  getSSHConnectTool(): MCPTool {
    return {
      name: 'ssh_connect',
      description: 'Open (or reuse) a named SSH connection. With only a name, the matching profile from the configuration file is used.',
      inputSchema: {
        type: 'object',
        properties: {
          name: { type: 'string', description: 'Connection name, used by every other tool' },
          host: { type: 'string', description: 'Hostname or IP address of the remote server' },
          port: { type: 'number', description: 'SSH port (default: 22)' },
          username: { type: 'string', description: 'Username for SSH authentication' },
          password: { type: 'string', description: 'Password for authentication (if using password auth)' },
          key_filename: { type: 'string', description: 'Path to private key file (if using key auth)' },
          passphrase: { type: 'string', description: 'Passphrase for the private key (if required)' },
          use_agent: { type: 'boolean', description: 'Authenticate through the SSH agent at SSH_AUTH_SOCK' },
          timeout: { type: 'number', description: 'Connection timeout in seconds' }
        },
        required: ['name']
      }
    };
  }

  // SSH Disconnect Tool
  getSSHDisconnectTool(): MCPTool {
    return {
      name: 'ssh_disconnect',
      description: 'Close a named SSH connection. Sessions bound to it stay listed but can no longer run commands.',
      inputSchema: {
        type: 'object',
        properties: {
          name: { type: 'string', description: 'Connection name to disconnect' }
        },
        required: ['name']
      }
    };
  }

  // SSH List Connections Tool
  getSSHListConnectionsTool(): MCPTool {
    return {
      name: 'ssh_list_connections',
      description: 'List all SSH connections and their status',
      inputSchema: {
        type: 'object',
        properties: {},
        required: []
      }
    };
  }

  // SSH Execute Tool
  getSSHExecuteTool(): MCPTool {
    return {
      name: 'ssh_execute',
      description: 'Execute a one-off command on a connection. Not recorded in any session history.',
      inputSchema: {
        type: 'object',
        properties: {
          connection: { type: 'string', description: 'Connection name from ssh_connect' },
          command: { type: 'string', description: 'Command to execute on the remote server' },
          timeout: { type: 'number', description: 'Command timeout in seconds' }
        },
        required: ['connection', 'command']
      }
    };
  }

  // SSH Upload Tool
  getSSHUploadTool(): MCPTool {
    return {
      name: 'ssh_upload',
      description: 'Upload a local file to the remote server over SFTP',
      inputSchema: {
        type: 'object',
        properties: {
          connection: { type: 'string', description: 'Connection name from ssh_connect' },
          local_path: { type: 'string', description: 'Path of the local file' },
          remote_path: { type: 'string', description: 'Destination path on the remote server' }
        },
        required: ['connection', 'local_path', 'remote_path']
      }
    };
  }

  // SSH Download Tool
  getSSHDownloadTool(): MCPTool {
    return {
      name: 'ssh_download',
      description: 'Download a remote file over SFTP',
      inputSchema: {
        type: 'object',
        properties: {
          connection: { type: 'string', description: 'Connection name from ssh_connect' },
          remote_path: { type: 'string', description: 'Path of the remote file' },
          local_path: { type: 'string', description: 'Destination path on the local machine' }
        },
        required: ['connection', 'remote_path', 'local_path']
      }
    };
  }

  // SSH List Tool
  getSSHListTool(): MCPTool {
    return {
      name: 'ssh_list',
      description: 'List a remote directory over SFTP',
      inputSchema: {
        type: 'object',
        properties: {
          connection: { type: 'string', description: 'Connection name from ssh_connect' },
          path: { type: 'string', description: 'Directory path to list', default: '.' },
          detailed: { type: 'boolean', description: 'Include type, size, permissions and modification time', default: false }
        },
        required: ['connection']
      }
    };
  }

  // SSH Shell Tool
  getSSHShellTool(): MCPTool {
    return {
      name: 'ssh_shell',
      description: 'Open an interactive shell. Pass a session_id to attach it to that session, or a connection to start a new session with a shell.',
      inputSchema: {
        type: 'object',
        properties: {
          connection: { type: 'string', description: 'Connection name; a new session is created' },
          session_id: { type: 'string', description: 'Existing session to open the shell in' },
          term: { type: 'string', description: 'Terminal type', default: 'xterm' },
          name: { type: 'string', description: 'Name for the new session when connection is given' }
        },
        required: []
      }
    };
  }

  // Shell Send Tool
  getShellSendTool(): MCPTool {
    return {
      name: 'shell_send',
      description: 'Send one line to the session shell and return the output produced so far',
      inputSchema: {
        type: 'object',
        properties: {
          session_id: { type: 'string', description: 'Session with an open shell' },
          command: { type: 'string', description: 'Line to send; a newline is appended' }
        },
        required: ['session_id', 'command']
      }
    };
  }

  // Shell Read Tool
  getShellReadTool(): MCPTool {
    return {
      name: 'shell_read',
      description: 'Return shell output buffered since the last read',
      inputSchema: {
        type: 'object',
        properties: {
          session_id: { type: 'string', description: 'Session with an open shell' }
        },
        required: ['session_id']
      }
    };
  }

  // Shell Close Tool
  getShellCloseTool(): MCPTool {
    return {
      name: 'shell_close',
      description: 'Close the shell of a session. The session itself is kept.',
      inputSchema: {
        type: 'object',
        properties: {
          session_id: { type: 'string', description: 'Session with an open shell' }
        },
        required: ['session_id']
      }
    };
  }

  // Session Create Tool
  getSessionCreateTool(): MCPTool {
    return {
      name: 'session_create',
      description: 'Create a session bound to a connection. Sessions keep command history, working directory and environment.',
      inputSchema: {
        type: 'object',
        properties: {
          name: { type: 'string', description: 'Session label' },
          connection: { type: 'string', description: 'Connection name from ssh_connect' }
        },
        required: ['name', 'connection']
      }
    };
  }

  // Session List Tool
  getSessionListTool(): MCPTool {
    return {
      name: 'session_list',
      description: 'List all sessions',
      inputSchema: {
        type: 'object',
        properties: {},
        required: []
      }
    };
  }

  // Session Delete Tool
  getSessionDeleteTool(): MCPTool {
    return {
      name: 'session_delete',
      description: 'Delete a session, closing its shell if one is open',
      inputSchema: {
        type: 'object',
        properties: {
          session_id: { type: 'string', description: 'Session to delete' }
        },
        required: ['session_id']
      }
    };
  }

  // Session Execute Tool
  getSessionExecuteTool(): MCPTool {
    return {
      name: 'session_execute',
      description: 'Execute a command in a session, in its working directory and environment. The result is added to the session history.',
      inputSchema: {
        type: 'object',
        properties: {
          session_id: { type: 'string', description: 'Session to run the command in' },
          command: { type: 'string', description: 'Command to execute' },
          timeout: { type: 'number', description: 'Command timeout in seconds' }
        },
        required: ['session_id', 'command']
      }
    };
  }

  // Session History Tool
  getSessionHistoryTool(): MCPTool {
    return {
      name: 'session_history',
      description: 'Return the most recent commands run in a session, oldest first',
      inputSchema: {
        type: 'object',
        properties: {
          session_id: { type: 'string', description: 'Session id' },
          count: { type: 'number', description: 'Number of entries to return', default: 20 }
        },
        required: ['session_id']
      }
    };
  }

  // Session Context Tool
  getSessionContextTool(): MCPTool {
    return {
      name: 'session_context',
      description: 'Return the working directory, environment and status of a session',
      inputSchema: {
        type: 'object',
        properties: {
          session_id: { type: 'string', description: 'Session id' }
        },
        required: ['session_id']
      }
    };
  }

  // Session Export Tool
  getSessionExportTool(): MCPTool {
    return {
      name: 'session_export',
      description: 'Export a session (history and context) as a JSON document',
      inputSchema: {
        type: 'object',
        properties: {
          session_id: { type: 'string', description: 'Session id' }
        },
        required: ['session_id']
      }
    };
  }

  // Session Import Tool
  getSessionImportTool(): MCPTool {
    return {
      name: 'session_import',
      description: 'Recreate a session from a document produced by session_export. The connection it names must be open.',
      inputSchema: {
        type: 'object',
        properties: {
          document: { type: 'string', description: 'JSON document from session_export' }
        },
        required: ['document']
      }
    };
  }

  async executeSSHConnect(args: unknown): Promise<ConnectionSummary> {
    const params = this.parse(connectArgs, 'ssh_connect', args);
    this.logger.info(`Connecting ${params.name}`, { host: params.host, port: params.port, username: params.username });

    return this.runtime.pool.connect({
      name: params.name,
      host: params.host,
      port: params.port,
      username: params.username,
      password: params.password,
      privateKeyPath: params.key_filename,
      passphrase: params.passphrase,
      useAgent: params.use_agent,
      timeout: params.timeout
    });
  }

  async executeSSHDisconnect(args: unknown): Promise<{ success: boolean; name: string; orphanedSessions: string[] }> {
    const params = this.parse(disconnectArgs, 'ssh_disconnect', args);
    const orphanedSessions = this.runtime.sessions.orphanedBy(params.name);
    await this.runtime.pool.disconnect(params.name);
    return { success: true, name: params.name, orphanedSessions };
  }

  async executeSSHListConnections(): Promise<ConnectionSummary[]> {
    return this.runtime.pool.list();
  }

  async executeSSHExecute(args: unknown): Promise<CommandResult> {
    const params = this.parse(executeArgs, 'ssh_execute', args);
    return this.runtime.executor.execute(params.connection, params.command, { timeout: params.timeout });
  }

  async executeSSHUpload(args: unknown): Promise<FileTransferRecord> {
    const params = this.parse(uploadArgs, 'ssh_upload', args);
    return this.runtime.files.upload(params.connection, params.local_path, params.remote_path);
  }

  async executeSSHDownload(args: unknown): Promise<FileTransferRecord> {
    const params = this.parse(downloadArgs, 'ssh_download', args);
    return this.runtime.files.download(params.connection, params.remote_path, params.local_path);
  }

  async executeSSHList(args: unknown): Promise<RemoteFileEntry[]> {
    const params = this.parse(listArgs, 'ssh_list', args);
    return this.runtime.files.list(params.connection, params.path, params.detailed);
  }

  async executeSSHShell(args: unknown): Promise<{ session_id: string; term: string }> {
    const params = this.parse(shellArgs, 'ssh_shell', args);
    const { pool, sessions, shells, credentials } = this.runtime;

    if (params.session_id !== undefined) {
      const opened = await shells.open(params.session_id, { term: params.term });
      return { session_id: opened.sessionId, term: opened.term };
    }

    const connection = params.connection ?? '';
    if (!pool.isActive(connection)) {
      if (!credentials.hasProfile(connection)) {
        throw ErrorFactory.connectionUnavailable(connection, 'not connected');
      }
      await pool.connect({ name: connection });
    }

    const session = sessions.create(params.name ?? `shell-${connection}`, connection);
    try {
      const opened = await shells.open(session.id, { term: params.term });
      return { session_id: opened.sessionId, term: opened.term };
    } catch (error) {
      if (sessions.has(session.id)) {
        sessions.delete(session.id);
      }
      throw error;
    }
  }

  async executeShellSend(args: unknown): Promise<ShellOutput> {
    const params = this.parse(shellSendArgs, 'shell_send', args);
    return this.runtime.shells.send(params.session_id, params.command);
  }

  async executeShellRead(args: unknown): Promise<ShellOutput> {
    const params = this.parse(sessionIdArgs, 'shell_read', args);
    return this.runtime.shells.read(params.session_id);
  }

  async executeShellClose(args: unknown): Promise<{ success: boolean }> {
    const params = this.parse(sessionIdArgs, 'shell_close', args);
    this.runtime.shells.close(params.session_id);
    return { success: true };
  }

  async executeSessionCreate(args: unknown): Promise<SessionSummary> {
    const params = this.parse(sessionCreateArgs, 'session_create', args);
    return this.runtime.sessions.create(params.name, params.connection);
  }

  async executeSessionList(): Promise<SessionSummary[]> {
    return this.runtime.sessions.list();
  }

  async executeSessionDelete(args: unknown): Promise<{ success: boolean }> {
    const params = this.parse(sessionIdArgs, 'session_delete', args);
    this.runtime.sessions.delete(params.session_id);
    return { success: true };
  }

  async executeSessionExecute(args: unknown): Promise<CommandResult> {
    const params = this.parse(sessionExecuteArgs, 'session_execute', args);
    return this.runtime.executor.executeInSession(params.session_id, params.command, { timeout: params.timeout });
  }

  async executeSessionHistory(args: unknown): Promise<HistoryEntry[]> {
    const params = this.parse(sessionHistoryArgs, 'session_history', args);
    return this.runtime.sessions.history(params.session_id, params.count);
  }

  async executeSessionContext(args: unknown): Promise<SessionContext> {
    const params = this.parse(sessionIdArgs, 'session_context', args);
    return this.runtime.sessions.context(params.session_id);
  }

  async executeSessionExport(args: unknown): Promise<{ document: string }> {
    const params = this.parse(sessionIdArgs, 'session_export', args);
    return { document: this.runtime.sessions.export(params.session_id) };
  }

  async executeSessionImport(args: unknown): Promise<SessionSummary> {
    const params = this.parse(sessionImportArgs, 'session_import', args);
    return this.runtime.sessions.import(params.document);
  }

  // Get all tools
  getAllTools(): MCPTool[] {
    return [
      this.getSSHConnectTool(),
      this.getSSHDisconnectTool(),
      this.getSSHListConnectionsTool(),
      this.getSSHExecuteTool(),
      this.getSSHUploadTool(),
      this.getSSHDownloadTool(),
      this.getSSHListTool(),
      this.getSSHShellTool(),
      this.getShellSendTool(),
      this.getShellReadTool(),
      this.getShellCloseTool(),
      this.getSessionCreateTool(),
      this.getSessionListTool(),
      this.getSessionDeleteTool(),
      this.getSessionExecuteTool(),
      this.getSessionHistoryTool(),
      this.getSessionContextTool(),
      this.getSessionExportTool(),
      this.getSessionImportTool()
    ];
  }

  // Execute tool by name
  async executeTool(name: string, args: unknown): Promise<unknown> {
    switch (name) {
      case 'ssh_connect':
        return await this.executeSSHConnect(args);
      case 'ssh_disconnect':
        return await this.executeSSHDisconnect(args);
      case 'ssh_list_connections':
        return await this.executeSSHListConnections();
      case 'ssh_execute':
        return await this.executeSSHExecute(args);
      case 'ssh_upload':
        return await this.executeSSHUpload(args);
      case 'ssh_download':
        return await this.executeSSHDownload(args);
      case 'ssh_list':
        return await this.executeSSHList(args);
      case 'ssh_shell':
        return await this.executeSSHShell(args);
      case 'shell_send':
        return await this.executeShellSend(args);
      case 'shell_read':
        return await this.executeShellRead(args);
      case 'shell_close':
        return await this.executeShellClose(args);
      case 'session_create':
        return await this.executeSessionCreate(args);
      case 'session_list':
        return await this.executeSessionList();
      case 'session_delete':
        return await this.executeSessionDelete(args);
      case 'session_execute':
        return await this.executeSessionExecute(args);
      case 'session_history':
        return await this.executeSessionHistory(args);
      case 'session_context':
        return await this.executeSessionContext(args);
      case 'session_export':
        return await this.executeSessionExport(args);
      case 'session_import':
        return await this.executeSessionImport(args);
      default:
        throw ErrorFactory.methodNotFound(name);
    }
  }

  /**
   * Runs a tool and wraps the outcome as MCP content. Failures become
   * `isError` results carrying the structured error; nothing is thrown.
   */
  async callTool(name: string, args: unknown): Promise<ToolResult> {
    try {
      const result = await this.executeTool(name, args);
      return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
    } catch (error) {
      const failure = ErrorFactory.from(error, { tool: name });
      this.logger.error(`Tool ${name} failed: ${failure.message}`, { code: failure.code });
      return {
        content: [{ type: 'text', text: JSON.stringify({ error: failure.toPayload() }, null, 2) }],
        isError: true
      };
    }
  }

  private parse<S extends z.ZodTypeAny>(schema: S, method: string, args: unknown): z.infer<S> {
    const parsed = schema.safeParse(args ?? {});
    if (!parsed.success) {
      throw ErrorFactory.invalidParams(
        method,
        parsed.error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      );
    }
    return parsed.data;
  }
}
