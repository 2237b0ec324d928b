/**
 * MCP Server with session lifecycle management
 *
 * Implements BookSearchMcpServer with:
 * - Capability handshake (tools, resources, prompts) and instructions
 * - Dispatch of tool calls to the search tool
 * - Session start/end logging keyed by a per-session UUID
 *
 * Uses @modelcontextprotocol/sdk for MCP protocol handling.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListResourceTemplatesRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import { randomUUID } from 'node:crypto';

import { CapabilityResponder } from './capabilities.js';
import { bookCatalog, type CatalogStore } from './catalog/index.js';
import { getTemplates } from './render/index.js';
import { SEARCH_TOOL_NAME, SearchTool } from './tools/index.js';
import type { ServerConfig } from './types/index.js';
import {
  setSessionId,
  logInfo,
  logError,
  logDebug,
  logToolCall,
  logSessionEvent,
} from './utils/logger.js';
import { getServerIdentity } from './utils/package-info.js';

export interface SessionState {
  sessionId: string;
  startedAt: string | null;
}

export interface ServerOptions {
  config: ServerConfig;
  stdio?: boolean;
  catalog?: CatalogStore;
}

/**
 * Book search MCP server
 */
export class BookSearchMcpServer {
  private readonly config: ServerConfig;
  private readonly server: Server;
  private readonly capabilities: CapabilityResponder;
  private readonly searchTool: SearchTool;

  private sessionState: SessionState = {
    sessionId: '',
    startedAt: null,
  };

  private readonly isStdioMode: boolean;
  private isInitialized = false;
  private isClosed = false;

  constructor(options: ServerOptions) {
    this.config = options.config;
    this.isStdioMode = options.stdio ?? true;

    const templates = getTemplates(this.config.render.locale);

    this.searchTool = new SearchTool(
      { templates, defaultLimit: this.config.search.defaultLimit },
      options.catalog ?? bookCatalog
    );

    this.capabilities = new CapabilityResponder({
      identity: getServerIdentity(),
      instructions: templates.instructions,
    });

    const info = this.capabilities.getServerInfo();
    this.server = new Server(info.serverInfo, {
      capabilities: info.capabilities,
      instructions: templates.instructions,
    });

    this.setupHandlers();
  }

  /**
   * Set up MCP protocol handlers
   */
  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () =>
      this.capabilities.listTools()
    );

    this.server.setRequestHandler(CallToolRequestSchema, async (request) =>
      this.handleToolCall(request.params.name, request.params.arguments)
    );

    this.server.setRequestHandler(ListResourcesRequestSchema, async () =>
      this.capabilities.listResources()
    );

    this.server.setRequestHandler(ListResourceTemplatesRequestSchema, async () =>
      this.capabilities.listResourceTemplates()
    );

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      logDebug('Resource requested', { uri: request.params.uri });
      return this.capabilities.readResource(request.params.uri);
    });

    this.server.setRequestHandler(ListPromptsRequestSchema, async () =>
      this.capabilities.listPrompts()
    );

    this.server.setRequestHandler(GetPromptRequestSchema, async (request) => {
      logDebug('Prompt requested', { name: request.params.name });
      return this.capabilities.getPrompt(request.params.name);
    });

    this.server.onerror = (error): void => {
      logError('MCP server error', error);
    };

    this.server.onclose = (): void => {
      logInfo('MCP server closed');
      this.cleanup();
    };
  }

  /**
   * Handle tool invocation
   *
   * Protocol errors (McpError) propagate to the client as JSON-RPC errors;
   * anything else is reported as an error result.
   */
  handleToolCall(toolName: string, args: Record<string, unknown> | undefined): CallToolResult {
    const startTime = Date.now();

    try {
      switch (toolName) {
        case SEARCH_TOOL_NAME: {
          const result = this.searchTool.search(args);
          logToolCall(toolName, Date.now() - startTime, true);
          return result;
        }

        default:
          logToolCall(toolName, Date.now() - startTime, false, { error: 'Unknown tool' });
          return {
            content: [{ type: 'text', text: `Unknown tool: ${toolName}` }],
            isError: true,
          };
      }
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logToolCall(toolName, Date.now() - startTime, false, { error: errorMessage });

      if (error instanceof McpError) {
        throw error;
      }
      return {
        content: [{ type: 'text', text: `Error: ${errorMessage}` }],
        isError: true,
      };
    }
  }

  /**
   * Start the MCP server
   */
  async start(): Promise<void> {
    this.initializeSession();

    try {
      if (this.isStdioMode) {
        await this.connect(new StdioServerTransport());
        logInfo('MCP server started', { mode: 'stdio' });
      } else {
        // Caller attaches its own transport via connect()
        logInfo('MCP server started', { mode: 'detached' });
      }
    } catch (error) {
      logError('Failed to start MCP server', error);
      throw error;
    }

    this.isInitialized = true;
  }

  /**
   * Attach a transport to the underlying MCP server
   */
  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  private initializeSession(): void {
    this.sessionState = {
      sessionId: randomUUID(),
      startedAt: new Date().toISOString(),
    };
    this.isClosed = false;
    setSessionId(this.sessionState.sessionId);

    logSessionEvent('start', {
      session_id: this.sessionState.sessionId,
      locale: this.config.render.locale,
      default_limit: this.config.search.defaultLimit,
    });
  }

  /**
   * Stop the MCP server gracefully
   */
  async stop(): Promise<void> {
    logInfo('Stopping MCP server');
    this.cleanup();
    await this.server.close();
    logInfo('MCP server stopped');
  }

  /**
   * End the session once, whichever of stop() or transport close comes first
   */
  private cleanup(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    this.isInitialized = false;
    logSessionEvent('end', { session_id: this.sessionState.sessionId });
  }

  getSessionState(): Readonly<SessionState> {
    return { ...this.sessionState };
  }

  isReady(): boolean {
    return this.isInitialized;
  }

  getCapabilities(): CapabilityResponder {
    return this.capabilities;
  }

  /**
   * Get the underlying MCP Server instance
   */
  getMcpServer(): Server {
    return this.server;
  }
}

/**
 * Create and start the MCP server
 */
export async function createServer(config: ServerConfig, stdio = true): Promise<BookSearchMcpServer> {
  const server = new BookSearchMcpServer({ config, stdio });
  await server.start();
  return server;
}
