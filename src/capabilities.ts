/**
 * Capability handshake and metadata responders
 *
 * The server advertises tools, resources and prompts, but only the search
 * tool has content: resource and prompt listings are always empty and any
 * lookup fails.
 */

import {
  ErrorCode,
  LATEST_PROTOCOL_VERSION,
  McpError,
  type InitializeResult,
  type ListPromptsResult,
  type ListResourceTemplatesResult,
  type ListResourcesResult,
  type ListToolsResult,
  type ServerCapabilities,
} from '@modelcontextprotocol/sdk/types.js';

import { SearchTool } from './tools/index.js';
import { RESOURCE_NOT_FOUND } from './types/index.js';
import type { ServerIdentity } from './utils/package-info.js';

export const SERVER_CAPABILITIES: ServerCapabilities = {
  prompts: {},
  resources: {},
  tools: {},
};

export interface CapabilityResponderOptions {
  identity: ServerIdentity;
  instructions: string;
}

export class CapabilityResponder {
  private readonly identity: ServerIdentity;
  private readonly instructions: string;

  constructor(options: CapabilityResponderOptions) {
    this.identity = options.identity;
    this.instructions = options.instructions;
  }

  getServerInfo(): InitializeResult {
    return {
      protocolVersion: LATEST_PROTOCOL_VERSION,
      capabilities: SERVER_CAPABILITIES,
      serverInfo: { name: this.identity.name, version: this.identity.version },
      instructions: this.instructions,
    };
  }

  listTools(): ListToolsResult {
    return { tools: [SearchTool.definition] };
  }

  listResources(): ListResourcesResult {
    return { resources: [] };
  }

  listResourceTemplates(): ListResourceTemplatesResult {
    return { resourceTemplates: [] };
  }

  listPrompts(): ListPromptsResult {
    return { prompts: [] };
  }

  readResource(uri: string): never {
    throw new McpError(RESOURCE_NOT_FOUND, 'resource_not_found', { uri });
  }

  getPrompt(name: string): never {
    throw new McpError(ErrorCode.InvalidParams, 'prompt not found', { name });
  }
}
