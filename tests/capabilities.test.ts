/**
 * Tests for CapabilityResponder
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode, LATEST_PROTOCOL_VERSION, McpError } from '@modelcontextprotocol/sdk/types.js';

import { CapabilityResponder, SERVER_CAPABILITIES } from '../src/capabilities.js';
import { RESOURCE_NOT_FOUND } from '../src/types/index.js';

function createResponder(): CapabilityResponder {
  return new CapabilityResponder({
    identity: { name: 'test-server', version: '9.9.9' },
    instructions: 'test instructions',
  });
}

describe('CapabilityResponder', () => {
  describe('getServerInfo', () => {
    it('should report protocol version, capabilities, identity and instructions', () => {
      expect(createResponder().getServerInfo()).toEqual({
        protocolVersion: LATEST_PROTOCOL_VERSION,
        capabilities: { prompts: {}, resources: {}, tools: {} },
        serverInfo: { name: 'test-server', version: '9.9.9' },
        instructions: 'test instructions',
      });
    });

    it('should share the advertised capability set', () => {
      expect(createResponder().getServerInfo().capabilities).toBe(SERVER_CAPABILITIES);
    });
  });

  describe('listings', () => {
    it('should list exactly the search tool', () => {
      const { tools } = createResponder().listTools();

      expect(tools.map((tool) => tool.name)).toEqual(['search']);
    });

    it('should list no resources and no cursor', () => {
      expect(createResponder().listResources()).toEqual({ resources: [] });
    });

    it('should list no resource templates', () => {
      expect(createResponder().listResourceTemplates()).toEqual({ resourceTemplates: [] });
    });

    it('should list no prompts', () => {
      expect(createResponder().listPrompts()).toEqual({ prompts: [] });
    });
  });

  describe('readResource', () => {
    it.each(['book://978-0-123456-47-11', 'file:///etc/hosts', ''])(
      'should fail with resource not found for %j',
      (uri) => {
        const responder = createResponder();

        expect(() => responder.readResource(uri)).toThrow(McpError);
        try {
          responder.readResource(uri);
        } catch (error) {
          expect(error).toMatchObject({ code: RESOURCE_NOT_FOUND, data: { uri } });
        }
      }
    );

    it('should use the JSON-RPC resource-not-found code', () => {
      expect(RESOURCE_NOT_FOUND).toBe(-32002);
    });
  });

  describe('getPrompt', () => {
    it('should fail with InvalidParams for any prompt', () => {
      const responder = createResponder();

      expect(() => responder.getPrompt('summarize')).toThrow(McpError);
      try {
        responder.getPrompt('summarize');
      } catch (error) {
        expect(error).toMatchObject({ code: ErrorCode.InvalidParams, data: { name: 'summarize' } });
      }
    });
  });
});
