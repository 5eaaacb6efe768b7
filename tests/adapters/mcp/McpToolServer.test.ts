import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { McpToolServer, toCallToolResult, toMcpTool } from '../../../src/adapters/mcp/McpToolServer';
import type { ToolCallRequest, ToolCallResponse, ToolRegistryPort } from '../../../src/ports/tools/ToolRegistryPort';
import { RecordingLogger, contentBlocks, firstText, isErrorResult } from '../../helpers/fakes';

const definition = {
  name: 'get_page_direct',
  description: 'Fetch a page',
  schema: {
    type: 'object' as const,
    properties: { page_number: { type: 'integer' as const, minimum: 1, maximum: 150 } },
    required: ['page_number'],
    additionalProperties: false,
  },
};

describe('toMcpTool', () => {
  test('exposes the argument schema as inputSchema', () => {
    expect(toMcpTool(definition)).toEqual({
      name: 'get_page_direct',
      description: 'Fetch a page',
      inputSchema: {
        type: 'object',
        properties: { page_number: { type: 'integer', minimum: 1, maximum: 150 } },
        required: ['page_number'],
      },
    });
  });
});

describe('toCallToolResult', () => {
  test('success carries text, images and structured data', () => {
    expect(
      toCallToolResult({
        ok: true,
        message: 'Content from Page 7',
        data: { page: 7 },
        images: [{ data: 'bWFw', mimeType: 'image/png' }],
      })
    ).toEqual({
      content: [
        { type: 'text', text: 'Content from Page 7' },
        { type: 'image', data: 'bWFw', mimeType: 'image/png' },
      ],
      structuredContent: { page: 7 },
    });
  });

  test('failures are flagged and serialized as JSON', () => {
    expect(
      toCallToolResult({
        ok: false,
        error: { kind: 'DependencyUnavailable', slot: 'search_backend', cause: 'down', message: 'Dependency unavailable' },
      })
    ).toEqual({
      isError: true,
      content: [
        {
          type: 'text',
          text: '{"error":"DependencyUnavailable","slot":"search_backend","cause":"down","message":"Dependency unavailable"}',
        },
      ],
    });
  });
});

describe('McpToolServer', () => {
  async function connect(tools: ToolRegistryPort) {
    const log = new RecordingLogger();
    const server = new McpToolServer(tools, log, { name: 'handbook-test', version: '0.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    const client = new Client({ name: 'handbook-test-client', version: '0.0.0' });
    await server.connect(serverTransport);
    await client.connect(clientTransport);
    return { client, server, log };
  }

  test('lists tools and forwards calls to the registry', async () => {
    const dispatch = jest.fn(
      async (_request: ToolCallRequest, _options?: { signal?: AbortSignal }): Promise<ToolCallResponse> => ({
        ok: true,
        message: 'page text',
      })
    );
    const { client, server, log } = await connect({ list: () => [definition], dispatch });

    try {
      const listed = await client.listTools();
      expect(listed.tools.map((tool) => tool.name)).toEqual(['get_page_direct']);

      const result = await client.callTool({ name: 'get_page_direct', arguments: { page_number: 3 } });
      expect(firstText(result)).toBe('page text');
      expect(isErrorResult(result)).toBe(false);

      const [request, options] = dispatch.mock.calls[0];
      expect(request).toEqual({ toolId: 'get_page_direct', arguments: { page_number: 3 } });
      expect(options?.signal).toBeInstanceOf(AbortSignal);
      expect(log.messages('info')).toContain('MCP session initialized');
    } finally {
      await client.close();
      await server.close();
    }
  });

  test('returns failures as error results instead of protocol errors', async () => {
    const { client, server } = await connect({
      list: () => [],
      dispatch: async (request) => ({
        ok: false,
        error: { kind: 'UnknownToolError', toolId: request.toolId, message: `Unknown tool "${request.toolId}".` },
      }),
    });

    try {
      const result = await client.callTool({ name: 'missing' });
      expect(isErrorResult(result)).toBe(true);
      expect(contentBlocks(result)).toHaveLength(1);
      expect(JSON.parse(firstText(result))).toEqual({
        error: 'UnknownToolError',
        toolId: 'missing',
        message: 'Unknown tool "missing".',
      });
    } finally {
      await client.close();
      await server.close();
    }
  });
});
