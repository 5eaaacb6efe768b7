import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type {
  ToolCallResponse,
  ToolDefinition,
  ToolRegistryPort,
} from "../../ports/tools/ToolRegistryPort";

export interface ServerIdentity {
  name: string;
  version: string;
}

export function toMcpTool(definition: ToolDefinition): Tool {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: {
      type: "object",
      properties: { ...definition.schema.properties },
      required: [...(definition.schema.required ?? [])],
    },
  };
}

export function toCallToolResult(response: ToolCallResponse): CallToolResult {
  if (!response.ok) {
    const { kind, ...details } = response.error;
    return {
      isError: true,
      content: [{ type: "text", text: JSON.stringify({ error: kind, ...details }) }],
    };
  }

  const content: CallToolResult["content"] = [{ type: "text", text: response.message }];
  for (const image of response.images ?? []) {
    content.push({ type: "image", data: image.data, mimeType: image.mimeType });
  }

  const result: CallToolResult = { content };
  if (response.data) result.structuredContent = response.data;
  return result;
}

/**
 * Exposes a tool registry over MCP. The server only translates requests; every
 * outcome, failures included, comes back from `dispatch` as a value.
 */
export class McpToolServer {
  private readonly server: Server;

  constructor(
    private readonly tools: ToolRegistryPort,
    private readonly log: LoggerPort,
    identity: ServerIdentity
  ) {
    this.server = new Server(identity, { capabilities: { tools: {} } });

    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      this.log.debug("tools/list");
      return { tools: this.tools.list().map(toMcpTool) };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      const { name, arguments: args } = request.params;
      this.log.debug("tools/call", { tool: name });
      const response = await this.tools.dispatch(
        { toolId: name, arguments: args ?? {} },
        { signal: extra.signal }
      );
      return toCallToolResult(response);
    });

    this.server.oninitialized = () => {
      const client = this.server.getClientVersion();
      this.log.info("MCP session initialized", {
        client: client ? `${client.name} ${client.version}` : "unknown",
      });
    };
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async close(): Promise<void> {
    await this.server.close();
  }
}
