/**
 * MCP Protocol Handler - Implements standard MCP server interface
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  CallToolResult,
  ErrorCode,
  McpError
} from '@modelcontextprotocol/sdk/types.js';
import { ToolRegistry } from './ToolRegistry.js';
import { MCPResponse } from '../types/mcp.js';
import { errorMessage } from '../utils/errors.js';

export class MCPProtocolHandler {
  private server: Server;
  private toolRegistry: ToolRegistry;

  constructor(name: string, version: string) {
    this.server = new Server(
      { name, version },
      { capabilities: { tools: {} } }
    );

    this.toolRegistry = new ToolRegistry();
    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      const tools = this.toolRegistry.getTools();
      console.error(`Returning ${tools.length} tools`);
      return { tools };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return this.handleToolCall(name, args ?? {});
    });
  }

  /**
   * Validate and run one tool call, converting the handler's response into
   * an MCP tool result
   */
  async handleToolCall(name: string, args: unknown): Promise<CallToolResult> {
    console.error(`Executing tool: ${name}`);

    if (!this.toolRegistry.hasTool(name)) {
      throw new McpError(ErrorCode.MethodNotFound, `Tool '${name}' not found`);
    }

    const validationResult = this.toolRegistry.validateToolParameters(name, args);
    if (!validationResult.valid) {
      throw new McpError(
        ErrorCode.InvalidParams,
        `Invalid parameters for tool '${name}': ${validationResult.errors.join(', ')}`
      );
    }

    let result: MCPResponse;
    try {
      result = await this.toolRegistry.executeTool(name, args);
    } catch (error) {
      console.error(`Tool ${name} failed:`, error);
      throw new McpError(ErrorCode.InternalError, errorMessage(error));
    }

    if (result.error) {
      throw new McpError(ErrorCode.InternalError, result.error.message, result.error.details);
    }

    return {
      content: [
        {
          type: 'text',
          text: JSON.stringify(result.content ?? null, null, 2)
        }
      ]
    };
  }

  /**
   * Get the underlying MCP server instance
   */
  getServer(): Server {
    return this.server;
  }

  /**
   * Get the tool registry for registering tools
   */
  getToolRegistry(): ToolRegistry {
    return this.toolRegistry;
  }

  /**
   * Connect the server to a transport
   */
  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  /**
   * Close the server connection
   */
  async close(): Promise<void> {
    await this.server.close();
  }
}
