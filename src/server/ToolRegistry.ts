/**
 * Tool Registry - Manages available MCP tools and their execution
 */

import { Tool } from '@modelcontextprotocol/sdk/types.js';
import { Ajv, type ValidateFunction } from 'ajv';
import { MCPResponse } from '../types/mcp.js';
import { isDayKey, isIsoDateTime } from '../utils/timezone.js';

export type ToolHandler<P> = (params: P) => Promise<MCPResponse>;

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

interface RegisteredTool {
  tool: Tool;
  validate: ValidateFunction;
  execute: (params: unknown) => Promise<MCPResponse>;
}

export class ToolRegistry {
  private tools: Map<string, RegisteredTool> = new Map();
  private ajv: Ajv;

  constructor() {
    this.ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
    this.ajv.addFormat('date', isDayKey);
    this.ajv.addFormat('date-time', isIsoDateTime);
  }

  /**
   * Register a new tool. Its handler only ever receives parameters that
   * passed the tool's input schema.
   */
  registerTool<P>(tool: Tool, handler: ToolHandler<P>): void {
    const validate = this.ajv.compile<P>(tool.inputSchema);

    this.tools.set(tool.name, {
      tool,
      validate,
      execute: async (params: unknown) => {
        if (!validate(params)) {
          throw new Error(`Invalid parameters for tool '${tool.name}': ${formatErrors(validate).join(', ')}`);
        }
        return handler(params);
      }
    });
  }

  /**
   * Check if a tool is registered
   */
  hasTool(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Get a specific tool definition
   */
  getTool(name: string): Tool | undefined {
    return this.tools.get(name)?.tool;
  }

  /**
   * Get all registered tools
   */
  getTools(): Tool[] {
    return Array.from(this.tools.values(), entry => entry.tool);
  }

  /**
   * Validate tool parameters against the tool's JSON schema
   */
  validateToolParameters(toolName: string, params: unknown): ValidationResult {
    const entry = this.tools.get(toolName);

    if (!entry) {
      return { valid: false, errors: [`Tool '${toolName}' not found`] };
    }

    if (entry.validate(params)) {
      return { valid: true, errors: [] };
    }

    return { valid: false, errors: formatErrors(entry.validate) };
  }

  /**
   * Execute a tool with the given parameters
   */
  async executeTool(name: string, params: unknown): Promise<MCPResponse> {
    const entry = this.tools.get(name);

    if (!entry) {
      throw new Error(`No handler registered for tool '${name}'`);
    }

    return entry.execute(params);
  }

  /**
   * Unregister a tool
   */
  unregisterTool(name: string): void {
    this.tools.delete(name);
  }

  /**
   * Get the number of registered tools
   */
  getToolCount(): number {
    return this.tools.size;
  }

  /**
   * Clear all registered tools
   */
  clear(): void {
    this.tools.clear();
  }
}

function formatErrors(validate: ValidateFunction): string[] {
  const errors = validate.errors?.map(error => {
    const path = error.instancePath || 'root';
    return `${path}: ${error.message}`;
  });
  return errors && errors.length > 0 ? errors : ['Unknown validation error'];
}
