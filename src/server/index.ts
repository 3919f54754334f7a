/**
 * Server module exports
 */

export { MCPProtocolHandler } from './MCPProtocolHandler.js';
export { ToolRegistry, type ToolHandler, type ValidationResult } from './ToolRegistry.js';
export { ALL_TOOLS } from './tools/ToolDefinitions.js';
export { registerCalendarTools } from './tools/registerCalendarTools.js';
export { type ToolContext, serializeEvent } from './tools/ToolHandlers.js';
