#!/usr/bin/env node
/**
 * Main entry point for the Pocket Calendar MCP server
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { MCPProtocolHandler, registerCalendarTools } from './server/index.js';
import { ConfigManager } from './services/ConfigManager.js';
import { CalendarManager } from './services/CalendarManager.js';
import { CategoryStore } from './services/CategoryStore.js';
import { SimilarWordsStore } from './services/SimilarWordsStore.js';
import { ICalFileStorage } from './adapters/ICalFileStorage.js';
import { AppConfig } from './types/config.js';

export * from './codec/index.js';
export { ICalFileStorage, loadCalendarFile } from './adapters/ICalFileStorage.js';
export { escapeText, unescapeText } from './utils/icsText.js';
export { formatInstant, parseInstant } from './utils/timezone.js';
export type { CalendarEvent, DayIndex, DayKey, DecodeResult, LoadResult, SaveResult } from './types/calendar.js';

export interface AppState {
  configManager: ConfigManager;
  calendarManager: CalendarManager;
  categoryStore: CategoryStore;
  similarWordsStore: SimilarWordsStore;
  mcpHandler: MCPProtocolHandler;
  isShuttingDown: boolean;
}

let appState: AppState | null = null;

/**
 * Build all services from a loaded configuration
 */
export function initializeServices(configManager: ConfigManager, config: AppConfig): AppState {
  console.error('Initializing core services...');

  const storage = new ICalFileStorage(configManager.resolveStoragePath('eventsFile'), {
    productId: config.calendar.productId,
    includeUid: config.calendar.includeUid
  });
  const categoryStore = new CategoryStore(configManager.resolveStoragePath('categoriesFile'));
  const similarWordsStore = new SimilarWordsStore(configManager.resolveStoragePath('similarWordsFile'));

  const calendarManager = new CalendarManager(
    storage,
    {
      timeZone: config.calendar.timeZone,
      encodeOptions: { productId: config.calendar.productId, includeUid: config.calendar.includeUid }
    },
    similarWordsStore
  );

  const mcpHandler = new MCPProtocolHandler(config.server.name, config.server.version);

  console.error('Core services initialized successfully');

  return {
    configManager,
    calendarManager,
    categoryStore,
    similarWordsStore,
    mcpHandler,
    isShuttingDown: false
  };
}

/**
 * Load the event collection, categories and similar-word groups
 */
export async function loadData(state: AppState): Promise<void> {
  console.error('Loading calendar data...');

  const result = await state.calendarManager.load();
  if (!result.ok) {
    throw result.error;
  }
  if (result.discardedBlockCount > 0) {
    console.error(`Skipped ${result.discardedBlockCount} malformed event blocks`);
  }

  const categories = await state.categoryStore.load();
  console.error(`Loaded ${categories.length} categories`);

  const groups = await state.similarWordsStore.load();
  console.error(`Loaded ${groups.length} similar-word groups`);
}

/**
 * Register MCP tools with their handlers
 */
export function registerMCPTools(state: AppState): void {
  console.error('Registering MCP tools...');

  const toolRegistry = state.mcpHandler.getToolRegistry();
  registerCalendarTools(toolRegistry, {
    calendarManager: state.calendarManager,
    categoryStore: state.categoryStore,
    similarWordsStore: state.similarWordsStore
  });

  console.error(`Registered ${toolRegistry.getToolCount()} MCP tools`);
}

/**
 * Connect to MCP transport
 */
async function connectMCPTransport(state: AppState): Promise<void> {
  console.error('Connecting to MCP transport...');

  const transport = new StdioServerTransport();

  transport.onclose = () => {
    console.error('MCP transport closed');
  };

  transport.onerror = (error: Error) => {
    console.error('MCP transport error:', error);
  };

  await state.mcpHandler.connect(transport);
  console.error('MCP transport connected successfully');
}

/**
 * Set up graceful shutdown handlers
 */
function setupShutdownHandlers(state: AppState): void {
  const shutdown = async (signal: string): Promise<void> => {
    if (state.isShuttingDown) {
      console.error('Shutdown already in progress...');
      return;
    }

    console.error(`Received ${signal}, shutting down gracefully...`);
    state.isShuttingDown = true;

    try {
      console.error('Waiting for pending saves...');
      await state.calendarManager.flush();

      await state.mcpHandler.close();

      console.error('Shutdown completed successfully');
      process.exit(0);
    } catch (error) {
      console.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('uncaughtException', (error) => {
    console.error('Uncaught exception:', error);
    void shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled rejection:', reason);
    void shutdown('unhandledRejection');
  });
}

/**
 * Main application startup sequence
 */
async function main(): Promise<void> {
  console.error('Pocket Calendar starting...');

  try {
    const configManager = new ConfigManager();
    const config = await configManager.loadConfig();
    console.error(`Using configuration at ${configManager.getConfigPath()}`);

    appState = initializeServices(configManager, config);
    await loadData(appState);
    registerMCPTools(appState);
    await connectMCPTransport(appState);
    setupShutdownHandlers(appState);

    console.error('Pocket Calendar started and ready for requests');
    console.error(`- MCP Tools: ${appState.mcpHandler.getToolRegistry().getToolCount()}`);
    console.error(`- Events: ${appState.calendarManager.getEventCount()}`);
    console.error(`- Data directory: ${config.storage.dataDir}`);
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

// argv[1] is the bin symlink when installed globally
if (process.argv[1] && import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href) {
  main().catch((error) => {
    console.error('Failed to start server:', error);
    process.exit(1);
  });
}
