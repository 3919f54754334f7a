import { ToolRegistry } from '../ToolRegistry.js';
import {
  ADD_SIMILAR_WORD_GROUP_TOOL,
  CREATE_CATEGORY_TOOL,
  CREATE_EVENT_TOOL,
  DELETE_CATEGORY_TOOL,
  DELETE_EVENT_TOOL,
  DELETE_SIMILAR_WORD_GROUP_TOOL,
  EXPORT_CALENDAR_TOOL,
  GET_DAY_EVENTS_TOOL,
  GET_EVENT_TOOL,
  LIST_CATEGORIES_TOOL,
  LIST_EVENTS_TOOL,
  LIST_SIMILAR_WORD_GROUPS_TOOL,
  SEARCH_EVENTS_TOOL,
  UPDATE_CATEGORY_TOOL,
  UPDATE_EVENT_TOOL,
  UPDATE_SIMILAR_WORD_GROUP_TOOL
} from './ToolDefinitions.js';
import {
  ToolContext,
  handleAddSimilarWordGroup,
  handleCreateCategory,
  handleCreateEvent,
  handleDeleteCategory,
  handleDeleteEvent,
  handleDeleteSimilarWordGroup,
  handleExportCalendar,
  handleGetDayEvents,
  handleGetEvent,
  handleListCategories,
  handleListEvents,
  handleListSimilarWordGroups,
  handleSearchEvents,
  handleUpdateCategory,
  handleUpdateEvent,
  handleUpdateSimilarWordGroup
} from './ToolHandlers.js';
import {
  AddSimilarWordGroupParams,
  CreateCategoryParams,
  CreateEventParams,
  DeleteCategoryParams,
  DeleteEventParams,
  DeleteSimilarWordGroupParams,
  EmptyParams,
  GetDayEventsParams,
  GetEventParams,
  ListEventsParams,
  SearchEventsParams,
  UpdateCategoryParams,
  UpdateEventParams,
  UpdateSimilarWordGroupParams
} from '../../types/mcp.js';

/**
 * Register every calendar tool against the given services
 */
export function registerCalendarTools(registry: ToolRegistry, context: ToolContext): void {
  registry.registerTool<ListEventsParams>(LIST_EVENTS_TOOL, params => handleListEvents(params, context));
  registry.registerTool<GetDayEventsParams>(GET_DAY_EVENTS_TOOL, params => handleGetDayEvents(params, context));
  registry.registerTool<GetEventParams>(GET_EVENT_TOOL, params => handleGetEvent(params, context));
  registry.registerTool<CreateEventParams>(CREATE_EVENT_TOOL, params => handleCreateEvent(params, context));
  registry.registerTool<UpdateEventParams>(UPDATE_EVENT_TOOL, params => handleUpdateEvent(params, context));
  registry.registerTool<DeleteEventParams>(DELETE_EVENT_TOOL, params => handleDeleteEvent(params, context));
  registry.registerTool<SearchEventsParams>(SEARCH_EVENTS_TOOL, params => handleSearchEvents(params, context));
  registry.registerTool<EmptyParams>(LIST_CATEGORIES_TOOL, params => handleListCategories(params, context));
  registry.registerTool<CreateCategoryParams>(CREATE_CATEGORY_TOOL, params => handleCreateCategory(params, context));
  registry.registerTool<UpdateCategoryParams>(UPDATE_CATEGORY_TOOL, params => handleUpdateCategory(params, context));
  registry.registerTool<DeleteCategoryParams>(DELETE_CATEGORY_TOOL, params => handleDeleteCategory(params, context));
  registry.registerTool<EmptyParams>(LIST_SIMILAR_WORD_GROUPS_TOOL, params =>
    handleListSimilarWordGroups(params, context)
  );
  registry.registerTool<AddSimilarWordGroupParams>(ADD_SIMILAR_WORD_GROUP_TOOL, params =>
    handleAddSimilarWordGroup(params, context)
  );
  registry.registerTool<UpdateSimilarWordGroupParams>(UPDATE_SIMILAR_WORD_GROUP_TOOL, params =>
    handleUpdateSimilarWordGroup(params, context)
  );
  registry.registerTool<DeleteSimilarWordGroupParams>(DELETE_SIMILAR_WORD_GROUP_TOOL, params =>
    handleDeleteSimilarWordGroup(params, context)
  );
  registry.registerTool<EmptyParams>(EXPORT_CALENDAR_TOOL, params => handleExportCalendar(params, context));
}
