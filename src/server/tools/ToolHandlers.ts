/**
 * MCP Tool Handlers - Implementation of tool logic
 */

import {
  AddSimilarWordGroupParams,
  CategorySummary,
  CreateCategoryParams,
  CreateEventParams,
  DayEvents,
  DayEventsResponse,
  DeleteCategoryParams,
  DeleteEventParams,
  DeleteSimilarWordGroupParams,
  EmptyParams,
  EventMutationResponse,
  GetDayEventsParams,
  GetEventParams,
  ListEventsParams,
  ListEventsResponse,
  MCPResponse,
  SearchEventsParams,
  SearchEventsResponse,
  SerializedEvent,
  SimilarWordGroupSummary,
  UpdateCategoryParams,
  UpdateEventParams,
  UpdateSimilarWordGroupParams
} from '../../types/mcp.js';
import { CalendarEvent, Category, DayIndex, SimilarWordsGroup } from '../../types/calendar.js';
import { CalendarManager, EventPatch, MutationResult } from '../../services/CalendarManager.js';
import { CategoryStore } from '../../services/CategoryStore.js';
import { SimilarWordsStore } from '../../services/SimilarWordsStore.js';
import { CategoryLookup } from '../../interfaces/CategoryLookup.js';
import { EventNotFoundError, EventValidationError, errorMessage } from '../../utils/errors.js';
import { getDurationMinutes, parseIsoDateTime, toDayKey } from '../../utils/timezone.js';

export interface ToolContext {
  calendarManager: CalendarManager;
  categoryStore: CategoryStore;
  similarWordsStore: SimilarWordsStore;
}

/**
 * Handler for list_events tool
 */
export async function handleListEvents(
  params: ListEventsParams,
  context: ToolContext
): Promise<MCPResponse<ListEventsResponse>> {
  if (params.start_date && params.end_date && params.start_date > params.end_date) {
    return {
      error: {
        code: 'INVALID_DATE_RANGE',
        message: 'start_date must not be after end_date',
        details: { start_date: params.start_date, end_date: params.end_date }
      }
    };
  }

  const index = context.calendarManager.getEventsInRange(params.start_date, params.end_date);
  const visible = params.include_disabled ? index : filterDayIndex(index, context.categoryStore);
  const days = serializeDayIndex(visible, context);
  const totalCount = days.reduce((count, day) => count + day.events.length, 0);
  const hiddenCount = countEvents(index) - totalCount;

  return {
    content: {
      days,
      total_count: totalCount,
      hidden_count: hiddenCount,
      message:
        hiddenCount > 0
          ? `Found ${totalCount} events on ${days.length} days (${hiddenCount} hidden by category)`
          : `Found ${totalCount} events on ${days.length} days`
    }
  };
}

/**
 * Handler for get_day_events tool
 */
export async function handleGetDayEvents(
  params: GetDayEventsParams,
  context: ToolContext
): Promise<MCPResponse<DayEventsResponse>> {
  const events = context.calendarManager.getEventsForDay(params.date);
  const visible = params.include_disabled ? events : context.categoryStore.filterVisible(events);
  return {
    content: {
      day: params.date,
      events: visible.map(event => serializeEvent(event, context)),
      hidden_count: events.length - visible.length
    }
  };
}

/**
 * Handler for get_event tool
 */
export async function handleGetEvent(
  params: GetEventParams,
  context: ToolContext
): Promise<MCPResponse<{ event: SerializedEvent | null; found: boolean; message?: string }>> {
  const eventId = normalizeEventId(params.event_id);
  const event = context.calendarManager.getEvent(eventId);
  if (!event) {
    return {
      content: {
        event: null,
        found: false,
        message: `Event with ID '${eventId}' not found`
      }
    };
  }

  return { content: { event: serializeEvent(event, context), found: true } };
}

/**
 * Handler for create_event tool
 */
export async function handleCreateEvent(
  params: CreateEventParams,
  context: ToolContext
): Promise<MCPResponse<EventMutationResponse>> {
  const startTime = parseIsoDateTime(params.start);
  const endTime = parseIsoDateTime(params.end);
  if (!startTime || !endTime) {
    return invalidDateResponse(params.start, params.end);
  }

  return runMutation('created', context, () =>
    context.calendarManager.addEvent({
      title: params.title,
      startTime,
      endTime,
      categoryID: params.category_id
    })
  );
}

/**
 * Handler for update_event tool
 */
export async function handleUpdateEvent(
  params: UpdateEventParams,
  context: ToolContext
): Promise<MCPResponse<EventMutationResponse>> {
  const patch: EventPatch = {};

  if (params.title !== undefined) {
    patch.title = params.title;
  }
  if (params.start !== undefined) {
    const startTime = parseIsoDateTime(params.start);
    if (!startTime) {
      return invalidDateResponse(params.start, params.end);
    }
    patch.startTime = startTime;
  }
  if (params.end !== undefined) {
    const endTime = parseIsoDateTime(params.end);
    if (!endTime) {
      return invalidDateResponse(params.start, params.end);
    }
    patch.endTime = endTime;
  }
  if (params.category_id !== undefined) {
    patch.categoryID = params.category_id;
  }

  const eventId = normalizeEventId(params.event_id);
  return runMutation('updated', context, () => context.calendarManager.updateEvent(eventId, patch));
}

/**
 * Handler for delete_event tool
 */
export async function handleDeleteEvent(
  params: DeleteEventParams,
  context: ToolContext
): Promise<MCPResponse<EventMutationResponse>> {
  const eventId = normalizeEventId(params.event_id);
  return runMutation('deleted', context, () => context.calendarManager.deleteEvent(eventId));
}

/**
 * Handler for search_events tool
 */
export async function handleSearchEvents(
  params: SearchEventsParams,
  context: ToolContext
): Promise<MCPResponse<SearchEventsResponse>> {
  const mode = params.mode ?? 'contains';
  const groups = context.calendarManager.searchEvents(params.query, mode);

  return {
    content: {
      query: params.query,
      mode,
      groups: groups.map(group => ({
        keyword: group.keyword,
        events: group.events.map(event => serializeEvent(event, context))
      })),
      total_count: groups.reduce((count, group) => count + group.events.length, 0)
    }
  };
}

/**
 * Handler for list_categories tool
 */
export async function handleListCategories(
  _params: EmptyParams,
  context: ToolContext
): Promise<MCPResponse<{ categories: CategorySummary[] }>> {
  const counts = context.calendarManager.countEventsByCategory();
  return {
    content: {
      categories: context.categoryStore.list().map(category => summarizeCategory(category, counts))
    }
  };
}

/**
 * Handler for create_category tool
 */
export async function handleCreateCategory(
  params: CreateCategoryParams,
  context: ToolContext
): Promise<MCPResponse<{ category: CategorySummary }>> {
  try {
    const category = await context.categoryStore.add(params.name);
    return { content: { category: summarizeCategory(category, new Map()) } };
  } catch (error) {
    return {
      error: {
        code: 'CATEGORY_ERROR',
        message: errorMessage(error),
        details: { name: params.name }
      }
    };
  }
}

/**
 * Handler for update_category tool
 */
export async function handleUpdateCategory(
  params: UpdateCategoryParams,
  context: ToolContext
): Promise<MCPResponse<{ category: CategorySummary; message: string }>> {
  const existing = context.categoryStore.list().find(category => category.id === params.category_id);
  if (!existing) {
    return categoryNotFound(params.category_id);
  }

  const name = params.name?.trim() ?? existing.name;
  if (name === '') {
    return {
      error: {
        code: 'CATEGORY_ERROR',
        message: 'Category name must not be empty',
        details: { category_id: params.category_id, name: params.name }
      }
    };
  }

  const updated: Category = { id: existing.id, name, isEnabled: params.enabled ?? existing.isEnabled };
  try {
    await context.categoryStore.update(updated);
  } catch (error) {
    return { error: { code: 'CATEGORY_ERROR', message: errorMessage(error), details: { category_id: updated.id } } };
  }

  const counts = context.calendarManager.countEventsByCategory();
  return { content: { category: summarizeCategory(updated, counts), message: 'Category updated' } };
}

/**
 * Handler for delete_category tool
 */
export async function handleDeleteCategory(
  params: DeleteCategoryParams,
  context: ToolContext
): Promise<MCPResponse<{ category_id: string; uncategorized_events: number; message: string }>> {
  let removed: boolean;
  try {
    removed = await context.categoryStore.remove(params.category_id);
  } catch (error) {
    return {
      error: { code: 'CATEGORY_ERROR', message: errorMessage(error), details: { category_id: params.category_id } }
    };
  }
  if (!removed) {
    return categoryNotFound(params.category_id);
  }

  return {
    content: {
      category_id: params.category_id,
      // events keep the key; it now resolves to no name
      uncategorized_events: context.calendarManager.countEventsByCategory().get(params.category_id) ?? 0,
      message: 'Category deleted'
    }
  };
}

/**
 * Handler for list_similar_word_groups tool
 */
export async function handleListSimilarWordGroups(
  _params: EmptyParams,
  context: ToolContext
): Promise<MCPResponse<{ groups: SimilarWordGroupSummary[] }>> {
  return { content: { groups: context.similarWordsStore.getGroups().map(summarizeGroup) } };
}

/**
 * Handler for add_similar_word_group tool
 */
export async function handleAddSimilarWordGroup(
  params: AddSimilarWordGroupParams,
  context: ToolContext
): Promise<MCPResponse<{ group: SimilarWordGroupSummary }>> {
  try {
    const group = await context.similarWordsStore.addGroup(params.name, params.words);
    return { content: { group: summarizeGroup(group) } };
  } catch (error) {
    return { error: { code: 'SIMILAR_WORDS_ERROR', message: errorMessage(error), details: { name: params.name } } };
  }
}

/**
 * Handler for update_similar_word_group tool
 */
export async function handleUpdateSimilarWordGroup(
  params: UpdateSimilarWordGroupParams,
  context: ToolContext
): Promise<MCPResponse<{ group: SimilarWordGroupSummary }>> {
  const existing = context.similarWordsStore.getGroups().find(group => group.id === params.group_id);
  if (!existing) {
    return groupNotFound(params.group_id);
  }

  const updated: SimilarWordsGroup = {
    id: existing.id,
    name: params.name ?? existing.name,
    words: params.words ?? existing.words
  };
  try {
    await context.similarWordsStore.updateGroup(updated);
  } catch (error) {
    return { error: { code: 'SIMILAR_WORDS_ERROR', message: errorMessage(error), details: { group_id: updated.id } } };
  }

  const stored = context.similarWordsStore.getGroups().find(group => group.id === updated.id);
  return stored ? { content: { group: summarizeGroup(stored) } } : groupNotFound(updated.id);
}

/**
 * Handler for delete_similar_word_group tool
 */
export async function handleDeleteSimilarWordGroup(
  params: DeleteSimilarWordGroupParams,
  context: ToolContext
): Promise<MCPResponse<{ group_id: string; message: string }>> {
  let removed: boolean;
  try {
    removed = await context.similarWordsStore.removeGroup(params.group_id);
  } catch (error) {
    return {
      error: { code: 'SIMILAR_WORDS_ERROR', message: errorMessage(error), details: { group_id: params.group_id } }
    };
  }
  if (!removed) {
    return groupNotFound(params.group_id);
  }
  return { content: { group_id: params.group_id, message: 'Similar-word group deleted' } };
}

/**
 * Handler for export_calendar tool
 */
export async function handleExportCalendar(
  _params: EmptyParams,
  context: ToolContext
): Promise<MCPResponse<{ ics: string; event_count: number }>> {
  return {
    content: {
      ics: context.calendarManager.exportCalendar(),
      event_count: context.calendarManager.getEventCount()
    }
  };
}

/**
 * Convert an event into the JSON shape returned by the tools
 */
export function serializeEvent(event: CalendarEvent, context: ToolContext): SerializedEvent {
  const categories: CategoryLookup = context.categoryStore;
  const categoryID = event.categoryID ?? null;

  return {
    id: event.id,
    title: event.title,
    start: event.startTime.toISOString(),
    end: event.endTime.toISOString(),
    day: toDayKey(event.startTime, context.calendarManager.getTimeZone()),
    duration_minutes: getDurationMinutes(event.startTime, event.endTime),
    category_id: categoryID,
    category_name: categoryID === null ? null : categories.lookup(categoryID) ?? null
  };
}

function filterDayIndex(index: DayIndex, categories: CategoryStore): DayIndex {
  const filtered: DayIndex = new Map();
  for (const [day, events] of index) {
    const visible = categories.filterVisible(events);
    if (visible.length > 0) {
      filtered.set(day, visible);
    }
  }
  return filtered;
}

function countEvents(index: DayIndex): number {
  let count = 0;
  for (const events of index.values()) {
    count += events.length;
  }
  return count;
}

function serializeDayIndex(index: DayIndex, context: ToolContext): DayEvents[] {
  return Array.from(index, ([day, events]) => ({
    day,
    events: events.map(event => serializeEvent(event, context))
  }));
}

function summarizeCategory(category: Category, counts: Map<string, number>): CategorySummary {
  return {
    id: category.id,
    name: category.name,
    enabled: category.isEnabled,
    event_count: counts.get(category.id) ?? 0
  };
}

function summarizeGroup(group: SimilarWordsGroup): SimilarWordGroupSummary {
  return { id: group.id, name: group.name, words: [...group.words] };
}

/**
 * Ids are matched after trimming, the same way for every event tool
 */
function normalizeEventId(eventId: string): string {
  return eventId.trim();
}

function categoryNotFound(categoryId: string): MCPResponse<never> {
  return {
    error: {
      code: 'CATEGORY_NOT_FOUND',
      message: `Category with ID '${categoryId}' not found`,
      details: { category_id: categoryId }
    }
  };
}

function groupNotFound(groupId: string): MCPResponse<never> {
  return {
    error: {
      code: 'SIMILAR_WORDS_GROUP_NOT_FOUND',
      message: `Similar-word group with ID '${groupId}' not found`,
      details: { group_id: groupId }
    }
  };
}

async function runMutation(
  action: 'created' | 'updated' | 'deleted',
  context: ToolContext,
  mutate: () => Promise<MutationResult>
): Promise<MCPResponse<EventMutationResponse>> {
  let result: MutationResult;
  try {
    result = await mutate();
  } catch (error) {
    if (error instanceof EventNotFoundError) {
      return { error: { code: 'EVENT_NOT_FOUND', message: error.message, details: { event_id: error.eventId } } };
    }
    if (error instanceof EventValidationError) {
      return { error: { code: 'INVALID_EVENT', message: error.message } };
    }
    throw error;
  }

  const { event, save } = result;
  return {
    content: {
      event: serializeEvent(event, context),
      saved: save.ok,
      message: save.ok
        ? `Event ${action}`
        : `Event ${action} but the calendar could not be saved: ${save.error.message}`
    }
  };
}

function invalidDateResponse(start?: string, end?: string): MCPResponse<EventMutationResponse> {
  return {
    error: {
      code: 'INVALID_DATE_FORMAT',
      message: 'Invalid date-time. Use ISO 8601 with a Z or numeric offset.',
      details: { start, end }
    }
  };
}
