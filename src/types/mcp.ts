/**
 * MCP-specific types and interfaces
 */

import type { SearchMode } from './calendar.js';

/** Events in switched-off categories are left out unless `include_disabled` is set */
export interface ListEventsParams {
  start_date?: string;
  end_date?: string;
  include_disabled?: boolean;
}

export interface GetDayEventsParams {
  date: string;
  include_disabled?: boolean;
}

export interface GetEventParams {
  event_id: string;
}

export interface CreateEventParams {
  title: string;
  start: string;
  end: string;
  category_id?: string;
}

export interface UpdateEventParams {
  event_id: string;
  title?: string;
  start?: string;
  end?: string;
  category_id?: string | null;
}

export interface DeleteEventParams {
  event_id: string;
}

export interface SearchEventsParams {
  query: string;
  mode?: SearchMode;
}

export interface CreateCategoryParams {
  name: string;
}

export interface UpdateCategoryParams {
  category_id: string;
  name?: string;
  enabled?: boolean;
}

export interface DeleteCategoryParams {
  category_id: string;
}

export interface AddSimilarWordGroupParams {
  name: string;
  words: string[];
}

export interface UpdateSimilarWordGroupParams {
  group_id: string;
  name?: string;
  words?: string[];
}

export interface DeleteSimilarWordGroupParams {
  group_id: string;
}

export type EmptyParams = Record<string, never>;

export interface MCPError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface MCPResponse<T = unknown> {
  content?: T;
  error?: MCPError;
}

export interface SerializedEvent {
  id: string;
  title: string;
  start: string;
  end: string;
  day: string;
  duration_minutes: number;
  category_id: string | null;
  category_name: string | null;
}

export interface DayEvents {
  day: string;
  events: SerializedEvent[];
}

export interface DayEventsResponse extends DayEvents {
  hidden_count: number;
}

export interface ListEventsResponse {
  days: DayEvents[];
  total_count: number;
  hidden_count: number;
  message: string;
}

export interface EventMutationResponse {
  event: SerializedEvent;
  saved: boolean;
  message: string;
}

export interface SearchEventsResponse {
  query: string;
  mode: SearchMode;
  groups: Array<{ keyword: string; events: SerializedEvent[] }>;
  total_count: number;
}

export interface CategorySummary {
  id: string;
  name: string;
  enabled: boolean;
  event_count: number;
}

export interface SimilarWordGroupSummary {
  id: string;
  name: string;
  words: string[];
}
