/**
 * MCP Tool Definitions - Defines the schema and metadata for all MCP tools
 */

import { Tool } from '@modelcontextprotocol/sdk/types.js';
import { SEARCH_MODES } from '../../services/eventSearch.js';

export const LIST_EVENTS_TOOL: Tool = {
  name: 'list_events',
  description: 'List calendar events grouped by day, optionally limited to a range of days',
  inputSchema: {
    type: 'object',
    properties: {
      start_date: {
        type: 'string',
        format: 'date',
        description: 'First day to include (YYYY-MM-DD format)'
      },
      end_date: {
        type: 'string',
        format: 'date',
        description: 'Last day to include (YYYY-MM-DD format)'
      },
      include_disabled: {
        type: 'boolean',
        default: false,
        description: 'Also return events whose category is switched off'
      }
    },
    additionalProperties: false
  }
};

export const GET_DAY_EVENTS_TOOL: Tool = {
  name: 'get_day_events',
  description: 'List the events of one day ordered by start time',
  inputSchema: {
    type: 'object',
    properties: {
      date: {
        type: 'string',
        format: 'date',
        description: 'Day to list (YYYY-MM-DD format)'
      },
      include_disabled: {
        type: 'boolean',
        default: false,
        description: 'Also return events whose category is switched off'
      }
    },
    required: ['date'],
    additionalProperties: false
  }
};

export const GET_EVENT_TOOL: Tool = {
  name: 'get_event',
  description: 'Get a single event by its identifier',
  inputSchema: {
    type: 'object',
    properties: {
      event_id: {
        type: 'string',
        minLength: 1,
        description: 'Identifier of the event'
      }
    },
    required: ['event_id'],
    additionalProperties: false
  }
};

export const CREATE_EVENT_TOOL: Tool = {
  name: 'create_event',
  description: 'Create an event and save the calendar',
  inputSchema: {
    type: 'object',
    properties: {
      title: {
        type: 'string',
        minLength: 1,
        description: 'Event title'
      },
      start: {
        type: 'string',
        format: 'date-time',
        description: 'Start time (ISO 8601 with offset)'
      },
      end: {
        type: 'string',
        format: 'date-time',
        description: 'End time (ISO 8601 with offset)'
      },
      category_id: {
        type: 'string',
        minLength: 1,
        description: 'Identifier of the category to tag the event with'
      }
    },
    required: ['title', 'start', 'end'],
    additionalProperties: false
  }
};

export const UPDATE_EVENT_TOOL: Tool = {
  name: 'update_event',
  description: 'Change fields of an existing event and save the calendar',
  inputSchema: {
    type: 'object',
    properties: {
      event_id: {
        type: 'string',
        minLength: 1,
        description: 'Identifier of the event'
      },
      title: {
        type: 'string',
        minLength: 1,
        description: 'New title'
      },
      start: {
        type: 'string',
        format: 'date-time',
        description: 'New start time (ISO 8601 with offset)'
      },
      end: {
        type: 'string',
        format: 'date-time',
        description: 'New end time (ISO 8601 with offset)'
      },
      category_id: {
        type: ['string', 'null'],
        description: 'New category identifier, or null to remove the category'
      }
    },
    required: ['event_id'],
    additionalProperties: false
  }
};

export const DELETE_EVENT_TOOL: Tool = {
  name: 'delete_event',
  description: 'Delete an event and save the calendar',
  inputSchema: {
    type: 'object',
    properties: {
      event_id: {
        type: 'string',
        minLength: 1,
        description: 'Identifier of the event'
      }
    },
    required: ['event_id'],
    additionalProperties: false
  }
};

export const SEARCH_EVENTS_TOOL: Tool = {
  name: 'search_events',
  description: 'Search event titles by keyword, optionally expanding the keyword to similar words',
  inputSchema: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        minLength: 1,
        description: 'Keyword to look for in event titles'
      },
      mode: {
        type: 'string',
        enum: [...SEARCH_MODES],
        default: 'contains',
        description: 'How the keyword is matched against titles'
      }
    },
    required: ['query'],
    additionalProperties: false
  }
};

export const LIST_CATEGORIES_TOOL: Tool = {
  name: 'list_categories',
  description: 'List categories with the number of events tagged with each',
  inputSchema: {
    type: 'object',
    properties: {},
    additionalProperties: false
  }
};

export const CREATE_CATEGORY_TOOL: Tool = {
  name: 'create_category',
  description: 'Create a category that events can be tagged with',
  inputSchema: {
    type: 'object',
    properties: {
      name: {
        type: 'string',
        minLength: 1,
        description: 'Category name'
      }
    },
    required: ['name'],
    additionalProperties: false
  }
};

export const UPDATE_CATEGORY_TOOL: Tool = {
  name: 'update_category',
  description: 'Rename a category or switch it on or off. Events in switched-off categories are hidden from listings.',
  inputSchema: {
    type: 'object',
    properties: {
      category_id: {
        type: 'string',
        minLength: 1,
        description: 'Identifier of the category'
      },
      name: {
        type: 'string',
        minLength: 1,
        description: 'New category name'
      },
      enabled: {
        type: 'boolean',
        description: 'Whether events in this category are listed'
      }
    },
    required: ['category_id'],
    additionalProperties: false
  }
};

export const DELETE_CATEGORY_TOOL: Tool = {
  name: 'delete_category',
  description: 'Delete a category. Events keep their category identifier.',
  inputSchema: {
    type: 'object',
    properties: {
      category_id: {
        type: 'string',
        minLength: 1,
        description: 'Identifier of the category'
      }
    },
    required: ['category_id'],
    additionalProperties: false
  }
};

export const LIST_SIMILAR_WORD_GROUPS_TOOL: Tool = {
  name: 'list_similar_word_groups',
  description: 'List the groups of similar words used by synonym search',
  inputSchema: {
    type: 'object',
    properties: {},
    additionalProperties: false
  }
};

const similarWordsSchema = {
  type: 'array',
  items: { type: 'string', minLength: 1 },
  minItems: 1,
  description: 'Words that search treats as interchangeable'
};

export const ADD_SIMILAR_WORD_GROUP_TOOL: Tool = {
  name: 'add_similar_word_group',
  description: 'Add a group of similar words for synonym search',
  inputSchema: {
    type: 'object',
    properties: {
      name: {
        type: 'string',
        minLength: 1,
        description: 'Group name, used as the keyword of grouped search results'
      },
      words: similarWordsSchema
    },
    required: ['name', 'words'],
    additionalProperties: false
  }
};

export const UPDATE_SIMILAR_WORD_GROUP_TOOL: Tool = {
  name: 'update_similar_word_group',
  description: 'Rename a similar-word group or replace its words',
  inputSchema: {
    type: 'object',
    properties: {
      group_id: {
        type: 'string',
        minLength: 1,
        description: 'Identifier of the group'
      },
      name: {
        type: 'string',
        minLength: 1,
        description: 'New group name'
      },
      words: similarWordsSchema
    },
    required: ['group_id'],
    additionalProperties: false
  }
};

export const DELETE_SIMILAR_WORD_GROUP_TOOL: Tool = {
  name: 'delete_similar_word_group',
  description: 'Delete a group of similar words',
  inputSchema: {
    type: 'object',
    properties: {
      group_id: {
        type: 'string',
        minLength: 1,
        description: 'Identifier of the group'
      }
    },
    required: ['group_id'],
    additionalProperties: false
  }
};

export const EXPORT_CALENDAR_TOOL: Tool = {
  name: 'export_calendar',
  description: 'Return the whole calendar in its iCalendar file format',
  inputSchema: {
    type: 'object',
    properties: {},
    additionalProperties: false
  }
};

export const ALL_TOOLS: Tool[] = [
  LIST_EVENTS_TOOL,
  GET_DAY_EVENTS_TOOL,
  GET_EVENT_TOOL,
  CREATE_EVENT_TOOL,
  UPDATE_EVENT_TOOL,
  DELETE_EVENT_TOOL,
  SEARCH_EVENTS_TOOL,
  LIST_CATEGORIES_TOOL,
  CREATE_CATEGORY_TOOL,
  UPDATE_CATEGORY_TOOL,
  DELETE_CATEGORY_TOOL,
  LIST_SIMILAR_WORD_GROUPS_TOOL,
  ADD_SIMILAR_WORD_GROUP_TOOL,
  UPDATE_SIMILAR_WORD_GROUP_TOOL,
  DELETE_SIMILAR_WORD_GROUP_TOOL,
  EXPORT_CALENDAR_TOOL
];
