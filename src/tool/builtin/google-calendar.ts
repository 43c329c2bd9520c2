// pattern: Imperative Shell

/**
 * Google Calendar tool over the Calendar v3 REST API.
 * The caller's OAuth access token travels in the tool context, never in the
 * model-visible parameters.
 */

import type { Tool, ToolContext, ToolExecutionResult } from '../types.js';
import { errorMessage, toolFailure, toolSuccess } from '../contract.js';
import { isRecord, readArray, readRecord, readString } from '../../adapter/decode.js';

export const GOOGLE_CALENDAR_TOOL_NAME = 'google_calendar';

const CALENDAR_ACTIONS = ['list_events', 'create_event', 'update_event', 'delete_event', 'search_events'] as const;

type CalendarAction = (typeof CALENDAR_ACTIONS)[number];

const DEFAULT_MAX_RESULTS = 10;
const MAX_RESULTS_CAP = 250;

export type GoogleCalendarToolOptions = {
  readonly baseUrl: string;
  readonly timeoutMs: number;
};

export type CalendarEvent = {
  id: string;
  summary: string;
  start: string | null;
  end: string | null;
  description: string;
  location: string;
  attendees: Array<string>;
};

class CalendarApiError extends Error {
  constructor(
    public readonly status: number,
    statusText: string,
  ) {
    super(`${status} ${statusText}`);
    this.name = 'CalendarApiError';
  }
}

function isCalendarAction(value: unknown): value is CalendarAction {
  return typeof value === 'string' && CALENDAR_ACTIONS.some((action) => action === value);
}

function stringParam(params: Record<string, unknown>, name: string): string | undefined {
  const value = params[name];
  return typeof value === 'string' ? value : undefined;
}

function attendeesParam(params: Record<string, unknown>): Array<{ email: string }> | undefined {
  const value = params['attendees'];
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter((email): email is string => typeof email === 'string').map((email) => ({ email }));
}

export function clampMaxResults(value: unknown): number {
  const requested = typeof value === 'number' && Number.isFinite(value) ? Math.floor(value) : DEFAULT_MAX_RESULTS;
  return Math.max(1, Math.min(requested, MAX_RESULTS_CAP));
}

function eventTime(source: Record<string, unknown> | undefined): string | null {
  if (!source) {
    return null;
  }
  return readString(source, 'dateTime') ?? readString(source, 'date') ?? null;
}

export function formatEvent(event: Record<string, unknown>): CalendarEvent {
  const attendees = (readArray(event, 'attendees') ?? [])
    .filter(isRecord)
    .map((attendee) => readString(attendee, 'email'))
    .filter((email): email is string => email !== undefined);

  return {
    id: readString(event, 'id') ?? '',
    summary: readString(event, 'summary') ?? 'No title',
    start: eventTime(readRecord(event, 'start')),
    end: eventTime(readRecord(event, 'end')),
    description: readString(event, 'description') ?? '',
    location: readString(event, 'location') ?? '',
    attendees,
  };
}

export function createGoogleCalendarTool(options: GoogleCalendarToolOptions): Tool {
  const { baseUrl, timeoutMs } = options;

  const fail = (error: string): ToolExecutionResult => toolFailure(GOOGLE_CALENDAR_TOOL_NAME, error);
  const ok = (result: Record<string, unknown>): ToolExecutionResult =>
    toolSuccess(GOOGLE_CALENDAR_TOOL_NAME, result);

  async function call(
    token: string,
    method: 'GET' | 'POST' | 'PUT' | 'DELETE',
    path: string,
    init: { query?: Record<string, string>; body?: Record<string, unknown> } = {},
  ): Promise<unknown> {
    const url = new URL(`${baseUrl}${path}`);
    for (const [key, value] of Object.entries(init.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const response = await fetch(url, {
      method,
      headers: {
        Authorization: `Bearer ${token}`,
        ...(init.body !== undefined && { 'Content-Type': 'application/json' }),
      },
      ...(init.body !== undefined && { body: JSON.stringify(init.body) }),
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      throw new CalendarApiError(response.status, response.statusText);
    }
    if (response.status === 204) {
      return undefined;
    }
    return response.json();
  }

  function eventsPath(params: Record<string, unknown>, eventId?: string): string {
    const calendarId = encodeURIComponent(stringParam(params, 'calendar_id') ?? 'primary');
    const base = `/calendars/${calendarId}/events`;
    return eventId === undefined ? base : `${base}/${encodeURIComponent(eventId)}`;
  }

  async function queryEvents(
    token: string,
    params: Record<string, unknown>,
    searchText?: string,
  ): Promise<Array<CalendarEvent>> {
    const timeMin = stringParam(params, 'time_min');
    const timeMax = stringParam(params, 'time_max');
    const query: Record<string, string> = {
      maxResults: String(clampMaxResults(params['max_results'])),
      singleEvents: 'true',
      orderBy: 'startTime',
      ...(timeMin !== undefined && { timeMin }),
      ...(timeMax !== undefined && { timeMax }),
      ...(searchText !== undefined && { q: searchText }),
    };

    const data = await call(token, 'GET', eventsPath(params), { query });
    const items = isRecord(data) ? readArray(data, 'items') ?? [] : [];
    return items.filter(isRecord).map(formatEvent);
  }

  async function listEvents(token: string, params: Record<string, unknown>): Promise<ToolExecutionResult> {
    const events = await queryEvents(token, params);
    return ok({ events, count: events.length });
  }

  async function searchEvents(token: string, params: Record<string, unknown>): Promise<ToolExecutionResult> {
    const searchText = stringParam(params, 'query') ?? '';
    const events = await queryEvents(token, params, searchText);
    return ok({ events, count: events.length, query: searchText });
  }

  async function createEvent(token: string, params: Record<string, unknown>): Promise<ToolExecutionResult> {
    const summary = stringParam(params, 'summary');
    const startTime = stringParam(params, 'start_time');
    const endTime = stringParam(params, 'end_time');
    if (summary === undefined || startTime === undefined || endTime === undefined) {
      return fail('summary, start_time and end_time required for create_event');
    }

    const description = stringParam(params, 'description');
    const location = stringParam(params, 'location');
    const attendees = attendeesParam(params);
    const body: Record<string, unknown> = {
      summary,
      start: { dateTime: startTime },
      end: { dateTime: endTime },
      ...(description !== undefined && { description }),
      ...(location !== undefined && { location }),
      ...(attendees !== undefined && { attendees }),
    };

    const created = await call(token, 'POST', eventsPath(params), { body });
    const event = isRecord(created) ? created : {};
    return ok({
      event_id: readString(event, 'id') ?? null,
      html_link: readString(event, 'htmlLink') ?? null,
      summary: readString(event, 'summary') ?? null,
    });
  }

  async function updateEvent(token: string, params: Record<string, unknown>): Promise<ToolExecutionResult> {
    const eventId = stringParam(params, 'event_id');
    if (eventId === undefined) {
      return fail('event_id required for update_event');
    }

    const existing = await call(token, 'GET', eventsPath(params, eventId));
    const event: Record<string, unknown> = isRecord(existing) ? { ...existing } : {};

    const summary = stringParam(params, 'summary');
    const description = stringParam(params, 'description');
    const location = stringParam(params, 'location');
    const startTime = stringParam(params, 'start_time');
    const endTime = stringParam(params, 'end_time');
    const attendees = attendeesParam(params);
    if (summary !== undefined) event['summary'] = summary;
    if (description !== undefined) event['description'] = description;
    if (location !== undefined) event['location'] = location;
    if (startTime !== undefined) event['start'] = { dateTime: startTime };
    if (endTime !== undefined) event['end'] = { dateTime: endTime };
    if (attendees !== undefined) event['attendees'] = attendees;

    const updated = await call(token, 'PUT', eventsPath(params, eventId), { body: event });
    const result = isRecord(updated) ? updated : {};
    return ok({
      event_id: readString(result, 'id') ?? eventId,
      summary: readString(result, 'summary') ?? null,
      updated: readString(result, 'updated') ?? null,
    });
  }

  async function deleteEvent(token: string, params: Record<string, unknown>): Promise<ToolExecutionResult> {
    const eventId = stringParam(params, 'event_id');
    if (eventId === undefined) {
      return fail('event_id required for delete_event');
    }

    await call(token, 'DELETE', eventsPath(params, eventId));
    return ok({ event_id: eventId, message: 'Event deleted successfully' });
  }

  const handlers: Record<
    CalendarAction,
    (token: string, params: Record<string, unknown>) => Promise<ToolExecutionResult>
  > = {
    list_events: listEvents,
    search_events: searchEvents,
    create_event: createEvent,
    update_event: updateEvent,
    delete_event: deleteEvent,
  };

  return {
    definition: {
      name: GOOGLE_CALENDAR_TOOL_NAME,
      description:
        'Interact with Google Calendar to list, search, create, update, and delete events. ' +
        'Times are ISO 8601 strings.',
      parameters_schema: {
        type: 'object',
        properties: {
          action: { type: 'string', enum: CALENDAR_ACTIONS, description: 'The calendar action to perform' },
          time_min: { type: 'string', description: "Start of the time range (ISO 8601, e.g. '2024-01-01T00:00:00Z')" },
          time_max: { type: 'string', description: 'End of the time range (ISO 8601)' },
          max_results: {
            type: 'integer',
            description: `Maximum number of events to return (default: ${DEFAULT_MAX_RESULTS}, max: ${MAX_RESULTS_CAP})`,
            default: DEFAULT_MAX_RESULTS,
          },
          event_id: { type: 'string', description: 'ID of the event (required for update_event and delete_event)' },
          summary: { type: 'string', description: 'Event title (required for create_event)' },
          description: { type: 'string', description: 'Event description' },
          start_time: { type: 'string', description: 'Event start time (ISO 8601, required for create_event)' },
          end_time: { type: 'string', description: 'Event end time (ISO 8601, required for create_event)' },
          attendees: { type: 'array', items: { type: 'string' }, description: 'Attendee email addresses' },
          location: { type: 'string', description: 'Event location' },
          query: { type: 'string', description: 'Free text to search for (search_events)' },
          calendar_id: { type: 'string', description: "Calendar ID (default: 'primary')", default: 'primary' },
        },
        required: ['action'],
      },
    },

    async execute(params, context?: ToolContext) {
      const token = context?.access_token;
      if (!token) {
        return fail('Google access token required in context');
      }

      const action = params['action'];
      if (!isCalendarAction(action)) {
        return fail(`Unknown action: ${String(action)}`);
      }

      try {
        return await handlers[action](token, params);
      } catch (error) {
        if (error instanceof CalendarApiError) {
          return fail(`Google Calendar API error: ${error.message}`);
        }
        return fail(`Unexpected error: ${errorMessage(error)}`);
      }
    },
  };
}
