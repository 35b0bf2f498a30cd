/**
 * Timeline Fallback Scanner — rebuilds which issues are currently linked to a
 * pull request from its connected/disconnected timeline events.
 */

import { z } from 'zod';
import type { ConnectionState, TimelineEvent } from './types';

export const CONNECTION_EVENTS = ['connected', 'disconnected'] as const;

const connectionEventSchema = z.object({
  event: z.enum(CONNECTION_EVENTS),
  created_at: z.string().nullish(),
  source: z.object({
    issue: z.object({
      id: z.union([z.number(), z.string()]),
    }).nullish(),
  }).nullish(),
});

const eventKindSchema = z.object({ event: z.unknown() });

function isConnectionEntry(entry: unknown): boolean {
  const kind = eventKindSchema.safeParse(entry);
  const event = kind.success ? kind.data.event : undefined;
  return CONNECTION_EVENTS.some(name => name === event);
}

/**
 * Validates a REST timeline listing. Only connected/disconnected entries are
 * checked and returned, keeping the fields used here; other kinds are dropped
 * whatever their shape.
 */
export function parseTimelineEvents(data: unknown): TimelineEvent[] {
  return z.array(z.unknown()).parse(data)
    .filter(isConnectionEntry)
    .map(entry => connectionEventSchema.parse(entry));
}

function isConnectionEvent(event: TimelineEvent): boolean {
  return CONNECTION_EVENTS.some(kind => kind === event.event);
}

// Missing or unparsable timestamps sort as epoch 0.
function timestampOf(event: TimelineEvent): number {
  const time = event.created_at ? Date.parse(event.created_at) : NaN;
  return Number.isNaN(time) ? 0 : time;
}

/**
 * Folds connection events oldest first; the last event per source issue wins.
 * Array.prototype.sort is stable, so same-second events keep their listing order.
 */
export function foldConnectionState(events: TimelineEvent[]): ConnectionState {
  const ordered = events
    .filter(isConnectionEvent)
    .sort((a, b) => timestampOf(a) - timestampOf(b));

  const state: ConnectionState = new Map();
  for (const event of ordered) {
    const issue = event.source?.issue;
    if (!issue) continue;
    state.set(String(issue.id), event.event === 'connected');
  }
  return state;
}

export function connectedIssueIds(state: ConnectionState): string[] {
  return [...state.entries()].filter(([, connected]) => connected).map(([id]) => id);
}

export function hasActiveConnection(state: ConnectionState): boolean {
  return connectedIssueIds(state).length > 0;
}
