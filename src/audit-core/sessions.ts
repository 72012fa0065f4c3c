// src/audit-core/sessions.ts
// Groups one user's chronological actions into inactivity-bounded sessions.

import { DEFAULT_SESSION_GAP_MINUTES } from '@shared/constants';
import { bump, countMap } from './counts';
import { eventTime, type AuditEvent } from './events';
import { compareEvents } from './timeline';
import { minutesBetween } from './timestamps';

export interface Session {
  sessionId: string;
  userId: string;
  startedAt: string;
  endedAt: string;
  durationMinutes: number;
  actions: AuditEvent[];
  actionTypes: Record<string, number>;
  scenarioIds: string[];
}

export interface SessionOptions {
  /** A gap at or above this many minutes starts a new session. */
  gapMinutes?: number;
}

function actionLabel(event: AuditEvent): string {
  return event.eventType === 'user_action' ? event.payload.actionType : event.eventType;
}

function finishSession(userId: string, actions: AuditEvent[]): Session {
  const first = actions[0];
  const last = actions[actions.length - 1];
  const actionTypes = countMap();
  const scenarioIds: string[] = [];
  for (const action of actions) {
    bump(actionTypes, actionLabel(action));
    if (!scenarioIds.includes(action.scenarioId)) scenarioIds.push(action.scenarioId);
  }
  return {
    sessionId: `${userId}@${first.timestamp}`,
    userId,
    startedAt: first.timestamp,
    endedAt: last.timestamp,
    durationMinutes: minutesBetween(first.timestamp, last.timestamp),
    actions,
    actionTypes,
    scenarioIds,
  };
}

/**
 * Partitions one user's actions into sessions in a single pass. Input is
 * expected in timeline order; it is sorted only if it is not.
 */
export function groupSessions(
  userId: string,
  actions: readonly AuditEvent[],
  options: SessionOptions = {},
): Session[] {
  if (actions.length === 0) return [];
  const gapMs = (options.gapMinutes ?? DEFAULT_SESSION_GAP_MINUTES) * 60_000;

  let ordered = actions;
  for (let i = 1; i < actions.length; i++) {
    if (compareEvents(actions[i - 1], actions[i]) > 0) {
      ordered = [...actions].sort(compareEvents);
      break;
    }
  }

  const sessions: Session[] = [];
  let current: AuditEvent[] = [ordered[0]];
  for (let i = 1; i < ordered.length; i++) {
    const gap = eventTime(ordered[i]) - eventTime(ordered[i - 1]);
    if (gap >= gapMs) {
      sessions.push(finishSession(userId, current));
      current = [];
    }
    current.push(ordered[i]);
  }
  sessions.push(finishSession(userId, current));
  return sessions;
}

/**
 * Splits events by actor and groups each user independently. Events without
 * an actor (system events) are not part of any session.
 */
export function groupSessionsByUser(
  events: readonly AuditEvent[],
  options: SessionOptions = {},
): Map<string, Session[]> {
  const byUser = new Map<string, AuditEvent[]>();
  for (const event of events) {
    if (event.actor === null) continue;
    const bucket = byUser.get(event.actor);
    if (bucket) bucket.push(event);
    else byUser.set(event.actor, [event]);
  }

  const sessions = new Map<string, Session[]>();
  for (const [userId, actions] of byUser) {
    sessions.set(userId, groupSessions(userId, actions, options));
  }
  return sessions;
}
