/**
 * Interactive song-list builder
 *
 * idle -> awaiting_title -> awaiting_artist -> awaiting_url -> awaiting_confirmation
 * awaiting_confirmation -> awaiting_event -> awaiting_confirmation
 * awaiting_confirmation --confirm--> awaiting_title
 * any non-idle --cancel--> idle
 */

import { ConflictError, InvalidStateError, ValidationError } from '../../application/errors';

export const DEFAULT_SESSION_TYPE = 'addsong';

export type SessionState =
  | 'idle'
  | 'awaiting_title'
  | 'awaiting_artist'
  | 'awaiting_url'
  | 'awaiting_event'
  | 'awaiting_confirmation';

export interface SongDraft {
  title?: string;
  artist?: string;
  url?: string;
  event?: string;
}

export interface QueuedSong {
  title: string;
  artist: string;
  url: string;
  event: string | null;
}

export interface SongListSession {
  userId: string;
  sessionType: string;
  state: SessionState;
  draft: SongDraft;
  queue: QueuedSong[];
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type EventDetector = (url: string) => string | null;

export function emptySession(userId: string, sessionType: string, now: Date): SongListSession {
  return { userId, sessionType, state: 'idle', draft: {}, queue: [], isActive: false, createdAt: now, updatedAt: now };
}

export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return (url.protocol === 'http:' || url.protocol === 'https:') && url.hostname.length > 0;
  } catch {
    return false;
  }
}

function requireText(field: string, value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new ValidationError(`${field} must not be empty`, { field });
  }
  return trimmed;
}

export function beginSession(session: SongListSession, now: Date): SongListSession {
  if (session.isActive) {
    throw new ConflictError(`User ${session.userId} already has an active ${session.sessionType} session`);
  }
  return { ...session, state: 'awaiting_title', draft: {}, isActive: true, updatedAt: now };
}

export function submitField(
  session: SongListSession,
  value: string,
  detectEvent: EventDetector,
  now: Date
): SongListSession {
  const { draft } = session;

  switch (session.state) {
    case 'awaiting_title':
      return { ...session, draft: { title: requireText('title', value) }, state: 'awaiting_artist', updatedAt: now };
    case 'awaiting_artist':
      return { ...session, draft: { ...draft, artist: requireText('artist', value) }, state: 'awaiting_url', updatedAt: now };
    case 'awaiting_url': {
      const url = requireText('url', value);
      if (!isHttpUrl(url)) {
        throw new ValidationError(`Not a valid http(s) URL: ${url}`, { field: 'url' });
      }
      const event = detectEvent(url);
      return {
        ...session,
        draft: { ...draft, url, ...(event ? { event } : {}) },
        state: 'awaiting_confirmation',
        updatedAt: now,
      };
    }
    case 'awaiting_event':
      return { ...session, draft: { ...draft, event: requireText('event', value) }, state: 'awaiting_confirmation', updatedAt: now };
    case 'idle':
    case 'awaiting_confirmation':
      throw new InvalidStateError(`No field is expected while the session is ${session.state}`, { state: session.state });
  }
}

export function requestEvent(session: SongListSession, now: Date): SongListSession {
  if (session.state !== 'awaiting_confirmation') {
    throw new InvalidStateError(`Cannot set an event while the session is ${session.state}`, { state: session.state });
  }
  return { ...session, state: 'awaiting_event', updatedAt: now };
}

export function confirmDraft(session: SongListSession, now: Date): SongListSession {
  const { title, artist, url, event } = session.draft;
  if (session.state !== 'awaiting_confirmation' || !title || !artist || !url) {
    throw new InvalidStateError(`Nothing to confirm while the session is ${session.state}`, { state: session.state });
  }
  const song: QueuedSong = { title, artist, url, event: event ?? null };
  return { ...session, queue: [...session.queue, song], draft: {}, state: 'awaiting_title', updatedAt: now };
}

export function cancelSession(session: SongListSession, now: Date): SongListSession {
  if (!session.isActive || session.state === 'idle') {
    throw new ConflictError(`No active session to cancel for user ${session.userId}`);
  }
  return { ...session, state: 'idle', draft: {}, isActive: false, updatedAt: now };
}

export function clearQueue(session: SongListSession, now: Date): SongListSession {
  return { ...session, queue: [], draft: {}, state: 'idle', isActive: false, updatedAt: now };
}
