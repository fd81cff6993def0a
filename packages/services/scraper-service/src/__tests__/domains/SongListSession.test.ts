import { describe, it, expect } from 'vitest';
import {
  beginSession,
  cancelSession,
  clearQueue,
  confirmDraft,
  emptySession,
  requestEvent,
  submitField,
  type SongListSession,
} from '../../domains/sessions/SongListSession';
import { ConflictError, InvalidStateError, ValidationError } from '../../application/errors';

const now = new Date('2024-03-01T10:00:00Z');
const noEvent = () => null;

function withDraft(): SongListSession {
  let session = beginSession(emptySession('u1', 'addsong', now), now);
  session = submitField(session, 'Great King', noEvent, now);
  session = submitField(session, 'Michaela', noEvent, now);
  return submitField(session, 'https://example.org/great-king/', noEvent, now);
}

describe('SongListSession', () => {
  it('collects title, artist and url before confirmation', () => {
    const session = withDraft();
    expect(session.state).toBe('awaiting_confirmation');
    expect(session.draft).toEqual({ title: 'Great King', artist: 'Michaela', url: 'https://example.org/great-king/' });
  });

  it('fills the event from the url when one is detected', () => {
    let session = beginSession(emptySession('u1', 'addsong', now), now);
    session = submitField(session, 'Song', noEvent, now);
    session = submitField(session, 'Artist', noEvent, now);
    session = submitField(session, 'https://example.org/song-praise-night-20/', () => 'Praise Night 20', now);
    expect(session.draft.event).toBe('Praise Night 20');
  });

  it('confirm appends exactly one song and resets the draft', () => {
    const confirmed = confirmDraft(withDraft(), now);
    expect(confirmed.queue).toEqual([
      { title: 'Great King', artist: 'Michaela', url: 'https://example.org/great-king/', event: null },
    ]);
    expect(confirmed.draft).toEqual({});
    expect(confirmed.state).toBe('awaiting_title');
  });

  it('cancel from awaiting_artist returns to idle and keeps the queue', () => {
    let session = confirmDraft(withDraft(), now);
    session = submitField(session, 'Second', noEvent, now);
    expect(session.state).toBe('awaiting_artist');

    const cancelled = cancelSession(session, now);
    expect(cancelled.state).toBe('idle');
    expect(cancelled.isActive).toBe(false);
    expect(cancelled.draft).toEqual({});
    expect(cancelled.queue).toEqual(session.queue);
  });

  it('rejects a second cancel', () => {
    const cancelled = cancelSession(withDraft(), now);
    expect(() => cancelSession(cancelled, now)).toThrow(ConflictError);
  });

  it('rejects starting an already active session', () => {
    expect(() => beginSession(withDraft(), now)).toThrow(ConflictError);
  });

  it('validates urls and empty text', () => {
    let session = beginSession(emptySession('u1', 'addsong', now), now);
    expect(() => submitField(session, '   ', noEvent, now)).toThrow(ValidationError);
    session = submitField(session, 'Song', noEvent, now);
    session = submitField(session, 'Artist', noEvent, now);
    expect(() => submitField(session, 'ftp://example.org/x', noEvent, now)).toThrow(ValidationError);
  });

  it('rejects field input while idle or awaiting confirmation', () => {
    expect(() => submitField(emptySession('u1', 'addsong', now), 'x', noEvent, now)).toThrow(InvalidStateError);
    expect(() => submitField(withDraft(), 'x', noEvent, now)).toThrow(InvalidStateError);
  });

  it('takes an explicit event after requestEvent', () => {
    const asking = requestEvent(withDraft(), now);
    expect(asking.state).toBe('awaiting_event');
    const answered = submitField(asking, 'Healing Streams', noEvent, now);
    expect(answered.state).toBe('awaiting_confirmation');
    expect(answered.draft.event).toBe('Healing Streams');
  });

  it('clear empties the queue and returns to idle', () => {
    const cleared = clearQueue(confirmDraft(withDraft(), now), now);
    expect(cleared.queue).toEqual([]);
    expect(cleared.state).toBe('idle');
  });
});
