import { describe, expect, it, vi } from 'vitest';

import { EventType } from '../types/index.js';
import { EditorBuffer } from './editor-buffer.js';
import { NoteEventBus } from './event-bus.js';

describe('EditorBuffer', () => {
  it('announces edits on the event bus', () => {
    const bus = new NoteEventBus();
    const listener = vi.fn();
    bus.on(EventType.ContentChanged, listener);
    const buffer = new EditorBuffer(bus);

    buffer.open('note-1', '<p>start</p>');
    buffer.setContent('<p>typed</p>');

    expect(buffer.getContent()).toBe('<p>typed</p>');
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0]).toMatchObject({
      type: EventType.ContentChanged,
      source: 'editor',
      payload: { noteId: 'note-1', length: 12 },
    });
  });

  it('loads content silently when opening a note', () => {
    const bus = new NoteEventBus();
    const listener = vi.fn();
    bus.onAny(listener);
    const buffer = new EditorBuffer(bus);

    buffer.open('note-2', 'hello');

    expect(buffer.currentNoteId).toBe('note-2');
    expect(buffer.getContent()).toBe('hello');
    expect(listener).not.toHaveBeenCalled();
  });

  it('clears the current note', () => {
    const buffer = new EditorBuffer(new NoteEventBus());
    buffer.open('note-3', 'text');
    buffer.clear();

    expect(buffer.currentNoteId).toBeUndefined();
    expect(buffer.getContent()).toBe('');
  });
});
