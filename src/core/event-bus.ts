import { EventType, NoteEvent, NoteEventListener, NoteEventPayloads } from '../types/index.js';
import logger from '../utils/logger.js';

type ListenerTable = { [K in EventType]: Array<NoteEventListener<K>> };

export type Unsubscribe = () => void;

/**
 * Synchronous, typed channel between the editor, the save pipeline and
 * whoever observes them.
 *
 * `emit` returns once every listener has been called: listeners registered
 * for the event's type first, in registration order, then the `onAny`
 * listeners. A listener that throws, or whose promise rejects, is logged and
 * does not affect the others. Returned promises are not awaited.
 */
export class NoteEventBus {
  private readonly listeners: ListenerTable = {
    [EventType.ContentChanged]: [],
    [EventType.NoteCreated]: [],
    [EventType.NoteSelected]: [],
    [EventType.NoteSaved]: [],
    [EventType.NoteSaveFailed]: [],
    [EventType.NoteDeleted]: [],
  };
  private readonly anyListeners: NoteEventListener[] = [];

  on<K extends EventType>(type: K, listener: NoteEventListener<K>): Unsubscribe {
    const list = this.listeners[type];
    list.push(listener);
    return () => {
      const at = list.indexOf(listener);
      if (at >= 0) {
        list.splice(at, 1);
      }
    };
  }

  onAny(listener: NoteEventListener): Unsubscribe {
    this.anyListeners.push(listener);
    return () => {
      const at = this.anyListeners.indexOf(listener);
      if (at >= 0) {
        this.anyListeners.splice(at, 1);
      }
    };
  }

  emit<K extends EventType>(type: K, payload: NoteEventPayloads[K], source: string): void {
    const event: NoteEvent<K> = { type, timestamp: new Date(), source, payload };

    // Copies, so a listener may unsubscribe itself mid-delivery.
    for (const listener of [...this.listeners[type]]) {
      this.deliver(listener, event);
    }
    for (const listener of [...this.anyListeners]) {
      this.deliver(listener, event);
    }
  }

  listenerCount(type: EventType): number {
    return this.listeners[type].length;
  }

  private deliver<E extends NoteEvent>(listener: (event: E) => void | Promise<void>, event: E): void {
    try {
      const result = listener(event);
      if (result instanceof Promise) {
        result.catch((err: unknown) => {
          logger.error({ err, eventType: event.type }, 'Event listener rejected');
        });
      }
    } catch (err) {
      logger.error({ err, eventType: event.type }, 'Event listener threw');
    }
  }
}
