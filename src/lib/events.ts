/**
 * Typed publish/subscribe bus for domain events.
 *
 * Publishing is synchronous, so listeners observe events in local-write
 * order rather than in network-completion order. A throwing listener is
 * logged and does not stop delivery to the others.
 */

import type { Visibility } from './types';
import type { EntityKind, OperationStatus, SyncOperationKind } from '@/sync/types';

export type SyncEvent =
  | { type: 'entity.created'; kind: EntityKind; id: string }
  | { type: 'entity.updated'; kind: EntityKind; id: string }
  | { type: 'entity.deleted'; kind: EntityKind; id: string }
  | { type: 'entity.metadataChanged'; kind: EntityKind; id: string }
  | {
      type: 'entity.visibilityChanged';
      kind: EntityKind;
      id: string;
      oldVisibility: Visibility;
      newVisibility: Visibility;
    }
  | { type: 'image.uploadPending'; kind: EntityKind; id: string }
  | { type: 'image.uploadCompleted'; kind: EntityKind; id: string }
  | {
      type: 'sync.operationChanged';
      kind: EntityKind;
      id: string;
      operation: SyncOperationKind;
      status: OperationStatus;
    };

export type SyncEventType = SyncEvent['type'];
export type SyncEventOf<K extends SyncEventType> = Extract<SyncEvent, { type: K }>;
export type SyncEventListener<E extends SyncEvent = SyncEvent> = (event: E) => void;

function isEventOf<K extends SyncEventType>(event: SyncEvent, type: K): event is SyncEventOf<K> {
  return event.type === type;
}

export class EventBus {
  private listeners: Set<SyncEventListener> = new Set();
  private typedListeners: Map<SyncEventType, Set<SyncEventListener>> = new Map();

  /**
   * Subscribe to every event. Returns an unsubscribe function.
   */
  subscribe(listener: SyncEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Subscribe to one event type.
   */
  on<K extends SyncEventType>(type: K, listener: SyncEventListener<SyncEventOf<K>>): () => void {
    const wrapped: SyncEventListener = (event) => {
      if (isEventOf(event, type)) {
        listener(event);
      }
    };
    const set = this.typedListeners.get(type) ?? new Set<SyncEventListener>();
    this.typedListeners.set(type, set);
    set.add(wrapped);
    return () => {
      set.delete(wrapped);
    };
  }

  publish(event: SyncEvent): void {
    const typed = this.typedListeners.get(event.type);
    for (const listener of [...this.listeners, ...(typed ?? [])]) {
      try {
        listener(event);
      } catch (error) {
        console.error('[EventBus] Error in event listener:', error);
      }
    }
  }

  clear(): void {
    this.listeners.clear();
    this.typedListeners.clear();
  }
}
