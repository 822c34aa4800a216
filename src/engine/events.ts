import type { ItemHandle, SessionState, SessionToken } from '../types.js';
import { errorMessage } from './errors.js';

// ─── Economy Events ───
// Observers (stats, logging, UI) subscribe here instead of reaching into the
// session cache. Listeners run synchronously, after the state change.

export interface EconomyEventMap {
  sessionActive: { token: SessionToken; identity: string; balance: number; items: number };
  sessionRetired: { token: SessionToken; identity: string };
  sessionFailed: { token: SessionToken; identity: string; from: SessionState; reason: string };
  creditsChanged: { token: SessionToken; identity: string; previous: number; balance: number; reason: string };
  itemPurchased: { token: SessionToken; identity: string; item: ItemHandle; price: number; receiptId: string };
  itemSold: { token: SessionToken; identity: string; item: ItemHandle; refund: number };
  itemGranted: { token: SessionToken; identity: string; item: ItemHandle };
  itemRevoked: { token: SessionToken; identity: string; item: ItemHandle };
  flushFailed: { token: SessionToken; identity: string; kind: string; reason: string; willRetry: boolean };
  lostWrite: { token: SessionToken; identity: string; balance: number; reason: string };
  lateCompletion: { token: SessionToken; identity: string; operation: 'load' | 'flush' };
}

export type EconomyEventName = keyof EconomyEventMap;

type Listener<K extends EconomyEventName> = (payload: EconomyEventMap[K]) => void;

export class EconomyEvents {
  private readonly listeners: { [K in EconomyEventName]?: Set<Listener<K>> } = {};

  on<K extends EconomyEventName>(event: K, listener: Listener<K>): () => void {
    const set: Set<Listener<K>> = this.listeners[event] ?? new Set<Listener<K>>();
    this.listeners[event] = set;
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  emit<K extends EconomyEventName>(event: K, payload: EconomyEventMap[K]): void {
    const set = this.listeners[event];
    if (!set) return;
    for (const listener of set) {
      try {
        listener(payload);
      } catch (err) {
        // Observer failures never reach the state change that triggered them.
        console.error(`[Events] Listener for "${event}" threw:`, errorMessage(err));
      }
    }
  }
}
