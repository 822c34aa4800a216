// ─── Economy API (v1) ───
// The surface plugins, the HTTP bridge and the seed catalog talk to. Every
// call returns an Outcome; stale tokens and foreign handles come back as
// failures, never as exceptions.

import type {
  CategoryDefinition,
  CategoryHandle,
  ItemDefinition,
  ItemHandle,
  ItemOptions,
  OwnedItem,
  Outcome,
  PurchaseReceipt,
  SaleReceipt,
  SessionSnapshot,
  SessionState,
  SessionStats,
  SessionToken,
} from '../types.js';
import type { ItemDraft, Registry } from './registry.js';
import type { SessionCache } from './sessions.js';
import type { EconomyEvents } from './events.js';

export const API_VERSION = 1;

export class EconomyApi {
  readonly version = API_VERSION;

  constructor(
    private readonly registry: Registry,
    private readonly sessions: SessionCache
  ) {}

  get events(): EconomyEvents {
    return this.sessions.events;
  }

  // ─── Catalog ───

  registerCategory(key: string, name: string, description?: string): Outcome<CategoryHandle> {
    return this.registry.registerCategory(key, name, description);
  }

  registerItem(
    category: CategoryHandle,
    key: string,
    name: string,
    price: number,
    options?: ItemOptions
  ): Outcome<ItemHandle> {
    return this.registry.registerItem(category, key, name, price, options);
  }

  draftItem(category: CategoryHandle, key: string): ItemDraft {
    return this.registry.draftItem(category, key);
  }

  setPrice(item: ItemHandle, price: number): Outcome<number> {
    return this.registry.setPrice(item, price);
  }

  setName(item: ItemHandle, name: string): Outcome<string> {
    return this.registry.setName(item, name);
  }

  deactivateItem(item: ItemHandle): Outcome<void> {
    return this.registry.deactivateItem(item);
  }

  deactivateCategory(category: CategoryHandle): Outcome<void> {
    return this.registry.deactivateCategory(category);
  }

  lookupCategory(category: CategoryHandle): Outcome<Readonly<CategoryDefinition>> {
    return this.registry.lookupCategory(category);
  }

  lookupItem(item: ItemHandle): Outcome<Readonly<ItemDefinition>> {
    return this.registry.lookupItem(item);
  }

  lookupCategoryByKey(key: string): Outcome<CategoryHandle> {
    return this.registry.lookupCategoryByKey(key);
  }

  lookupByKey(categoryKey: string, itemKey: string): Outcome<ItemHandle> {
    return this.registry.lookupByKey(categoryKey, itemKey);
  }

  listCategories(): Readonly<CategoryDefinition>[] {
    return this.registry.listCategories();
  }

  listItems(category: CategoryHandle): Outcome<Readonly<ItemDefinition>[]> {
    return this.registry.listItems(category);
  }

  isPurchasable(item: ItemHandle): boolean {
    return this.registry.isPurchasable(item);
  }

  // ─── Sessions ───

  join(slot: number, identity: string): Outcome<SessionToken> {
    return this.sessions.onJoin(slot, identity);
  }

  leave(token: SessionToken): Outcome<SessionState> {
    return this.sessions.onLeave(token);
  }

  getSession(token: SessionToken): Outcome<SessionSnapshot> {
    return this.sessions.getSession(token);
  }

  listSessions(): SessionSnapshot[] {
    return this.sessions.listSessions();
  }

  sessionForSlot(slot: number): SessionToken | null {
    return this.sessions.tokenForSlot(slot);
  }

  // Newest session for the identity, including one still waiting on its predecessor.
  sessionForIdentity(identity: string): SessionToken | null {
    return this.sessions.tokenForIdentity(identity);
  }

  sessionStats(): SessionStats {
    return this.sessions.stats();
  }

  // ─── Credits ───

  getCredits(token: SessionToken): Outcome<number> {
    return this.sessions.getCredits(token);
  }

  adjustCredits(token: SessionToken, delta: number, reason?: string): Outcome<number> {
    return this.sessions.adjustCredits(token, delta, reason);
  }

  setCredits(token: SessionToken, amount: number, reason?: string): Outcome<number> {
    return this.sessions.setCredits(token, amount, reason);
  }

  transferCredits(from: SessionToken, to: SessionToken, amount: number, reason?: string): Outcome<number> {
    return this.sessions.transferCredits(from, to, amount, reason);
  }

  // ─── Inventory ───

  hasItem(token: SessionToken, item: ItemHandle): Outcome<boolean> {
    return this.sessions.hasItem(token, item);
  }

  listOwned(token: SessionToken): Outcome<OwnedItem[]> {
    return this.sessions.listOwned(token);
  }

  grantItem(token: SessionToken, item: ItemHandle): Outcome<void> {
    return this.sessions.grantItem(token, item);
  }

  revokeItem(token: SessionToken, item: ItemHandle): Outcome<void> {
    return this.sessions.revokeItem(token, item);
  }

  purchase(token: SessionToken, item: ItemHandle): Outcome<PurchaseReceipt> {
    return this.sessions.purchase(token, item);
  }

  sell(token: SessionToken, item: ItemHandle): Outcome<SaleReceipt> {
    return this.sessions.sell(token, item);
  }
}
