// ─── Session Cache ───
// One live record per connected player. Loaded through the gateway on join,
// mutated synchronously in memory, written back periodically and on leave.
//
// Two tables keep transient connection slots away from async work:
//   slot  -> token   (what the host sees; slots get reused)
//   token -> record  (tokens are never reused)
// Store requests are laned by durable identity, and every completion looks its
// session up by token, so a late result can never land on whoever holds the
// slot now.

import { v4 as uuid } from 'uuid';
import type {
  ItemHandle,
  Outcome,
  Ownership,
  PurchaseReceipt,
  SaleReceipt,
  SessionSnapshot,
  SessionState,
  SessionStats,
  SessionToken,
  StoredPurchase,
  StoredUser,
} from '../types.js';
import type { PersistenceGateway } from '../services/gateway.js';
import { decodePurchase, decodeUser, type StoreStatements } from '../db/index.js';
import type { Registry } from './registry.js';
import { EconomyEvents } from './events.js';
import { StoreError, errorMessage, fail, ok } from './errors.js';

export interface SessionCacheOptions {
  startingCredits: number;
  creditFloor: number;
  creditCeiling: number | null;
  sellRatio: number;
  flushIntervalMs: number;
  loadTimeoutMs: number;
  flushTimeoutMs: number;
  flushRetryLimit: number;
  retryBaseMs: number;
  now?: () => number;
}

interface SessionRecord {
  token: SessionToken;
  slot: number;
  identity: string;
  state: SessionState;
  balance: number;
  inventory: Map<ItemHandle, Ownership>;
  // Stored purchases of items this process does not know; written back untouched.
  orphans: StoredPurchase[];
  version: number;
  persistedVersion: number;
  flushInFlight: boolean;
  flushQueued: boolean;
  flushFailures: number;
  leaveRequested: boolean;
  deadline: NodeJS.Timeout | null;
  retryTimer: NodeJS.Timeout | null;
  // Settles when the record leaves the table, retired or failed.
  closed: Promise<void>;
  markClosed: () => void;
}

function isDirty(record: SessionRecord): boolean {
  return record.version !== record.persistedVersion;
}

function toStoreError(err: unknown): StoreError {
  return err instanceof StoreError ? err : new StoreError('fatal', errorMessage(err), { cause: err });
}

export class SessionCache {
  private nextToken: SessionToken = 1;
  private readonly sessions = new Map<SessionToken, SessionRecord>();
  private readonly slots = new Map<number, SessionToken>();
  private readonly identities = new Map<string, SessionToken>();
  private readonly inFlight = new Set<Promise<void>>();
  private flushTimer: NodeJS.Timeout | null = null;
  private readonly now: () => number;

  constructor(
    private readonly registry: Registry,
    private readonly gateway: PersistenceGateway,
    private readonly statements: StoreStatements,
    private readonly options: SessionCacheOptions,
    readonly events: EconomyEvents = new EconomyEvents()
  ) {
    this.now = options.now ?? Date.now;
  }

  // ═══════════════════════════════════════════════════════════════
  // Lifecycle
  // ═══════════════════════════════════════════════════════════════

  onJoin(slot: number, identity: string): Outcome<SessionToken> {
    if (!Number.isSafeInteger(slot) || slot < 0) {
      return fail('InvalidArgument', `Connection slot must be a non-negative integer, got ${slot}`);
    }
    if (typeof identity !== 'string' || identity.trim() === '') {
      return fail('InvalidArgument', 'Identity must be a non-empty string');
    }

    // Missed disconnect on this slot, or the same player reconnecting before
    // the old session finished: retire the old one first. The new load waits
    // until that session is gone, final write and retries included.
    const slotHolder = this.slots.get(slot);
    if (slotHolder !== undefined) this.onLeave(slotHolder);
    const previous = this.identities.get(identity);
    if (previous !== undefined) this.onLeave(previous);
    const predecessor = previous === undefined ? undefined : this.sessions.get(previous);

    let markClosed: () => void = () => {};
    const closed = new Promise<void>((done) => {
      markClosed = done;
    });
    const record: SessionRecord = {
      token: this.nextToken++,
      slot,
      identity,
      state: 'loading',
      balance: 0,
      inventory: new Map(),
      orphans: [],
      version: 0,
      persistedVersion: 0,
      flushInFlight: false,
      flushQueued: false,
      flushFailures: 0,
      leaveRequested: false,
      deadline: null,
      retryTimer: null,
      closed,
      markClosed,
    };
    this.sessions.set(record.token, record);
    this.slots.set(slot, record.token);
    this.identities.set(identity, record.token);

    console.log(`[Sessions] Join slot ${slot} as ${identity} (token ${record.token})`);
    this.track(this.load(record, predecessor?.closed ?? null));
    return ok(record.token);
  }

  onLeave(token: SessionToken): Outcome<SessionState> {
    const record = this.sessions.get(token);
    if (!record) return fail('NotFound', `Unknown session token ${token}`);

    // The slot is free for the host to hand out again right away.
    if (this.slots.get(record.slot) === token) this.slots.delete(record.slot);

    if (record.state === 'loading') {
      record.leaveRequested = true;
    } else if (record.state === 'active') {
      this.beginFlushing(record);
    }
    return ok(record.state);
  }

  start(): void {
    if (this.flushTimer) return;
    this.flushTimer = setInterval(() => {
      this.flushDirty();
    }, this.options.flushIntervalMs);
    this.flushTimer.unref();
  }

  stop(): void {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
  }

  // Writes every dirty active session; returns how many flushes were issued or queued.
  flushDirty(): number {
    let count = 0;
    for (const record of this.sessions.values()) {
      if (record.state !== 'active' || !isDirty(record)) continue;
      this.flush(record);
      count++;
    }
    if (count > 0) console.log(`[Sessions] Periodic flush: ${count} dirty session(s)`);
    return count;
  }

  // Resolves when no load or flush is outstanding.
  async settle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  async shutdown(timeoutMs = this.options.flushTimeoutMs + this.options.loadTimeoutMs): Promise<void> {
    this.stop();
    const tokens = [...this.sessions.keys()];
    console.log(`[Sessions] Shutting down, flushing ${tokens.length} session(s)`);
    for (const token of tokens) this.onLeave(token);

    const deadline = Date.now() + timeoutMs;
    while (this.sessions.size > 0 && Date.now() < deadline) {
      await this.settle();
      if (this.sessions.size > 0) await new Promise((resolve) => setTimeout(resolve, 10));
    }

    for (const record of [...this.sessions.values()]) {
      if (record.state === 'flushing') {
        this.reportLostWrite(record, 'server shut down before the final write completed');
      }
      this.failSession(record, 'shutdown');
    }
    await this.gateway.shutdown();
  }

  // ═══════════════════════════════════════════════════════════════
  // Credits
  // ═══════════════════════════════════════════════════════════════

  getCredits(token: SessionToken): Outcome<number> {
    const found = this.requireReadable(token);
    return found.success ? ok(found.value.balance) : found;
  }

  adjustCredits(token: SessionToken, delta: number, reason = 'adjust'): Outcome<number> {
    const found = this.requireActive(token);
    if (!found.success) return found;
    if (!Number.isSafeInteger(delta)) return fail('InvalidArgument', `Credit delta must be an integer, got ${delta}`);

    const record = found.value;
    const next = record.balance + delta;
    const bounds = this.checkBounds(next, record.balance);
    if (!bounds.success) return bounds;

    this.applyBalance(record, next, reason);
    return ok(next);
  }

  setCredits(token: SessionToken, amount: number, reason = 'set'): Outcome<number> {
    const found = this.requireActive(token);
    if (!found.success) return found;
    if (!Number.isSafeInteger(amount)) return fail('InvalidArgument', `Credit amount must be an integer, got ${amount}`);

    const record = found.value;
    const bounds = this.checkBounds(amount, record.balance);
    if (!bounds.success) return bounds;

    this.applyBalance(record, amount, reason);
    return ok(amount);
  }

  transferCredits(from: SessionToken, to: SessionToken, amount: number, reason = 'transfer'): Outcome<number> {
    if (from === to) return fail('InvalidArgument', 'Cannot transfer credits to the same session');
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      return fail('InvalidArgument', `Transfer amount must be a positive integer, got ${amount}`);
    }
    const source = this.requireActive(from);
    if (!source.success) return source;
    const target = this.requireActive(to);
    if (!target.success) return target;

    const debit = this.checkBounds(source.value.balance - amount, source.value.balance);
    if (!debit.success) return debit;
    const credit = this.checkBounds(target.value.balance + amount, target.value.balance);
    if (!credit.success) return credit;

    this.applyBalance(source.value, source.value.balance - amount, `${reason} -> ${target.value.identity}`);
    this.applyBalance(target.value, target.value.balance + amount, `${reason} <- ${source.value.identity}`);
    return ok(source.value.balance);
  }

  // ═══════════════════════════════════════════════════════════════
  // Inventory
  // ═══════════════════════════════════════════════════════════════

  hasItem(token: SessionToken, item: ItemHandle): Outcome<boolean> {
    const found = this.requireReadable(token);
    if (!found.success) return found;
    if (!this.registry.resolveItem(item)) return fail('NotFound', 'Unknown item handle');
    return ok(found.value.inventory.has(item));
  }

  listOwned(token: SessionToken): Outcome<SessionSnapshot['items']> {
    const found = this.requireReadable(token);
    return found.success ? ok(this.snapshot(found.value).items) : found;
  }

  grantItem(token: SessionToken, item: ItemHandle): Outcome<void> {
    const found = this.requireActive(token);
    if (!found.success) return found;
    if (!this.registry.resolveItem(item)) return fail('NotFound', 'Unknown item handle');

    const record = found.value;
    if (record.inventory.has(item)) return fail('AlreadyOwned', 'Item is already owned');

    record.inventory.set(item, { acquiredAt: this.now(), pricePaid: 0 });
    this.touch(record);
    this.events.emit('itemGranted', { token, identity: record.identity, item });
    return ok(undefined);
  }

  revokeItem(token: SessionToken, item: ItemHandle): Outcome<void> {
    const found = this.requireActive(token);
    if (!found.success) return found;
    if (!this.registry.resolveItem(item)) return fail('NotFound', 'Unknown item handle');

    const record = found.value;
    if (!record.inventory.delete(item)) return fail('NotOwned', 'Item is not owned');

    this.touch(record);
    this.events.emit('itemRevoked', { token, identity: record.identity, item });
    return ok(undefined);
  }

  // Debit and grant happen in one synchronous step: both or neither. The price
  // is read once here, so a concurrent setPrice only affects later purchases.
  purchase(token: SessionToken, item: ItemHandle): Outcome<PurchaseReceipt> {
    const found = this.requireActive(token);
    if (!found.success) return found;

    const def = this.registry.resolveItem(item);
    if (!def) return fail('NotFound', 'Unknown item handle');
    if (!this.registry.isPurchasable(item)) {
      return fail('ItemNotPurchasable', `${def.categoryKey}/${def.key} is not for sale`);
    }

    const record = found.value;
    const price = def.price;
    const next = record.balance - price;
    if (next < this.options.creditFloor) {
      return fail('InsufficientFunds', `Need ${price} credits, have ${record.balance}`);
    }
    if (record.inventory.has(item)) return fail('AlreadyOwned', `${def.categoryKey}/${def.key} is already owned`);

    const acquiredAt = this.now();
    const previous = record.balance;
    record.balance = next;
    record.inventory.set(item, { acquiredAt, pricePaid: price });
    this.touch(record);

    const receipt: PurchaseReceipt = {
      receiptId: uuid(),
      token,
      item,
      pricePaid: price,
      balanceAfter: next,
      acquiredAt,
    };
    this.events.emit('creditsChanged', {
      token,
      identity: record.identity,
      previous,
      balance: next,
      reason: `purchase ${def.categoryKey}/${def.key}`,
    });
    this.events.emit('itemPurchased', { token, identity: record.identity, item, price, receiptId: receipt.receiptId });
    console.log(`[Sessions] ${record.identity} bought ${def.categoryKey}/${def.key} for ${price} (balance ${next})`);
    return ok(receipt);
  }

  sell(token: SessionToken, item: ItemHandle): Outcome<SaleReceipt> {
    const found = this.requireActive(token);
    if (!found.success) return found;
    const def = this.registry.resolveItem(item);
    if (!def) return fail('NotFound', 'Unknown item handle');

    const record = found.value;
    const owned = record.inventory.get(item);
    if (!owned) return fail('NotOwned', `${def.categoryKey}/${def.key} is not owned`);

    const refund = Math.floor(owned.pricePaid * this.options.sellRatio);
    const next = record.balance + refund;
    const bounds = this.checkBounds(next, record.balance);
    if (!bounds.success) return bounds;

    const previous = record.balance;
    record.inventory.delete(item);
    record.balance = next;
    this.touch(record);

    this.events.emit('creditsChanged', {
      token,
      identity: record.identity,
      previous,
      balance: next,
      reason: `sell ${def.categoryKey}/${def.key}`,
    });
    this.events.emit('itemSold', { token, identity: record.identity, item, refund });
    return ok({ token, item, refund, balanceAfter: next });
  }

  // ═══════════════════════════════════════════════════════════════
  // Queries
  // ═══════════════════════════════════════════════════════════════

  getSession(token: SessionToken): Outcome<SessionSnapshot> {
    const record = this.sessions.get(token);
    return record ? ok(this.snapshot(record)) : fail('NotFound', `Unknown session token ${token}`);
  }

  tokenForSlot(slot: number): SessionToken | null {
    return this.slots.get(slot) ?? null;
  }

  tokenForIdentity(identity: string): SessionToken | null {
    return this.identities.get(identity) ?? null;
  }

  listSessions(): SessionSnapshot[] {
    return [...this.sessions.values()].map((record) => this.snapshot(record));
  }

  stats(): SessionStats {
    const stats: SessionStats = { loading: 0, active: 0, flushing: 0, dirty: 0, slots: this.slots.size };
    for (const record of this.sessions.values()) {
      if (record.state === 'loading') stats.loading++;
      else if (record.state === 'active') stats.active++;
      else if (record.state === 'flushing') stats.flushing++;
      if (isDirty(record)) stats.dirty++;
    }
    return stats;
  }

  // ═══════════════════════════════════════════════════════════════
  // Load
  // ═══════════════════════════════════════════════════════════════

  private async load(record: SessionRecord, predecessor: Promise<void> | null): Promise<void> {
    const { identity, token } = record;
    if (predecessor) {
      console.log(`[Sessions] ${identity} (token ${token}) waits for the previous session's final write`);
      await predecessor;
      // Shut down while waiting.
      if (!this.isCurrent(record)) return;
    }

    // The predecessor's own deadlines bound the wait; the load timeout starts here.
    record.deadline = setTimeout(() => {
      record.deadline = null;
      if (this.isCurrent(record) && record.state === 'loading') {
        this.failSession(record, `load timed out after ${this.options.loadTimeoutMs}ms`);
      }
    }, this.options.loadTimeoutMs);

    try {
      const userRows = await this.gateway.query(this.statements.selectUser(identity), identity);
      let user: StoredUser;
      if (userRows.length > 0) {
        user = decodeUser(userRows[0]);
      } else {
        // Timed out while the read was queued: leave the store untouched.
        if (!this.isCurrent(record) || record.state !== 'loading') {
          this.completeLoad(token, record, { identity, credits: this.options.startingCredits }, []);
          return;
        }
        await this.gateway.query(
          this.statements.insertDefaultUser(identity, this.options.startingCredits, this.now()),
          identity
        );
        user = { identity, credits: this.options.startingCredits };
      }
      const purchaseRows = await this.gateway.query(this.statements.selectPurchases(identity), identity);
      this.completeLoad(token, record, user, purchaseRows.map(decodePurchase));
    } catch (err) {
      this.loadFailed(record, err);
    }
  }

  private completeLoad(token: SessionToken, record: SessionRecord, user: StoredUser, purchases: StoredPurchase[]): void {
    if (!this.isCurrent(record) || record.state !== 'loading') {
      console.warn(`[Sessions] Discarding late load for token ${token} (${record.identity})`);
      this.events.emit('lateCompletion', { token, identity: record.identity, operation: 'load' });
      return;
    }
    this.clearDeadline(record);

    record.balance = user.credits;
    if (!this.withinBounds(user.credits)) {
      console.warn(`[Sessions] Stored balance ${user.credits} for ${record.identity} is outside the configured bounds`);
    }
    for (const row of purchases) {
      const handle = this.registry.lookupByKey(row.categoryKey, row.itemKey);
      if (handle.success) {
        record.inventory.set(handle.value, { acquiredAt: row.acquiredAt, pricePaid: row.pricePaid });
      } else {
        record.orphans.push(row);
      }
    }
    record.state = 'active';
    record.persistedVersion = record.version;

    console.log(
      `[Sessions] Loaded ${record.identity} (token ${token}): ${record.balance} credits, ${record.inventory.size} item(s)` +
        (record.orphans.length > 0 ? `, ${record.orphans.length} unknown item(s) kept` : '')
    );
    this.events.emit('sessionActive', {
      token,
      identity: record.identity,
      balance: record.balance,
      items: record.inventory.size,
    });

    // Player left while we were loading: finish the record, then write it back.
    if (record.leaveRequested) this.beginFlushing(record);
  }

  private loadFailed(record: SessionRecord, err: unknown): void {
    const error = toStoreError(err);
    if (!this.isCurrent(record) || record.state !== 'loading') {
      console.warn(`[Sessions] Ignoring late load failure for token ${record.token}: ${error.message}`);
      this.events.emit('lateCompletion', { token: record.token, identity: record.identity, operation: 'load' });
      return;
    }
    this.failSession(record, `load failed (${error.kind}): ${error.message}`);
  }

  // ═══════════════════════════════════════════════════════════════
  // Flush
  // ═══════════════════════════════════════════════════════════════

  private beginFlushing(record: SessionRecord): void {
    record.state = 'flushing';
    record.leaveRequested = true;
    this.clearDeadline(record);
    record.deadline = setTimeout(() => {
      record.deadline = null;
      if (this.isCurrent(record) && record.state === 'flushing') {
        this.reportLostWrite(record, `final write did not complete within ${this.options.flushTimeoutMs}ms`);
        this.failSession(record, 'flush timed out');
      }
    }, this.options.flushTimeoutMs);
    this.flush(record);
  }

  private flush(record: SessionRecord): void {
    if (record.flushInFlight) {
      // Coalesce: the follow-up writes whatever is newest when this one lands.
      record.flushQueued = true;
      return;
    }
    if (record.retryTimer) {
      clearTimeout(record.retryTimer);
      record.retryTimer = null;
    }

    const version = record.version;
    const statements = this.statements.saveState(record.identity, record.balance, this.storedRows(record), this.now());
    record.flushInFlight = true;
    record.flushQueued = false;

    this.track(
      this.gateway.runTransaction(statements, record.identity).then(
        () => this.flushSucceeded(record, version),
        (err: unknown) => this.flushFailed(record, err)
      )
    );
  }

  private flushSucceeded(record: SessionRecord, version: number): void {
    record.flushInFlight = false;
    if (!this.isCurrent(record)) {
      console.warn(`[Sessions] Late flush confirmation for retired token ${record.token} (${record.identity})`);
      this.events.emit('lateCompletion', { token: record.token, identity: record.identity, operation: 'flush' });
      return;
    }
    record.flushFailures = 0;
    record.persistedVersion = Math.max(record.persistedVersion, version);

    if (record.state === 'flushing') {
      if (isDirty(record)) this.flush(record);
      else this.retire(record);
      return;
    }
    if (record.flushQueued && isDirty(record)) this.flush(record);
    record.flushQueued = false;
  }

  private flushFailed(record: SessionRecord, err: unknown): void {
    record.flushInFlight = false;
    const error = toStoreError(err);
    if (!this.isCurrent(record)) {
      console.warn(`[Sessions] Late flush failure for retired token ${record.token}: ${error.message}`);
      this.events.emit('lateCompletion', { token: record.token, identity: record.identity, operation: 'flush' });
      return;
    }

    record.flushFailures++;
    const retryable =
      (error.kind === 'transient' || error.kind === 'integrity') && record.flushFailures <= this.options.flushRetryLimit;
    console.error(
      `[Sessions] Flush failed for ${record.identity} (token ${record.token}, ${error.kind}, attempt ${record.flushFailures}): ${error.message}`
    );
    this.events.emit('flushFailed', {
      token: record.token,
      identity: record.identity,
      kind: error.kind,
      reason: error.message,
      willRetry: retryable,
    });

    if (retryable) {
      // Re-send the newest full state; the write is a replacement, not a delta.
      const delay = this.options.retryBaseMs * 2 ** (record.flushFailures - 1);
      record.retryTimer = setTimeout(() => {
        record.retryTimer = null;
        if (this.isCurrent(record) && (record.state === 'active' || record.state === 'flushing')) {
          this.flush(record);
        }
      }, delay);
      return;
    }

    if (record.state === 'flushing') {
      this.reportLostWrite(record, `final write failed: ${error.message}`);
      this.failSession(record, `flush failed (${error.kind})`);
      return;
    }
    // Still active: stays dirty and the next periodic pass tries again with a fresh budget.
    record.flushFailures = 0;
  }

  // ═══════════════════════════════════════════════════════════════
  // Helpers
  // ═══════════════════════════════════════════════════════════════

  private requireActive(token: SessionToken): Outcome<SessionRecord> {
    const record = this.sessions.get(token);
    if (!record || record.state !== 'active') {
      return fail('SessionNotActive', `Session ${token} is ${record ? record.state : 'not live'}`);
    }
    return ok(record);
  }

  private requireReadable(token: SessionToken): Outcome<SessionRecord> {
    const record = this.sessions.get(token);
    if (!record || (record.state !== 'active' && record.state !== 'flushing')) {
      return fail('SessionNotActive', `Session ${token} is ${record ? record.state : 'not live'}`);
    }
    return ok(record);
  }

  private withinBounds(balance: number): boolean {
    const { creditFloor, creditCeiling } = this.options;
    return balance >= creditFloor && (creditCeiling === null || balance <= creditCeiling);
  }

  private checkBounds(next: number, current: number): Outcome<number> {
    if (next < this.options.creditFloor) {
      return fail('InsufficientFunds', `Balance ${current} cannot drop to ${next} (floor ${this.options.creditFloor})`);
    }
    if (this.options.creditCeiling !== null && next > this.options.creditCeiling) {
      return fail(
        'CreditLimitExceeded',
        `Balance ${current} cannot rise to ${next} (ceiling ${this.options.creditCeiling})`
      );
    }
    return ok(next);
  }

  private applyBalance(record: SessionRecord, next: number, reason: string): void {
    const previous = record.balance;
    record.balance = next;
    this.touch(record);
    this.events.emit('creditsChanged', { token: record.token, identity: record.identity, previous, balance: next, reason });
  }

  private touch(record: SessionRecord): void {
    record.version++;
  }

  private storedRows(record: SessionRecord): StoredPurchase[] {
    const rows: StoredPurchase[] = [];
    for (const [handle, owned] of record.inventory) {
      const def = this.registry.resolveItem(handle);
      if (!def) continue;
      rows.push({ categoryKey: def.categoryKey, itemKey: def.key, acquiredAt: owned.acquiredAt, pricePaid: owned.pricePaid });
    }
    return rows.concat(record.orphans);
  }

  private snapshot(record: SessionRecord): SessionSnapshot {
    const items: SessionSnapshot['items'] = [];
    for (const [item, owned] of record.inventory) {
      const def = this.registry.resolveItem(item);
      if (!def) continue;
      items.push({ item, categoryKey: def.categoryKey, itemKey: def.key, ...owned });
    }
    return {
      token: record.token,
      slot: record.slot,
      identity: record.identity,
      state: record.state,
      balance: record.balance,
      dirty: isDirty(record),
      items,
    };
  }

  private isCurrent(record: SessionRecord): boolean {
    return this.sessions.get(record.token) === record;
  }

  private clearDeadline(record: SessionRecord): void {
    if (record.deadline) {
      clearTimeout(record.deadline);
      record.deadline = null;
    }
  }

  private clearTimers(record: SessionRecord): void {
    this.clearDeadline(record);
    if (record.retryTimer) {
      clearTimeout(record.retryTimer);
      record.retryTimer = null;
    }
  }

  private detach(record: SessionRecord): void {
    this.clearTimers(record);
    this.sessions.delete(record.token);
    if (this.slots.get(record.slot) === record.token) this.slots.delete(record.slot);
    if (this.identities.get(record.identity) === record.token) this.identities.delete(record.identity);
    record.markClosed();
  }

  private retire(record: SessionRecord): void {
    record.state = 'retired';
    this.detach(record);
    console.log(`[Sessions] Retired ${record.identity} (token ${record.token})`);
    this.events.emit('sessionRetired', { token: record.token, identity: record.identity });
  }

  private failSession(record: SessionRecord, reason: string): void {
    const from = record.state;
    record.state = 'failed';
    this.detach(record);
    console.error(`[Sessions] Session ${record.token} (${record.identity}) failed from ${from}: ${reason}`);
    this.events.emit('sessionFailed', { token: record.token, identity: record.identity, from, reason });
  }

  private reportLostWrite(record: SessionRecord, reason: string): void {
    console.error(
      `[Sessions] LOST WRITE for ${record.identity} (token ${record.token}): balance ${record.balance}, ` +
        `${record.inventory.size} item(s) not confirmed: ${reason}`
    );
    this.events.emit('lostWrite', { token: record.token, identity: record.identity, balance: record.balance, reason });
  }

  private track(work: Promise<void>): void {
    this.inFlight.add(work);
    void work.finally(() => {
      this.inFlight.delete(work);
    });
  }
}
