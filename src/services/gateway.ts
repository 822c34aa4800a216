/**
 * Persistence Gateway - async access to the backing store
 *
 * Every request gets a correlation id and joins a lane (normally the player's
 * durable identity). Requests in one lane run strictly in issue order; lanes
 * interleave freely. The issuing call never blocks: it returns a promise that
 * settles exactly once, on the event loop, with rows or a StoreError.
 *
 * - Reads are retried with exponential backoff on transient failures.
 * - Writes are never retried here; the caller re-issues a full-state write.
 * - A request that outlives requestTimeoutMs settles as transient; whatever
 *   the driver reports later is discarded by correlation id. A timed-out read
 *   frees its lane at once; a timed-out write keeps the lane until the driver
 *   call settles, so no newer write can commit underneath it.
 * - After shutdown() nothing settles except with an 'aborted' error.
 */

import type { Row, Statement } from '../types.js';
import type { StoreDriver } from '../db/driver.js';
import { StoreError, errorMessage } from '../engine/errors.js';

export interface GatewayOptions {
  requestTimeoutMs: number;
  retryAttempts: number;
  retryBaseMs: number;
}

export interface GatewayStats {
  pending: number;
  lanes: number;
  issued: number;
  completed: number;
  failed: number;
  retries: number;
  timeouts: number;
  discarded: number;
}

type Settlement = { rows: Row[] } | { error: StoreError };

interface PendingRequest {
  id: number;
  lane: string;
  label: string;
  // Writes and transactions hold the lane until the driver itself settles.
  exclusive: boolean;
  settle: (settlement: Settlement) => void;
  settled: Promise<void>;
  timer: NodeJS.Timeout | null;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toStoreError(err: unknown): StoreError {
  if (err instanceof StoreError) return err;
  return new StoreError('fatal', errorMessage(err), { cause: err });
}

export class PersistenceGateway {
  private nextRequestId = 1;
  private readonly pending = new Map<number, PendingRequest>();
  private readonly lanes = new Map<string, Promise<void>>();
  private closed = false;
  private readonly counters = { issued: 0, completed: 0, failed: 0, retries: 0, timeouts: 0, discarded: 0 };

  constructor(
    private readonly driver: StoreDriver,
    private readonly options: GatewayOptions
  ) {}

  get backend() {
    return this.driver.backend;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // ─── Public operations ───

  query(statement: Statement, lane: string): Promise<Row[]> {
    const label = statement.mode === 'read' ? 'read' : 'write';
    return this.enqueue(lane, label, statement.mode !== 'read', (request) =>
      statement.mode === 'read' ? this.readWithRetry(request, statement) : this.driver.execute(statement)
    );
  }

  async runTransaction(statements: readonly Statement[], lane: string): Promise<void> {
    await this.enqueue(lane, `transaction(${statements.length})`, true, async () => {
      await this.driver.transaction(statements);
      return [];
    });
  }

  // Resolves once every lane has gone quiet.
  async drain(): Promise<void> {
    while (this.lanes.size > 0) {
      await Promise.all([...this.lanes.values()]);
    }
  }

  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const aborted = [...this.pending.values()];
    for (const request of aborted) {
      this.finish(request.id, {
        error: new StoreError('aborted', 'Gateway shut down before the request completed', { requestId: request.id }),
      });
    }
    this.lanes.clear();
    if (aborted.length > 0) {
      console.warn(`[Gateway] Shutdown aborted ${aborted.length} pending request(s)`);
    }
    await this.driver.close();
    console.log('[Gateway] Closed');
  }

  stats(): GatewayStats {
    return { pending: this.pending.size, lanes: this.lanes.size, ...this.counters };
  }

  // ─── Internals ───

  private enqueue(
    lane: string,
    label: string,
    exclusive: boolean,
    work: (request: PendingRequest) => Promise<Row[]>
  ): Promise<Row[]> {
    if (this.closed) {
      return Promise.reject(new StoreError('aborted', 'Gateway is shut down'));
    }

    const id = this.nextRequestId++;
    this.counters.issued++;

    return new Promise<Row[]>((resolve, reject) => {
      let markSettled: () => void = () => {};
      const settled = new Promise<void>((done) => {
        markSettled = done;
      });

      const request: PendingRequest = {
        id,
        lane,
        label,
        exclusive,
        settled,
        timer: null,
        settle: (settlement) => {
          markSettled();
          if ('rows' in settlement) resolve(settlement.rows);
          else reject(settlement.error);
        },
      };
      this.pending.set(id, request);

      const previous = this.lanes.get(lane) ?? Promise.resolve();
      const tail = previous.then(() => this.dispatch(request, work));
      this.lanes.set(lane, tail);
      void tail.then(() => {
        if (this.lanes.get(lane) === tail) this.lanes.delete(lane);
      });
    });
  }

  // Never rejects: the lane chain must keep moving whatever happens.
  private async dispatch(request: PendingRequest, work: (request: PendingRequest) => Promise<Row[]>): Promise<void> {
    if (!this.pending.has(request.id)) return; // aborted while queued

    request.timer = setTimeout(() => {
      this.counters.timeouts++;
      console.warn(`[Gateway] Request #${request.id} (${request.label}, lane ${request.lane}) timed out`);
      this.finish(request.id, {
        error: new StoreError('transient', `Request timed out after ${this.options.requestTimeoutMs}ms`, {
          requestId: request.id,
        }),
      });
    }, this.options.requestTimeoutMs);

    const attempt = work(request).then(
      (rows) => this.finish(request.id, { rows }),
      (err: unknown) => this.finish(request.id, { error: toStoreError(err).withRequest(request.id) })
    );

    // A hung read must not stall the lane past its own timeout.
    await (request.exclusive ? attempt : Promise.race([attempt, request.settled]));
  }

  private async readWithRetry(request: PendingRequest, statement: Statement): Promise<Row[]> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.driver.execute(statement);
      } catch (err) {
        const error = toStoreError(err);
        if (error.kind !== 'transient' || !this.pending.has(request.id)) throw error;
        if (attempt >= this.options.retryAttempts) {
          console.error(`[Gateway] Read #${request.id} failed after ${attempt + 1} attempt(s): ${error.message}`);
          throw new StoreError('fatal', `Store unreachable after ${attempt + 1} attempt(s): ${error.message}`, {
            cause: error,
          });
        }
        const delay = this.options.retryBaseMs * 2 ** attempt;
        this.counters.retries++;
        console.warn(`[Gateway] Read #${request.id} transient failure, retrying in ${delay}ms: ${error.message}`);
        await sleep(delay);
        if (!this.pending.has(request.id)) throw error;
      }
    }
  }

  private finish(id: number, settlement: Settlement): void {
    const request = this.pending.get(id);
    if (!request) {
      // Timed out or aborted earlier; the late result has nowhere to go.
      this.counters.discarded++;
      return;
    }
    this.pending.delete(id);
    if (request.timer) clearTimeout(request.timer);

    if ('rows' in settlement) this.counters.completed++;
    else this.counters.failed++;
    request.settle(settlement);
  }
}
