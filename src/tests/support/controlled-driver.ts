import type { Row, Statement, StoreBackend } from '../../types.js';
import type { StoreDriver } from '../../db/driver.js';
import { StoreError, type StoreErrorKind } from '../../engine/errors.js';

// In-process stand-in for a slow or flaky store. Wraps a real driver and lets
// a test hold requests, release them in a chosen order, inject failures and
// "crash" (drop everything still held).

export type RequestType = 'read' | 'write' | 'transaction';

interface Held {
  type: RequestType;
  run: () => void;
}

interface Fault {
  type: RequestType | 'any';
  kind: StoreErrorKind;
  remaining: number;
}

export class ControlledDriver implements StoreDriver {
  readonly backend: StoreBackend;
  private holding = false;
  private readonly held: Held[] = [];
  private readonly faults: Fault[] = [];
  readonly calls: RequestType[] = [];
  committed = 0;

  constructor(private readonly inner: StoreDriver) {
    this.backend = inner.backend;
  }

  get heldCount(): number {
    return this.held.length;
  }

  hold(): void {
    this.holding = true;
  }

  // Stops holding and runs everything queued, oldest first.
  resume(): void {
    this.holding = false;
    this.release(this.held.length);
  }

  // Runs the oldest `count` held requests.
  release(count = 1): void {
    for (const entry of this.held.splice(0, count)) entry.run();
  }

  // Runs one held request out of order.
  releaseAt(index: number): void {
    const [entry] = this.held.splice(index, 1);
    if (!entry) throw new Error(`No held request at ${index}`);
    entry.run();
  }

  // Held requests never reach the store and never settle.
  crash(): void {
    this.held.splice(0);
  }

  failNext(type: RequestType | 'any', kind: StoreErrorKind, times = 1): void {
    this.faults.push({ type, kind, remaining: times });
  }

  execute(statement: Statement): Promise<Row[]> {
    const type: RequestType = statement.mode === 'read' ? 'read' : 'write';
    return this.gate(type, () => this.inner.execute(statement));
  }

  transaction(statements: readonly Statement[]): Promise<void> {
    return this.gate('transaction', async () => {
      await this.inner.transaction(statements);
      this.committed++;
    });
  }

  close(): Promise<void> {
    this.crash();
    return this.inner.close();
  }

  private gate<T>(type: RequestType, work: () => Promise<T>): Promise<T> {
    this.calls.push(type);
    const fault = this.faults.find((f) => f.type === type || f.type === 'any');
    if (fault) {
      fault.remaining--;
      if (fault.remaining <= 0) this.faults.splice(this.faults.indexOf(fault), 1);
      return new Promise<T>((_, reject) => {
        setImmediate(() => reject(new StoreError(fault.kind, `injected ${fault.kind} failure`)));
      });
    }
    if (!this.holding) return work();

    return new Promise<T>((resolve, reject) => {
      this.held.push({
        type,
        run: () => {
          work().then(resolve, reject);
        },
      });
    });
  }
}
