// ─── Core Types ───

// Handles are issued by the registry only. They are frozen and compared by
// identity, so a handle built by hand never resolves.
export interface CategoryHandle {
  readonly kind: 'category';
  readonly id: number;
}

export interface ItemHandle {
  readonly kind: 'item';
  readonly id: number;
}

export interface CategoryDefinition {
  handle: CategoryHandle;
  key: string;
  name: string;
  description: string;
  items: ItemHandle[];
  active: boolean;
}

export interface ItemDefinition {
  handle: ItemHandle;
  category: CategoryHandle;
  categoryKey: string;
  key: string;
  name: string;
  description: string;
  price: number; // in credits
  type: string; // free-form tag, e.g. 'skin' | 'finite' | 'toggle'
  active: boolean;
}

export interface ItemOptions {
  description?: string;
  type?: string;
}

// ─── Sessions ───

export type SessionState = 'loading' | 'active' | 'flushing' | 'retired' | 'failed';

export type SessionToken = number;

export interface Ownership {
  acquiredAt: number; // Unix timestamp (ms)
  pricePaid: number;
}

export interface OwnedItem extends Ownership {
  item: ItemHandle;
  categoryKey: string;
  itemKey: string;
}

export interface SessionSnapshot {
  token: SessionToken;
  slot: number;
  identity: string;
  state: SessionState;
  balance: number;
  dirty: boolean;
  items: OwnedItem[];
}

export interface PurchaseReceipt {
  receiptId: string;
  token: SessionToken;
  item: ItemHandle;
  pricePaid: number;
  balanceAfter: number;
  acquiredAt: number;
}

export interface SaleReceipt {
  token: SessionToken;
  item: ItemHandle;
  refund: number;
  balanceAfter: number;
}

export interface SessionStats {
  loading: number;
  active: number;
  flushing: number;
  dirty: number;
  slots: number;
}

// ─── Outcomes ───

export type FailureCode =
  // validation
  | 'InvalidArgument'
  | 'DuplicateKey'
  | 'InvalidCategory'
  | 'NotFound'
  // state
  | 'SessionNotActive'
  | 'InsufficientFunds'
  | 'CreditLimitExceeded'
  | 'AlreadyOwned'
  | 'NotOwned'
  | 'ItemNotPurchasable';

export interface Failure {
  code: FailureCode;
  kind: 'validation' | 'state';
  message: string;
}

export type Outcome<T> = { success: true; value: T } | { success: false; error: Failure };

// ─── Persistence ───

export interface Statement {
  sql: string;
  params: readonly unknown[];
  mode: 'read' | 'write';
}

export type Row = Record<string, unknown>;

export type StoreBackend = 'sqlite' | 'postgres';

export interface StoredUser {
  identity: string;
  credits: number;
}

export interface StoredPurchase {
  categoryKey: string;
  itemKey: string;
  acquiredAt: number;
  pricePaid: number;
}
