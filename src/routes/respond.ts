import type { Context } from 'hono';
import type { Failure, ItemDefinition, OwnedItem, SessionSnapshot } from '../types.js';

// ─── Shared response helpers ───

type FailureStatus = 400 | 404 | 409;

export function failureStatus(error: Failure): FailureStatus {
  if (error.code === 'NotFound') return 404;
  return error.kind === 'state' ? 409 : 400;
}

export function failure(c: Context, error: Failure) {
  return c.json({ error: error.message, code: error.code }, failureStatus(error));
}

export function badRequest(c: Context, message: string) {
  return c.json({ error: message, code: 'InvalidArgument' }, 400);
}

// Malformed JSON reads as null; handlers validate the shape themselves.
export async function readBody(c: Context): Promise<Record<string, unknown> | null> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return null;
  }
  return typeof body === 'object' && body !== null && !Array.isArray(body) ? { ...body } : null;
}

export function parseToken(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const token = Number(raw);
  return Number.isSafeInteger(token) ? token : null;
}

export function itemView(item: Readonly<ItemDefinition>, purchasable: boolean) {
  return {
    category: item.categoryKey,
    key: item.key,
    name: item.name,
    description: item.description,
    price: item.price,
    type: item.type,
    active: item.active,
    purchasable,
  };
}

export function ownedView(owned: OwnedItem) {
  return {
    category: owned.categoryKey,
    item: owned.itemKey,
    acquiredAt: owned.acquiredAt,
    pricePaid: owned.pricePaid,
  };
}

export function sessionView(session: SessionSnapshot) {
  return {
    token: session.token,
    slot: session.slot,
    identity: session.identity,
    state: session.state,
    balance: session.balance,
    dirty: session.dirty,
    items: session.items.map(ownedView),
  };
}
