import { Hono, type Context } from 'hono';
import type { EconomyApi } from '../engine/api.js';
import { badRequest, failure, parseToken, readBody, sessionView } from './respond.js';

// The game host reports joins/leaves here; menus drive purchases through the
// same session tokens.

export function sessionRoutes(api: EconomyApi) {
  const sessions = new Hono();

  async function itemRequest(c: Context, rawToken: string) {
    const token = parseToken(rawToken);
    if (token === null) return { error: badRequest(c, 'Session token must be a positive integer') };
    const body = await readBody(c);
    if (!body || typeof body.category !== 'string' || typeof body.item !== 'string') {
      return { error: badRequest(c, 'category and item are required strings') };
    }
    const item = api.lookupByKey(body.category, body.item);
    if (!item.success) return { error: failure(c, item.error) };
    return { token, item: item.value };
  }

  // POST /sessions : player joined
  sessions.post('/', async (c) => {
    const body = await readBody(c);
    if (!body) return badRequest(c, 'Body must be a JSON object');
    const { slot, identity } = body;
    if (typeof slot !== 'number') return badRequest(c, 'slot must be a number');
    if (typeof identity !== 'string') return badRequest(c, 'identity must be a string');

    const joined = api.join(slot, identity);
    if (!joined.success) return failure(c, joined.error);
    const session = api.getSession(joined.value);
    return c.json({ token: joined.value, state: session.success ? session.value.state : 'loading' }, 202);
  });

  // GET /sessions/:token
  sessions.get('/:token', (c) => {
    const token = parseToken(c.req.param('token'));
    if (token === null) return badRequest(c, 'Session token must be a positive integer');
    const session = api.getSession(token);
    if (!session.success) return failure(c, session.error);
    return c.json(sessionView(session.value));
  });

  // DELETE /sessions/:token : player left
  sessions.delete('/:token', (c) => {
    const token = parseToken(c.req.param('token'));
    if (token === null) return badRequest(c, 'Session token must be a positive integer');
    const left = api.leave(token);
    if (!left.success) return failure(c, left.error);
    return c.json({ token, state: left.value }, 202);
  });

  // POST /sessions/:token/credits : { delta, reason? }
  sessions.post('/:token/credits', async (c) => {
    const token = parseToken(c.req.param('token'));
    if (token === null) return badRequest(c, 'Session token must be a positive integer');
    const body = await readBody(c);
    if (!body || typeof body.delta !== 'number') return badRequest(c, 'delta must be a number');
    const reason = typeof body.reason === 'string' ? body.reason : 'http';

    const balance = api.adjustCredits(token, body.delta, reason);
    if (!balance.success) return failure(c, balance.error);
    return c.json({ token, balance: balance.value });
  });

  // POST /sessions/:token/purchase : { category, item }
  sessions.post('/:token/purchase', async (c) => {
    const request = await itemRequest(c, c.req.param('token'));
    if ('error' in request) return request.error;

    const receipt = api.purchase(request.token, request.item);
    if (!receipt.success) return failure(c, receipt.error);
    const { receiptId, pricePaid, balanceAfter, acquiredAt } = receipt.value;
    return c.json({ receiptId, pricePaid, balance: balanceAfter, acquiredAt });
  });

  // POST /sessions/:token/sell : { category, item }
  sessions.post('/:token/sell', async (c) => {
    const request = await itemRequest(c, c.req.param('token'));
    if ('error' in request) return request.error;

    const sale = api.sell(request.token, request.item);
    if (!sale.success) return failure(c, sale.error);
    return c.json({ refund: sale.value.refund, balance: sale.value.balanceAfter });
  });

  return sessions;
}
