import { Hono } from 'hono';
import type { EconomyApi } from '../engine/api.js';
import { badRequest, failure, itemView, readBody } from './respond.js';

export interface CatalogRouteOptions {
  adminKey: string | null;
}

export function catalogRoutes(api: EconomyApi, options: CatalogRouteOptions) {
  const catalog = new Hono();

  // GET /catalog : every category with its items
  catalog.get('/', (c) => {
    const categories = api.listCategories().map((category) => {
      const items = api.listItems(category.handle);
      return {
        key: category.key,
        name: category.name,
        description: category.description,
        active: category.active,
        items: items.success ? items.value.map((item) => itemView(item, api.isPurchasable(item.handle))) : [],
      };
    });
    return c.json({ categories });
  });

  // GET /catalog/:category
  catalog.get('/:category', (c) => {
    const handle = api.lookupCategoryByKey(c.req.param('category'));
    if (!handle.success) return failure(c, handle.error);
    const category = api.lookupCategory(handle.value);
    const items = api.listItems(handle.value);
    if (!category.success) return failure(c, category.error);
    if (!items.success) return failure(c, items.error);

    return c.json({
      key: category.value.key,
      name: category.value.name,
      description: category.value.description,
      active: category.value.active,
      items: items.value.map((item) => itemView(item, api.isPurchasable(item.handle))),
    });
  });

  // GET /catalog/:category/:item
  catalog.get('/:category/:item', (c) => {
    const handle = api.lookupByKey(c.req.param('category'), c.req.param('item'));
    if (!handle.success) return failure(c, handle.error);
    const item = api.lookupItem(handle.value);
    if (!item.success) return failure(c, item.error);
    return c.json(itemView(item.value, api.isPurchasable(handle.value)));
  });

  // PATCH /catalog/:category/:item : admin price/name change
  catalog.patch('/:category/:item', async (c) => {
    if (!options.adminKey) {
      return c.json({ error: 'Admin routes are disabled', code: 'NotFound' }, 404);
    }
    if (c.req.header('X-Admin-Key') !== options.adminKey) {
      return c.json({ error: 'Invalid admin key', code: 'Unauthorized' }, 401);
    }

    const handle = api.lookupByKey(c.req.param('category'), c.req.param('item'));
    if (!handle.success) return failure(c, handle.error);

    const body = await readBody(c);
    if (!body) return badRequest(c, 'Body must be a JSON object');
    const { price, name } = body;
    if (price === undefined && name === undefined) return badRequest(c, 'Provide price and/or name');
    if (price !== undefined && (typeof price !== 'number' || !Number.isSafeInteger(price) || price < 0)) {
      return badRequest(c, 'price must be a non-negative integer');
    }
    if (name !== undefined && (typeof name !== 'string' || name.trim() === '')) {
      return badRequest(c, 'name must be a non-empty string');
    }

    if (typeof price === 'number') {
      const changed = api.setPrice(handle.value, price);
      if (!changed.success) return failure(c, changed.error);
    }
    if (typeof name === 'string') {
      const changed = api.setName(handle.value, name);
      if (!changed.success) return failure(c, changed.error);
    }

    const item = api.lookupItem(handle.value);
    if (!item.success) return failure(c, item.error);
    return c.json(itemView(item.value, api.isPurchasable(handle.value)));
  });

  return catalog;
}
