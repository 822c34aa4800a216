import type { EconomyApi } from '../engine/api.js';
import { describeFailure } from '../engine/errors.js';

// ─── Default Catalog ───
// Registered at boot through the public API, the same way a plugin would.

export interface SeedItem {
  key: string;
  name: string;
  price: number;
  type?: string;
  description?: string;
}

export interface SeedCategory {
  key: string;
  name: string;
  description: string;
  items: SeedItem[];
}

export const DEFAULT_CATALOG: SeedCategory[] = [
  {
    key: 'weapons',
    name: 'Weapons',
    description: 'Permanent weapon unlocks',
    items: [
      { key: 'ak47', name: 'AK-47', price: 1500, type: 'weapon' },
      { key: 'm4a1', name: 'M4A1', price: 1600, type: 'weapon' },
      { key: 'deagle', name: 'Desert Eagle', price: 700, type: 'weapon' },
    ],
  },
  {
    key: 'skins',
    name: 'Player Skins',
    description: 'Cosmetic player models',
    items: [
      { key: 'urban', name: 'Urban', price: 400, type: 'skin' },
      { key: 'arctic', name: 'Arctic', price: 400, type: 'skin' },
    ],
  },
  {
    key: 'trails',
    name: 'Trails',
    description: 'Toggleable movement effects',
    items: [
      { key: 'rainbow', name: 'Rainbow Trail', price: 250, type: 'toggle' },
      { key: 'smoke', name: 'Smoke Trail', price: 150, type: 'toggle', description: 'Leaves a short smoke plume' },
    ],
  },
];

// Returns the number of items registered. Duplicates are logged and skipped.
export function registerCatalog(api: EconomyApi, catalog: SeedCategory[] = DEFAULT_CATALOG): number {
  let registered = 0;
  for (const seed of catalog) {
    const existing = api.lookupCategoryByKey(seed.key);
    const category = existing.success ? existing : api.registerCategory(seed.key, seed.name, seed.description);
    if (!category.success) {
      console.warn(`[Catalog] Skipping category ${seed.key}: ${describeFailure(category.error)}`);
      continue;
    }
    for (const item of seed.items) {
      const result = api.registerItem(category.value, item.key, item.name, item.price, {
        type: item.type,
        description: item.description,
      });
      if (result.success) registered++;
      else console.warn(`[Catalog] Skipping item ${seed.key}/${item.key}: ${describeFailure(result.error)}`);
    }
  }
  console.log(`[Catalog] ${registered} item(s) registered`);
  return registered;
}
