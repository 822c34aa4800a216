// ─── Catalog Registry ───
// Categories and items, each addressed by a handle that stays bound to the
// same entity for the life of the process. Nothing here touches the store.

import type {
  CategoryDefinition,
  CategoryHandle,
  ItemDefinition,
  ItemHandle,
  ItemOptions,
  Outcome,
} from '../types.js';
import { fail, ok } from './errors.js';

const DEFAULT_ITEM_TYPE = 'item';

function isValidPrice(price: number): boolean {
  return Number.isSafeInteger(price) && price >= 0;
}

function isNonEmpty(value: string): boolean {
  return typeof value === 'string' && value.trim().length > 0;
}

export class Registry {
  private nextCategoryId = 1;
  private nextItemId = 1;

  private readonly categories = new Map<number, CategoryDefinition>();
  private readonly items = new Map<number, ItemDefinition>();
  private readonly categoryKeys = new Map<string, CategoryHandle>();
  private readonly itemKeys = new Map<number, Map<string, ItemHandle>>();

  // Only handles minted here resolve; a structurally equal object does not.
  private readonly issuedCategories = new WeakSet<CategoryHandle>();
  private readonly issuedItems = new WeakSet<ItemHandle>();

  // ─── Registration ───

  registerCategory(key: string, name: string, description = ''): Outcome<CategoryHandle> {
    if (!isNonEmpty(key)) return fail('InvalidArgument', 'Category key must be a non-empty string');
    if (!isNonEmpty(name)) return fail('InvalidArgument', 'Category name must be a non-empty string');
    if (this.categoryKeys.has(key)) {
      return fail('DuplicateKey', `Category "${key}" is already registered`);
    }

    const handle: CategoryHandle = Object.freeze({ kind: 'category', id: this.nextCategoryId++ });
    this.issuedCategories.add(handle);
    this.categories.set(handle.id, {
      handle,
      key,
      name,
      description,
      items: [],
      active: true,
    });
    this.categoryKeys.set(key, handle);
    this.itemKeys.set(handle.id, new Map());

    console.log(`[Registry] Category registered: ${key} (#${handle.id})`);
    return ok(handle);
  }

  registerItem(
    category: CategoryHandle,
    key: string,
    name: string,
    price: number,
    options: ItemOptions = {}
  ): Outcome<ItemHandle> {
    const owner = this.resolveCategory(category);
    if (!owner || !owner.active) {
      return fail('InvalidCategory', 'Category handle is unknown or retired');
    }
    if (!isNonEmpty(key)) return fail('InvalidArgument', 'Item key must be a non-empty string');
    if (!isNonEmpty(name)) return fail('InvalidArgument', 'Item name must be a non-empty string');
    if (!isValidPrice(price)) {
      return fail('InvalidArgument', `Price must be a non-negative integer, got ${price}`);
    }

    const keys = this.itemKeys.get(owner.handle.id);
    if (!keys) return fail('InvalidCategory', 'Category handle is unknown or retired');
    if (keys.has(key)) {
      return fail('DuplicateKey', `Item "${key}" already exists in category "${owner.key}"`);
    }

    const handle: ItemHandle = Object.freeze({ kind: 'item', id: this.nextItemId++ });
    this.issuedItems.add(handle);
    this.items.set(handle.id, {
      handle,
      category: owner.handle,
      categoryKey: owner.key,
      key,
      name,
      description: options.description ?? '',
      price,
      type: options.type ?? DEFAULT_ITEM_TYPE,
      active: true,
    });
    keys.set(key, handle);
    owner.items.push(handle);

    console.log(`[Registry] Item registered: ${owner.key}/${key} @ ${price}`);
    return ok(handle);
  }

  draftItem(category: CategoryHandle, key: string): ItemDraft {
    return new ItemDraft(this, category, key);
  }

  // ─── Lookup ───

  lookupCategory(handle: CategoryHandle): Outcome<Readonly<CategoryDefinition>> {
    const def = this.resolveCategory(handle);
    return def ? ok(def) : fail('NotFound', 'Unknown category handle');
  }

  lookupItem(handle: ItemHandle): Outcome<Readonly<ItemDefinition>> {
    const def = this.resolveItem(handle);
    return def ? ok(def) : fail('NotFound', 'Unknown item handle');
  }

  lookupCategoryByKey(categoryKey: string): Outcome<CategoryHandle> {
    const handle = this.categoryKeys.get(categoryKey);
    return handle ? ok(handle) : fail('NotFound', `No category "${categoryKey}"`);
  }

  lookupByKey(categoryKey: string, itemKey: string): Outcome<ItemHandle> {
    const category = this.categoryKeys.get(categoryKey);
    const handle = category ? this.itemKeys.get(category.id)?.get(itemKey) : undefined;
    return handle ? ok(handle) : fail('NotFound', `No item "${categoryKey}/${itemKey}"`);
  }

  listCategories(): Readonly<CategoryDefinition>[] {
    return [...this.categories.values()];
  }

  listItems(category: CategoryHandle): Outcome<Readonly<ItemDefinition>[]> {
    const def = this.resolveCategory(category);
    if (!def) return fail('NotFound', 'Unknown category handle');
    const items: ItemDefinition[] = [];
    for (const handle of def.items) {
      const item = this.items.get(handle.id);
      if (item) items.push(item);
    }
    return ok(items);
  }

  // Internal fast path for the session cache; undefined for foreign handles.
  resolveItem(handle: ItemHandle): ItemDefinition | undefined {
    return this.issuedItems.has(handle) ? this.items.get(handle.id) : undefined;
  }

  resolveCategory(handle: CategoryHandle): CategoryDefinition | undefined {
    return this.issuedCategories.has(handle) ? this.categories.get(handle.id) : undefined;
  }

  // ─── Administrative mutations ───

  setPrice(handle: ItemHandle, price: number): Outcome<number> {
    const item = this.resolveItem(handle);
    if (!item) return fail('NotFound', 'Unknown item handle');
    if (!isValidPrice(price)) {
      return fail('InvalidArgument', `Price must be a non-negative integer, got ${price}`);
    }
    const previous = item.price;
    item.price = price;
    console.log(`[Registry] Price changed: ${item.categoryKey}/${item.key} ${previous} -> ${price}`);
    return ok(previous);
  }

  setName(handle: ItemHandle, name: string): Outcome<string> {
    const item = this.resolveItem(handle);
    if (!item) return fail('NotFound', 'Unknown item handle');
    if (!isNonEmpty(name)) return fail('InvalidArgument', 'Item name must be a non-empty string');
    const previous = item.name;
    item.name = name;
    console.log(`[Registry] Name changed: ${item.categoryKey}/${item.key} "${previous}" -> "${name}"`);
    return ok(previous);
  }

  deactivateItem(handle: ItemHandle): Outcome<void> {
    const item = this.resolveItem(handle);
    if (!item) return fail('NotFound', 'Unknown item handle');
    item.active = false;
    console.log(`[Registry] Item retired: ${item.categoryKey}/${item.key}`);
    return ok(undefined);
  }

  deactivateCategory(handle: CategoryHandle): Outcome<void> {
    const category = this.resolveCategory(handle);
    if (!category) return fail('NotFound', 'Unknown category handle');
    category.active = false;
    console.log(`[Registry] Category retired: ${category.key}`);
    return ok(undefined);
  }

  isPurchasable(handle: ItemHandle): boolean {
    const item = this.resolveItem(handle);
    if (!item || !item.active) return false;
    const category = this.categories.get(item.category.id);
    return category?.active === true;
  }
}

// ─── Item drafts ───
// Fields stay editable until publish(); afterwards only setPrice/setName apply.

export class ItemDraft {
  private name = '';
  private price = 0;
  private type = DEFAULT_ITEM_TYPE;
  private description = '';
  private published: ItemHandle | null = null;

  constructor(
    private readonly registry: Registry,
    private readonly category: CategoryHandle,
    readonly key: string
  ) {}

  setName(name: string): this {
    this.assertDraft();
    this.name = name;
    return this;
  }

  setPrice(price: number): this {
    this.assertDraft();
    this.price = price;
    return this;
  }

  setType(type: string): this {
    this.assertDraft();
    this.type = type;
    return this;
  }

  setDescription(description: string): this {
    this.assertDraft();
    this.description = description;
    return this;
  }

  get sealed(): boolean {
    return this.published !== null;
  }

  publish(): Outcome<ItemHandle> {
    if (this.published) return ok(this.published);
    const result = this.registry.registerItem(this.category, this.key, this.name, this.price, {
      type: this.type,
      description: this.description,
    });
    if (result.success) this.published = result.value;
    return result;
  }

  private assertDraft(): void {
    if (this.published) {
      throw new Error(`Item "${this.key}" is already published; use setPrice/setName on the registry`);
    }
  }
}
