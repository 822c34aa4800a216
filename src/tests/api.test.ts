#!/usr/bin/env npx tsx
/**
 * Economy API Tests
 * The versioned surface, the event hub and the default catalog seed.
 * Run: npx tsx src/tests/api.test.ts
 */

import { API_VERSION } from '../engine/api.js';
import { EconomyEvents } from '../engine/events.js';
import { DEFAULT_CATALOG, registerCatalog } from '../world/catalog.js';
import type { CategoryHandle } from '../types.js';
import { banner, createEconomy, equal, failureCode, joinActive, run, section, test, unwrap } from './harness.js';

async function main() {
  banner('ECONOMY API TESTS');

  section('Surface');

  await test('api reports version 1', async () => {
    const e = await createEconomy();
    equal(e.api.version, 1);
    equal(API_VERSION, 1);
    await e.sessions.shutdown();
  });

  await test('stale and foreign input comes back as a failure, never a throw', async () => {
    const e = await createEconomy();
    const foreign: CategoryHandle = { kind: 'category', id: 1 };
    equal(failureCode(e.api.lookupCategory(foreign)), 'NotFound');
    equal(failureCode(e.api.listItems(foreign)), 'NotFound');
    equal(failureCode(e.api.getSession(1234)), 'NotFound');
    equal(failureCode(e.api.purchase(1234, { kind: 'item', id: 1 })), 'SessionNotActive');
    equal(failureCode(e.api.listOwned(1234)), 'SessionNotActive');
    await e.sessions.shutdown();
  });

  await test('drafts published through the api are purchasable', async () => {
    const e = await createEconomy({ sessions: { startingCredits: 300 } });
    const trails = unwrap(e.api.registerCategory('trails', 'Trails'));
    const smoke = unwrap(e.api.draftItem(trails, 'smoke').setName('Smoke').setPrice(150).setType('toggle').publish());
    const token = await joinActive(e, 1, 'alice');

    equal(unwrap(e.api.purchase(token, smoke)).balanceAfter, 150);
    equal(unwrap(e.api.listOwned(token)).map((o) => o.itemKey), ['smoke']);
    await e.sessions.shutdown();
  });

  await test('retiring a category makes its items unpurchasable', async () => {
    const e = await createEconomy({ sessions: { startingCredits: 300 } });
    const trails = unwrap(e.api.registerCategory('trails', 'Trails'));
    const smoke = unwrap(e.api.registerItem(trails, 'smoke', 'Smoke', 150));
    unwrap(e.api.deactivateCategory(trails));
    const token = await joinActive(e, 1, 'alice');

    equal(e.api.isPurchasable(smoke), false);
    equal(failureCode(e.api.purchase(token, smoke)), 'ItemNotPurchasable');
    equal(unwrap(e.api.lookupCategory(trails)).active, false);
    await e.sessions.shutdown();
  });

  await test('listSessions shows live sessions in join order until they retire', async () => {
    const e = await createEconomy();
    const alice = await joinActive(e, 1, 'alice');
    const bob = unwrap(e.api.join(2, 'bob'));

    equal(
      e.api.listSessions().map((s) => [s.token, s.identity, s.state]),
      [
        [alice, 'alice', 'active'],
        [bob, 'bob', 'loading'],
      ]
    );

    await e.sessions.settle();
    unwrap(e.api.leave(alice));
    await e.sessions.settle();
    equal(
      e.api.listSessions().map((s) => s.identity),
      ['bob']
    );
    equal(e.api.sessionForIdentity('alice'), null);
    equal(e.api.sessionForIdentity('bob'), bob);
    await e.sessions.shutdown();
  });

  section('Events');

  await test('purchase emits creditsChanged then itemPurchased', async () => {
    const e = await createEconomy({ sessions: { startingCredits: 2000 }, catalog: (api) => registerCatalog(api) });
    const seen: string[] = [];
    e.api.events.on('creditsChanged', (event) => seen.push(`credits:${event.previous}->${event.balance}`));
    e.api.events.on('itemPurchased', (event) => seen.push(`purchased:${event.price}`));
    const token = await joinActive(e, 1, 'alice');

    unwrap(e.api.purchase(token, unwrap(e.api.lookupByKey('weapons', 'deagle'))));
    equal(seen, ['credits:2000->1300', 'purchased:700']);
    await e.sessions.shutdown();
  });

  await test('unsubscribe stops delivery and a throwing listener is contained', () => {
    const events = new EconomyEvents();
    const seen: number[] = [];
    events.on('sessionRetired', () => {
      throw new Error('listener failure');
    });
    const off = events.on('sessionRetired', (event) => seen.push(event.token));

    events.emit('sessionRetired', { token: 1, identity: 'alice' });
    off();
    events.emit('sessionRetired', { token: 2, identity: 'alice' });
    equal(seen, [1]);
  });

  section('Default catalog');

  await test('seed registers every item once and skips duplicates on a second run', async () => {
    const e = await createEconomy();
    const total = DEFAULT_CATALOG.reduce((sum, category) => sum + category.items.length, 0);
    equal(registerCatalog(e.api), total);
    equal(registerCatalog(e.api), 0);
    equal(
      e.api.listCategories().map((c) => c.key),
      ['weapons', 'skins', 'trails']
    );
    await e.sessions.shutdown();
  });
}

run(main);
