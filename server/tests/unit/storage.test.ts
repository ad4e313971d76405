import { describe, it, expect, beforeEach } from 'vitest';
import { MemStorage } from '../../storage';
import { collectPages } from '../../utils/pagination/drainPages';
import { makeQuote, makeSubscription } from '../helpers/quoteFixtures';

describe('MemStorage - quotes', () => {
  let storage: MemStorage;

  beforeEach(async () => {
    storage = new MemStorage({ pageSize: 2 });
    for (const id of ['q3', 'q1', 'q5', 'q2', 'q4']) {
      await storage.putQuote(makeQuote(id, `Quote ${id}`, 'Author'));
    }
  });

  it('scans in id order across pages', async () => {
    const first = await storage.scanQuotes();
    expect(first.items.map((row) => row.id)).toEqual(['q1', 'q2']);
    expect(first.lastEvaluatedKey).toBeDefined();

    const all = await collectPages((startKey) => storage.scanQuotes({ startKey }));
    expect(all.map((row) => row.id)).toEqual(['q1', 'q2', 'q3', 'q4', 'q5']);
  });

  it('honors an explicit limit', async () => {
    const page = await storage.scanQuotes({ limit: 4 });
    expect(page.items).toHaveLength(4);
    const rest = await storage.scanQuotes({ limit: 4, startKey: page.lastEvaluatedKey });
    expect(rest.items.map((row) => row.id)).toEqual(['q5']);
    expect(rest.lastEvaluatedKey).toBeUndefined();
  });

  it('returns copies of stored rows', async () => {
    await storage.putQuote(makeQuote('t1', 'Tagged', 'Author', { tags: ['life'] }));
    const row = await storage.getQuote('t1');
    row?.tags.push('mutated');
    expect((await storage.getQuote('t1'))?.tags).toEqual(['life']);
  });

  it('replaces a row with the same id', async () => {
    await storage.putQuote(makeQuote('q1', 'Replaced', 'Someone'));
    const row = await storage.getQuote('q1');
    expect(row?.quote).toBe('Replaced');
    expect(row?.author).toBe('Someone');
  });

  it('deletes rows once', async () => {
    expect(await storage.deleteQuote('q1')).toBe(true);
    expect(await storage.deleteQuote('q1')).toBe(false);
    expect(await storage.getQuote('q1')).toBeUndefined();
  });

  it('sets a custom image only on existing rows', async () => {
    expect(await storage.setQuoteImage('missing', 'https://img.test/a.png', '2024-02-01T00:00:00.000Z')).toBeUndefined();

    const updated = await storage.setQuoteImage('q2', 'https://img.test/a.png', '2024-02-01T00:00:00.000Z');
    expect(updated?.imageUrl).toBe('https://img.test/a.png');
    expect(updated?.updatedAt).toBe('2024-02-01T00:00:00.000Z');
    expect(updated?.quote).toBe('Quote q2');
  });
});

describe('MemStorage - tags', () => {
  it('stores, scans and deletes tags', async () => {
    const storage = new MemStorage({ pageSize: 1 });
    await storage.putTag({ tag: 'wisdom', createdAt: '2024-01-01T00:00:00.000Z' });
    await storage.putTag({ tag: 'humor', createdAt: '2024-01-02T00:00:00.000Z' });

    expect(await storage.getTag('humor')).toEqual({ tag: 'humor', createdAt: '2024-01-02T00:00:00.000Z' });
    const all = await collectPages((startKey) => storage.scanTags({ startKey }));
    expect(all.map((row) => row.tag)).toEqual(['humor', 'wisdom']);

    expect(await storage.deleteTag('humor')).toBe(true);
    expect(await storage.getTag('humor')).toBeUndefined();
  });
});

describe('MemStorage - subscriptions', () => {
  let storage: MemStorage;

  beforeEach(async () => {
    storage = new MemStorage({ pageSize: 2 });
    for (const email of ['c@example.test', 'a@example.test', 'b@example.test']) {
      await storage.putSubscription(makeSubscription(email));
    }
  });

  it('scans in email order across pages', async () => {
    const all = await collectPages((startKey) => storage.scanSubscriptions({ startKey }));
    expect(all.map((row) => row.email)).toEqual(['a@example.test', 'b@example.test', 'c@example.test']);
  });

  it('returns copies of the stored preferences', async () => {
    const row = await storage.getSubscription('a@example.test');
    if (row) row.notificationPreferences.deliveryHour = 20;
    expect((await storage.getSubscription('a@example.test'))?.notificationPreferences).toEqual({ deliveryHour: 8 });
  });

  it('replaces and deletes subscriptions', async () => {
    await storage.putSubscription(makeSubscription('a@example.test', { isSubscribed: false }));
    expect((await storage.getSubscription('a@example.test'))?.isSubscribed).toBe(false);

    expect(await storage.deleteSubscription('a@example.test')).toBe(true);
    expect(await storage.deleteSubscription('a@example.test')).toBe(false);
    expect(await storage.getSubscription('a@example.test')).toBeUndefined();
  });
});
