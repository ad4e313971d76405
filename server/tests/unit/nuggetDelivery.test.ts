import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Quote, SubscriptionRow } from '@shared/schema';
import { MemStorage } from '../../storage';
import { NuggetDeliveryAgent, pickDailyQuote, type NuggetSender } from '../../subscriptions/nuggetDelivery';
import { NotFoundError } from '../../types/errors';
import { makeJobRow, makeMetadataRow, makeQuote, makeSubscription } from '../helpers/quoteFixtures';

// 12 UTC in July is 8 AM in New York
const SUMMER_NOON_UTC = new Date('2024-07-15T12:00:00.000Z');

function recordingSender() {
  const deliveries: Array<{ email: string; quoteId: string }> = [];
  const sender: NuggetSender = {
    send: vi.fn(async (subscription: SubscriptionRow, quote: Quote) => {
      deliveries.push({ email: subscription.email, quoteId: quote.id });
    }),
  };
  return { sender, deliveries };
}

describe('pickDailyQuote', () => {
  it('never picks metadata or job rows', async () => {
    const storage = new MemStorage({ pageSize: 1 });
    await storage.putQuote(makeMetadataRow(['life']));
    await storage.putQuote(makeJobRow('a-job'));
    await storage.putQuote(makeQuote('q1', 'Be yourself', 'Oscar Wilde'));
    await storage.putQuote(makeQuote('q2', 'Keep going', 'Mark Twain'));

    expect((await pickDailyQuote(storage, () => 0))?.id).toBe('q1');
    expect((await pickDailyQuote(storage, () => 0.99))?.id).toBe('q2');
  });

  it('returns nothing for an empty table', async () => {
    expect(await pickDailyQuote(new MemStorage(), () => 0)).toBeUndefined();
  });
});

describe('NuggetDeliveryAgent', () => {
  let storage: MemStorage;

  beforeEach(async () => {
    storage = new MemStorage({ pageSize: 2 });
    await storage.putQuote(makeQuote('q1', 'Be yourself', 'Oscar Wilde'));
    await storage.putSubscription(makeSubscription('ann@example.test'));
    await storage.putSubscription(makeSubscription('bo@example.test', { deliveryMethod: 'push' }));
    await storage.putSubscription(makeSubscription('cy@example.test', { timezone: 'Asia/Tokyo' }));
    await storage.putSubscription(makeSubscription('di@example.test', { isSubscribed: false }));
  });

  it('sends the quote to subscribers due this hour through their method', async () => {
    const email = recordingSender();
    const push = recordingSender();
    const agent = new NuggetDeliveryAgent({ email: email.sender, push: push.sender }, storage, () => 0);

    const result = await agent.runOnce(12, SUMMER_NOON_UTC);

    expect(result).toEqual({ hourUtc: 12, quoteId: 'q1', selected: 2, sent: 2, failed: 0, skipped: 0 });
    expect(email.deliveries).toEqual([{ email: 'ann@example.test', quoteId: 'q1' }]);
    expect(push.deliveries).toEqual([{ email: 'bo@example.test', quoteId: 'q1' }]);
  });

  it('counts failures and keeps going', async () => {
    const failing: NuggetSender = { send: vi.fn().mockRejectedValue(new Error('mailbox full')) };
    const push = recordingSender();
    const agent = new NuggetDeliveryAgent({ email: failing, push: push.sender }, storage, () => 0);

    const result = await agent.runOnce(12, SUMMER_NOON_UTC);

    expect(result).toMatchObject({ selected: 2, sent: 1, failed: 1, skipped: 0 });
    expect(push.deliveries).toHaveLength(1);
  });

  it('skips subscribers whose method has no sender', async () => {
    const email = recordingSender();
    const agent = new NuggetDeliveryAgent({ email: email.sender }, storage, () => 0);

    expect(await agent.runOnce(12, SUMMER_NOON_UTC)).toMatchObject({ sent: 1, failed: 0, skipped: 1 });
  });

  it('does nothing when nobody is due', async () => {
    const email = recordingSender();
    const agent = new NuggetDeliveryAgent({ email: email.sender }, storage, () => 0);

    expect(await agent.runOnce(3, SUMMER_NOON_UTC)).toEqual({
      hourUtc: 3,
      quoteId: null,
      selected: 0,
      sent: 0,
      failed: 0,
      skipped: 0,
    });
    expect(email.sender.send).not.toHaveBeenCalled();
  });

  it('fails when there is no quote to send', async () => {
    await storage.deleteQuote('q1');
    const agent = new NuggetDeliveryAgent({ email: recordingSender().sender }, storage, () => 0);

    await expect(agent.runOnce(12, SUMMER_NOON_UTC)).rejects.toBeInstanceOf(NotFoundError);
  });
});
