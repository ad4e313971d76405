import { describe, it, expect, beforeEach, vi } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../../app';
import { MemStorage } from '../../storage';
import type { NuggetSender } from '../../subscriptions/nuggetDelivery';
import { isDaylightSavingPeriod } from '../../subscriptions/deliverySchedule';
import { ADMIN_HEADERS, makeQuote, makeSubscription } from '../helpers/quoteFixtures';

const READER_HEADERS = {
  'x-dev-firebase-uid': 'reader-1',
  'x-dev-email': 'reader@example.test',
} as const;

describe('Subscriptions API', () => {
  let storage: MemStorage;
  let app: Express;
  let emailSender: NuggetSender;

  beforeEach(() => {
    storage = new MemStorage({ pageSize: 2 });
    emailSender = { send: vi.fn().mockResolvedValue(undefined) };
    ({ app } = createApp(storage, { nuggetSenders: { email: emailSender } }));
  });

  describe('/api/subscriptions', () => {
    it('requires authentication', async () => {
      const res = await request(app).get('/api/subscriptions');
      expect(res.status).toBe(401);
    });

    it('needs an account email', async () => {
      const res = await request(app).get('/api/subscriptions').set('x-dev-firebase-uid', 'reader-1');
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Validation failed', details: ['Account has no email address'] });
    });

    it('returns 404 before the first save', async () => {
      const res = await request(app).get('/api/subscriptions').set(READER_HEADERS);
      expect(res.status).toBe(404);
      expect(res.body.error.message).toBe('No subscription found');
    });

    it('saves a subscription with defaults', async () => {
      const res = await request(app).put('/api/subscriptions').set(READER_HEADERS).send({ isSubscribed: true });

      expect(res.status).toBe(200);
      expect(res.body.message).toBe('Subscription updated successfully');
      expect(res.body.subscription).toMatchObject({
        email: 'reader@example.test',
        isSubscribed: true,
        deliveryMethod: 'email',
        timezone: 'America/New_York',
        notificationPreferences: { deliveryHour: 8 },
      });

      const fetched = await request(app).get('/api/subscriptions').set(READER_HEADERS);
      expect(fetched.body).toEqual(res.body.subscription);
    });

    it('keeps createdAt and extra preferences on update', async () => {
      await storage.putSubscription(makeSubscription('reader@example.test'));

      const res = await request(app)
        .put('/api/subscriptions')
        .set(READER_HEADERS)
        .send({
          isSubscribed: true,
          deliveryMethod: 'push',
          timezone: 'Europe/London',
          notificationPreferences: { deliveryHour: 19, vibrate: true },
        });

      expect(res.body.subscription).toMatchObject({
        deliveryMethod: 'push',
        timezone: 'Europe/London',
        notificationPreferences: { deliveryHour: 19, vibrate: true },
        createdAt: '2024-01-01T00:00:00.000Z',
      });
    });

    it('rejects an out-of-range delivery hour', async () => {
      const res = await request(app)
        .put('/api/subscriptions')
        .set(READER_HEADERS)
        .send({ notificationPreferences: { deliveryHour: 24 } });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: 'Validation failed',
        details: ["'deliveryHour' must be an hour from 0 to 23"],
      });
    });

    it('rejects an unknown delivery method', async () => {
      const res = await request(app).put('/api/subscriptions').set(READER_HEADERS).send({ deliveryMethod: 'fax' });
      expect(res.status).toBe(400);
      expect(res.body.details).toEqual(["'deliveryMethod' must be email or push"]);
    });

    it('deletes the subscription', async () => {
      await storage.putSubscription(makeSubscription('reader@example.test'));

      const res = await request(app).delete('/api/subscriptions').set(READER_HEADERS);
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: 'Subscription deleted successfully' });
      expect(await storage.getSubscription('reader@example.test')).toBeUndefined();
    });
  });

  describe('/api/admin/subscriptions', () => {
    beforeEach(async () => {
      await storage.putSubscription(makeSubscription('a@example.test', { createdAt: '2024-01-01T00:00:00.000Z' }));
      await storage.putSubscription(
        makeSubscription('b@example.test', { createdAt: '2024-02-01T00:00:00.000Z', isSubscribed: false })
      );
    });

    it('is admin only', async () => {
      const res = await request(app).get('/api/admin/subscriptions').set(READER_HEADERS);
      expect(res.status).toBe(403);
    });

    it('lists subscribers newest first', async () => {
      const res = await request(app).get('/api/admin/subscriptions').set(ADMIN_HEADERS);
      expect(res.status).toBe(200);
      expect(res.body.subscribers.map((s: { email: string }) => s.email)).toEqual([
        'b@example.test',
        'a@example.test',
      ]);
      expect(res.body).toMatchObject({ total: 2, active: 1 });
    });

    it('runs a delivery for the given UTC hour', async () => {
      await storage.putQuote(makeQuote('q1', 'Be yourself', 'Oscar Wilde'));
      // 8 AM in New York
      const newYorkHour = isDaylightSavingPeriod(new Date()) ? 12 : 13;

      const res = await request(app)
        .post('/api/admin/subscriptions/deliver')
        .set(ADMIN_HEADERS)
        .send({ hourUtc: newYorkHour });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        message: `Daily delivery complete for UTC hour ${newYorkHour}`,
        hourUtc: newYorkHour,
        quoteId: 'q1',
        selected: 1,
        sent: 1,
        failed: 0,
        skipped: 0,
      });
      expect(emailSender.send).toHaveBeenCalledTimes(1);
    });

    it('rejects an invalid hour', async () => {
      const res = await request(app).post('/api/admin/subscriptions/deliver').set(ADMIN_HEADERS).send({ hourUtc: 30 });
      expect(res.status).toBe(400);
      expect(res.body.details).toEqual(["'hourUtc' must be an hour from 0 to 23"]);
    });
  });
});
