import type {
  DeliveryMethod,
  NotificationPreferences,
  SubscriptionRow,
} from "../../shared/schema";
import type { IStorage } from "../storage";
import { withSource } from "../logger";
import { NotFoundError } from "../types/errors";
import { drainPages } from "../utils/pagination/drainPages";
import { nowIso } from "../quotes/quoteRecords";

const log = withSource("subscriptions");

export interface SubscriptionInput {
  isSubscribed: boolean;
  deliveryMethod: DeliveryMethod;
  timezone: string;
  notificationPreferences: NotificationPreferences;
}

export interface SubscriberListing {
  subscribers: SubscriptionRow[];
  total: number;
  active: number;
}

/** Every stored subscription across all pages, in key order. */
export async function listSubscriptions(storage: IStorage): Promise<SubscriptionRow[]> {
  const rows: SubscriptionRow[] = [];
  for await (const row of drainPages((startKey) => storage.scanSubscriptions({ startKey }))) {
    rows.push(row);
  }
  return rows;
}

function newestFirst(a: SubscriptionRow, b: SubscriptionRow): number {
  if (a.createdAt < b.createdAt) return 1;
  if (a.createdAt > b.createdAt) return -1;
  return 0;
}

export class SubscriptionService {
  constructor(private readonly storage: IStorage) {}

  async get(email: string): Promise<SubscriptionRow> {
    const row = await this.storage.getSubscription(email);
    if (!row) {
      throw new NotFoundError("No subscription found");
    }
    return row;
  }

  /** Create or replace the caller's subscription; the first creation time is kept. */
  async save(email: string, input: SubscriptionInput): Promise<SubscriptionRow> {
    const existing = await this.storage.getSubscription(email);
    const now = nowIso();
    const saved = await this.storage.putSubscription({
      email,
      isSubscribed: input.isSubscribed,
      deliveryMethod: input.deliveryMethod,
      timezone: input.timezone,
      notificationPreferences: { ...input.notificationPreferences },
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    });

    log.info(
      {
        isSubscribed: saved.isSubscribed,
        deliveryMethod: saved.deliveryMethod,
        timezone: saved.timezone,
        deliveryHour: saved.notificationPreferences.deliveryHour,
        created: !existing,
      },
      "subscription saved"
    );
    return saved;
  }

  async remove(email: string): Promise<boolean> {
    const removed = await this.storage.deleteSubscription(email);
    log.info({ removed }, "subscription deleted");
    return removed;
  }

  /** Admin view: every subscriber, newest first, with the active count. */
  async listAll(): Promise<SubscriberListing> {
    const subscribers = (await listSubscriptions(this.storage)).sort(newestFirst);
    const active = subscribers.filter((row) => row.isSubscribed).length;
    log.debug({ total: subscribers.length, active }, "listed subscribers");
    return { subscribers, total: subscribers.length, active };
  }
}
