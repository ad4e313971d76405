/**
 * Daily nugget delivery
 *
 * One run handles one UTC hour: it picks a random quote and hands it to the
 * sender registered for each matching subscriber's delivery method. Mail and
 * push providers plug in as NuggetSender implementations; what triggers a run
 * each hour is left to the deployment.
 */

import type { DeliveryMethod, Quote, SubscriptionRow } from "../../shared/schema";
import type { IStorage } from "../storage";
import { withSource } from "../logger";
import { metrics } from "../metrics";
import { NotFoundError, toError } from "../types/errors";
import { listAllQuotes } from "../quotes/quoteRecords";
import { listSubscriptions } from "./subscriptionService";
import { selectSubscribersForHour } from "./deliverySchedule";

const log = withSource("nuggets");

export interface NuggetSender {
  send(subscription: SubscriptionRow, quote: Quote): Promise<void>;
}

export type NuggetSenders = Partial<Record<DeliveryMethod, NuggetSender>>;

export interface DeliveryRunResult {
  hourUtc: number;
  quoteId: string | null;
  selected: number;
  sent: number;
  failed: number;
  skipped: number;
}

// Writes each delivery to the log; used where no provider is configured.
export class LoggingNuggetSender implements NuggetSender {
  constructor(private readonly method: DeliveryMethod) {}

  async send(subscription: SubscriptionRow, quote: Quote): Promise<void> {
    log.info(
      { method: this.method, email: subscription.email, quoteId: quote.id },
      "daily nugget delivered to log"
    );
  }
}

export function defaultNuggetSenders(): NuggetSenders {
  return {
    email: new LoggingNuggetSender("email"),
    push: new LoggingNuggetSender("push"),
  };
}

/** A random quote; metadata and job rows are never picked. */
export async function pickDailyQuote(
  storage: IStorage,
  random: () => number = Math.random
): Promise<Quote | undefined> {
  const quotes = await listAllQuotes(storage);
  if (quotes.length === 0) return undefined;
  const index = Math.min(quotes.length - 1, Math.floor(random() * quotes.length));
  return quotes[index];
}

export class NuggetDeliveryAgent {
  constructor(
    private readonly senders: NuggetSenders,
    private readonly storage: IStorage,
    private readonly random: () => number = Math.random
  ) {}

  async runOnce(hourUtc: number, now: Date = new Date()): Promise<DeliveryRunResult> {
    const recipients = selectSubscribersForHour(hourUtc, await listSubscriptions(this.storage), now);
    log.info({ hourUtc, recipients: recipients.length }, "daily nugget run started");

    const result: DeliveryRunResult = {
      hourUtc,
      quoteId: null,
      selected: recipients.length,
      sent: 0,
      failed: 0,
      skipped: 0,
    };
    if (recipients.length === 0) return result;

    const quote = await pickDailyQuote(this.storage, this.random);
    if (!quote) {
      throw new NotFoundError("No quote available", { hourUtc });
    }
    result.quoteId = quote.id;

    // One failing recipient never stops the rest
    for (const subscription of recipients) {
      const method = subscription.deliveryMethod;
      const sender = this.senders[method];
      if (!sender) {
        result.skipped++;
        metrics.recordNuggetDelivery(method, "skipped");
        log.warn({ method, email: subscription.email }, "no sender for delivery method");
        continue;
      }
      try {
        await sender.send(subscription, quote);
        result.sent++;
        metrics.recordNuggetDelivery(method, "sent");
      } catch (error) {
        result.failed++;
        metrics.recordNuggetDelivery(method, "failed");
        log.error({ err: toError(error), method, email: subscription.email }, "daily nugget delivery failed");
      }
    }

    log.info(result, "daily nugget run complete");
    return result;
  }
}
