import { asc, eq, gt } from "drizzle-orm";
import type { IStorage } from "./storage";
import { quotes, subscriptions, tags, type QuoteRow, type SubscriptionRow, type TagRow } from "../shared/schema";
import type { Database } from "./db";
import { metrics } from "./metrics";
import { config } from "./config";
import { withSource } from "./logger";
import { DatabaseError } from "./types/errors";
import type { ScanOptions, ScanPage } from "./utils/pagination/drainPages";
import { decodeScanKey, toScanPage } from "./utils/pagination/scanKey";

const log = withSource("db");

/**
 * Execute a DB operation while measuring latency, recording metrics, and logging slow queries.
 * Rows count is inferred for arrays; otherwise defaults to 1 for single-object/unknown results.
 */
async function execWithMetrics<T>(
  operation: string,
  table: string,
  exec: () => Promise<T>,
  context?: Record<string, unknown>
): Promise<T> {
  const start = performance.now();
  let failed = false;
  let rows = 0;
  try {
    const result = await exec();
    rows = Array.isArray(result) ? result.length : 1;
    return result;
  } catch (error) {
    failed = true;
    throw new DatabaseError(`Database ${operation} failed`, {
      table,
      cause: error instanceof Error ? error.message : String(error),
    });
  } finally {
    const duration = performance.now() - start;
    metrics.observeDbQuery(operation, table, duration, rows);
    if (duration > config.dbSlowQueryMs) {
      log.warn(
        {
          operation,
          table,
          duration_ms: Math.round(duration),
          error: failed || undefined,
          ...(context ?? {}),
        },
        "db slow query"
      );
    }
  }
}

function firstOrThrow<T>(rows: T[], operation: string): T {
  const [row] = rows;
  if (row === undefined) {
    throw new DatabaseError(`Database ${operation} returned no row`);
  }
  return row;
}

export class PgStorage implements IStorage {
  constructor(
    private readonly db: Database,
    private readonly pageSize: number = config.scanPageSize
  ) {}

  // Quotes
  async scanQuotes(options: ScanOptions = {}): Promise<ScanPage<QuoteRow>> {
    const limit = options.limit ?? this.pageSize;
    const after = options.startKey ? decodeScanKey(options.startKey) : undefined;
    const rows = await execWithMetrics("scan", "quotes", () =>
      this.db
        .select()
        .from(quotes)
        .where(after === undefined ? undefined : gt(quotes.id, after))
        .orderBy(asc(quotes.id))
        .limit(limit + 1)
    );
    return toScanPage(rows, limit, (row) => row.id);
  }

  async getQuote(id: string): Promise<QuoteRow | undefined> {
    const rows = await execWithMetrics("get", "quotes", () =>
      this.db.select().from(quotes).where(eq(quotes.id, id))
    );
    return rows[0];
  }

  async putQuote(row: QuoteRow): Promise<QuoteRow> {
    const { id, ...fields } = row;
    const rows = await execWithMetrics(
      "put",
      "quotes",
      () =>
        this.db
          .insert(quotes)
          .values(row)
          .onConflictDoUpdate({ target: quotes.id, set: fields })
          .returning(),
      { id }
    );
    return firstOrThrow(rows, "put quote");
  }

  async deleteQuote(id: string): Promise<boolean> {
    const rows = await execWithMetrics("delete", "quotes", () =>
      this.db.delete(quotes).where(eq(quotes.id, id)).returning({ id: quotes.id })
    );
    return rows.length > 0;
  }

  async setQuoteImage(id: string, imageUrl: string, updatedAt: string): Promise<QuoteRow | undefined> {
    const rows = await execWithMetrics("update_image", "quotes", () =>
      this.db.update(quotes).set({ imageUrl, updatedAt }).where(eq(quotes.id, id)).returning()
    );
    return rows[0];
  }

  // Tags
  async scanTags(options: ScanOptions = {}): Promise<ScanPage<TagRow>> {
    const limit = options.limit ?? this.pageSize;
    const after = options.startKey ? decodeScanKey(options.startKey) : undefined;
    const rows = await execWithMetrics("scan", "tags", () =>
      this.db
        .select()
        .from(tags)
        .where(after === undefined ? undefined : gt(tags.tag, after))
        .orderBy(asc(tags.tag))
        .limit(limit + 1)
    );
    return toScanPage(rows, limit, (row) => row.tag);
  }

  async getTag(tag: string): Promise<TagRow | undefined> {
    const rows = await execWithMetrics("get", "tags", () =>
      this.db.select().from(tags).where(eq(tags.tag, tag))
    );
    return rows[0];
  }

  async putTag(row: TagRow): Promise<TagRow> {
    const rows = await execWithMetrics("put", "tags", () =>
      this.db
        .insert(tags)
        .values(row)
        .onConflictDoUpdate({ target: tags.tag, set: { createdAt: row.createdAt } })
        .returning()
    );
    return firstOrThrow(rows, "put tag");
  }

  async deleteTag(tag: string): Promise<boolean> {
    const rows = await execWithMetrics("delete", "tags", () =>
      this.db.delete(tags).where(eq(tags.tag, tag)).returning({ tag: tags.tag })
    );
    return rows.length > 0;
  }

  // Subscriptions
  async scanSubscriptions(options: ScanOptions = {}): Promise<ScanPage<SubscriptionRow>> {
    const limit = options.limit ?? this.pageSize;
    const after = options.startKey ? decodeScanKey(options.startKey) : undefined;
    const rows = await execWithMetrics("scan", "subscriptions", () =>
      this.db
        .select()
        .from(subscriptions)
        .where(after === undefined ? undefined : gt(subscriptions.email, after))
        .orderBy(asc(subscriptions.email))
        .limit(limit + 1)
    );
    return toScanPage(rows, limit, (row) => row.email);
  }

  async getSubscription(email: string): Promise<SubscriptionRow | undefined> {
    const rows = await execWithMetrics("get", "subscriptions", () =>
      this.db.select().from(subscriptions).where(eq(subscriptions.email, email))
    );
    return rows[0];
  }

  async putSubscription(row: SubscriptionRow): Promise<SubscriptionRow> {
    const { email, ...fields } = row;
    const rows = await execWithMetrics(
      "put",
      "subscriptions",
      () =>
        this.db
          .insert(subscriptions)
          .values(row)
          .onConflictDoUpdate({ target: subscriptions.email, set: fields })
          .returning(),
      { email }
    );
    return firstOrThrow(rows, "put subscription");
  }

  async deleteSubscription(email: string): Promise<boolean> {
    const rows = await execWithMetrics("delete", "subscriptions", () =>
      this.db.delete(subscriptions).where(eq(subscriptions.email, email)).returning({ email: subscriptions.email })
    );
    return rows.length > 0;
  }
}
