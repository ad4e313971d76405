import type { QuoteRow, SubscriptionRow, TagRow } from "../shared/schema";
import { PgStorage } from "./pgStorage";
import { config } from "./config";
import { db } from "./db";
import type { ScanOptions, ScanPage } from "./utils/pagination/drainPages";
import { decodeScanKey, toScanPage } from "./utils/pagination/scanKey";

export interface IStorage {
  // Quotes table: quotes plus the metadata and job rows stored beside them
  scanQuotes(options?: ScanOptions): Promise<ScanPage<QuoteRow>>;
  getQuote(id: string): Promise<QuoteRow | undefined>;
  /** Insert or fully replace the row with the same id */
  putQuote(row: QuoteRow): Promise<QuoteRow>;
  deleteQuote(id: string): Promise<boolean>;
  setQuoteImage(id: string, imageUrl: string, updatedAt: string): Promise<QuoteRow | undefined>;

  // Tags
  scanTags(options?: ScanOptions): Promise<ScanPage<TagRow>>;
  getTag(tag: string): Promise<TagRow | undefined>;
  putTag(row: TagRow): Promise<TagRow>;
  deleteTag(tag: string): Promise<boolean>;

  // Daily nugget subscriptions, keyed by email
  scanSubscriptions(options?: ScanOptions): Promise<ScanPage<SubscriptionRow>>;
  getSubscription(email: string): Promise<SubscriptionRow | undefined>;
  /** Insert or fully replace the subscription for the same email */
  putSubscription(row: SubscriptionRow): Promise<SubscriptionRow>;
  deleteSubscription(email: string): Promise<boolean>;
}

export interface MemStorageOptions {
  /** Rows per scan page when the caller gives no limit */
  pageSize?: number;
}

function copyQuote(row: QuoteRow): QuoteRow {
  return { ...row, tags: [...row.tags] };
}

function copySubscription(row: SubscriptionRow): SubscriptionRow {
  return { ...row, notificationPreferences: { ...row.notificationPreferences } };
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export class MemStorage implements IStorage {
  private quotes: Map<string, QuoteRow>;
  private tags: Map<string, TagRow>;
  private subscriptions: Map<string, SubscriptionRow>;
  private readonly pageSize: number;

  constructor(options: MemStorageOptions = {}) {
    this.quotes = new Map();
    this.tags = new Map();
    this.subscriptions = new Map();
    this.pageSize = options.pageSize ?? config.scanPageSize;
  }

  private scan<T>(rows: Map<string, T>, options: ScanOptions, copy: (row: T) => T): ScanPage<T> {
    const limit = options.limit ?? this.pageSize;
    const after = options.startKey ? decodeScanKey(options.startKey) : undefined;
    const keys = Array.from(rows.keys())
      .filter((key) => after === undefined || key > after)
      .sort(compareKeys)
      .slice(0, limit + 1);
    const page: Array<[string, T]> = [];
    for (const key of keys) {
      const row = rows.get(key);
      if (row) page.push([key, copy(row)]);
    }
    const scanned = toScanPage(page, limit, ([key]) => key);
    return {
      items: scanned.items.map(([, row]) => row),
      lastEvaluatedKey: scanned.lastEvaluatedKey,
    };
  }

  // Quotes
  async scanQuotes(options: ScanOptions = {}): Promise<ScanPage<QuoteRow>> {
    return this.scan(this.quotes, options, copyQuote);
  }

  async getQuote(id: string): Promise<QuoteRow | undefined> {
    const row = this.quotes.get(id);
    return row ? copyQuote(row) : undefined;
  }

  async putQuote(row: QuoteRow): Promise<QuoteRow> {
    this.quotes.set(row.id, copyQuote(row));
    return copyQuote(row);
  }

  async deleteQuote(id: string): Promise<boolean> {
    return this.quotes.delete(id);
  }

  async setQuoteImage(id: string, imageUrl: string, updatedAt: string): Promise<QuoteRow | undefined> {
    const existing = this.quotes.get(id);
    if (!existing) return undefined;
    const updated: QuoteRow = { ...existing, imageUrl, updatedAt };
    this.quotes.set(id, updated);
    return copyQuote(updated);
  }

  // Tags
  async scanTags(options: ScanOptions = {}): Promise<ScanPage<TagRow>> {
    return this.scan(this.tags, options, (row) => ({ ...row }));
  }

  async getTag(tag: string): Promise<TagRow | undefined> {
    const row = this.tags.get(tag);
    return row ? { ...row } : undefined;
  }

  async putTag(row: TagRow): Promise<TagRow> {
    this.tags.set(row.tag, { ...row });
    return { ...row };
  }

  async deleteTag(tag: string): Promise<boolean> {
    return this.tags.delete(tag);
  }

  // Subscriptions
  async scanSubscriptions(options: ScanOptions = {}): Promise<ScanPage<SubscriptionRow>> {
    return this.scan(this.subscriptions, options, copySubscription);
  }

  async getSubscription(email: string): Promise<SubscriptionRow | undefined> {
    const row = this.subscriptions.get(email);
    return row ? copySubscription(row) : undefined;
  }

  async putSubscription(row: SubscriptionRow): Promise<SubscriptionRow> {
    this.subscriptions.set(row.email, copySubscription(row));
    return copySubscription(row);
  }

  async deleteSubscription(email: string): Promise<boolean> {
    return this.subscriptions.delete(email);
  }
}

export const storage: IStorage =
  !config.useMemStorage && config.databaseUrl && db ? new PgStorage(db) : new MemStorage();
