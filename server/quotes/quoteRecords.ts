import {
  IMAGE_GENERATION_JOB_TYPE,
  METADATA_ID_PREFIX,
  type Quote,
  type QuoteRow,
} from "../../shared/schema";
import type { IStorage } from "../storage";
import { drainPages } from "../utils/pagination/drainPages";

/** Tag metadata and job rows share the quotes table but are not quotes. */
export function isMetadataRow(row: Pick<QuoteRow, "id" | "type">): boolean {
  return row.id.startsWith(METADATA_ID_PREFIX) || row.type === IMAGE_GENERATION_JOB_TYPE;
}

export function isQuote(row: QuoteRow): row is Quote {
  return !isMetadataRow(row) && Boolean(row.quote) && Boolean(row.author);
}

/** Every row of the quotes table, metadata rows included, across all pages. */
export function scanQuoteTable(storage: IStorage): AsyncGenerator<QuoteRow, void, undefined> {
  return drainPages((startKey) => storage.scanQuotes({ startKey }));
}

/** Every real quote, metadata and incomplete rows skipped. */
export async function* scanQuotes(storage: IStorage): AsyncGenerator<Quote, void, undefined> {
  for await (const row of scanQuoteTable(storage)) {
    if (isQuote(row)) yield row;
  }
}

export async function listAllQuotes(storage: IStorage): Promise<Quote[]> {
  const all: Quote[] = [];
  for await (const quote of scanQuotes(storage)) {
    all.push(quote);
  }
  return all;
}

export function nowIso(): string {
  return new Date().toISOString();
}
