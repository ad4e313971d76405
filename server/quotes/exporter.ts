import { gzipSync } from "zlib";
import type { ExportFormat, Quote } from "../../shared/schema";
import type { IStorage } from "../storage";
import { withSource } from "../logger";
import { listAllQuotes, nowIso } from "./quoteRecords";
import { sortQuotes } from "./quoteQueries";

const log = withSource("export");

const CSV_COLUMNS = ["id", "quote", "author", "tags", "created_at", "created_by"] as const;

/** Only quotes are exported today; kept in the document for readers of older exports. */
export const EXPORT_TYPE = "quotes";

export interface ExportStatistics {
  totalQuotes: number;
  uniqueAuthors: number;
  uniqueTags: number;
  authors: string[];
  tags: string[];
}

export interface QuoteExport {
  filename: string;
  contentType: string;
  body: Buffer;
  count: number;
  statistics: ExportStatistics;
  size: { original: number; compressed: number };
}

export interface ExportDocument {
  exportedAt: string;
  exportedBy: string;
  format: ExportFormat;
  type: typeof EXPORT_TYPE;
  count: number;
  statistics: ExportStatistics;
  quotes: Quote[];
}

export function buildExportStatistics(quotes: Quote[]): ExportStatistics {
  const authors = new Set<string>();
  const tags = new Set<string>();
  for (const quote of quotes) {
    authors.add(quote.author);
    for (const tag of quote.tags) tags.add(tag);
  }
  return {
    totalQuotes: quotes.length,
    uniqueAuthors: authors.size,
    uniqueTags: tags.size,
    authors: Array.from(authors).sort(),
    tags: Array.from(tags).sort(),
  };
}

function escapeCsvValue(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function quotesToCsv(quotes: Quote[]): string {
  const lines = [CSV_COLUMNS.join(",")];
  for (const quote of quotes) {
    const row = [
      quote.id,
      quote.quote,
      quote.author,
      quote.tags.join(", "),
      quote.createdAt ?? "",
      quote.createdBy ?? "",
    ];
    lines.push(row.map(escapeCsvValue).join(","));
  }
  return lines.join("\r\n") + "\r\n";
}

function timestampForFilename(iso: string): string {
  // 2024-05-01T12:30:45.123Z -> 20240501_123045
  return iso.replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
}

/**
 * Gzip export of every quote, newest first, as pretty JSON or CSV.
 */
export async function exportQuotes(
  storage: IStorage,
  format: ExportFormat,
  exportedBy: string
): Promise<QuoteExport> {
  const quotes = sortQuotes(await listAllQuotes(storage), "createdAt", "desc");
  const statistics = buildExportStatistics(quotes);
  const exportedAt = nowIso();

  const exportDoc: ExportDocument = {
    exportedAt,
    exportedBy,
    format,
    type: EXPORT_TYPE,
    count: quotes.length,
    statistics,
    quotes,
  };
  const content = format === "json" ? JSON.stringify(exportDoc, null, 2) : quotesToCsv(quotes);

  const original = Buffer.from(content, "utf8");
  const body = gzipSync(original);

  log.info(
    { format, count: quotes.length, originalBytes: original.length, compressedBytes: body.length },
    "quotes exported"
  );

  return {
    filename: `quotes_${timestampForFilename(exportedAt)}.${format}.gz`,
    contentType: "application/gzip",
    body,
    count: quotes.length,
    statistics,
    size: { original: original.length, compressed: body.length },
  };
}
