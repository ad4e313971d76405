/**
 * Tag catalog
 *
 * Tags live in the tags table. A sorted copy of the tag list is also kept in
 * the TAGS_METADATA row of the quotes table for clients that read it directly;
 * failures while refreshing that copy are logged and never fail the request.
 */

import { TAGS_METADATA_ID, type QuoteRow, type TagUsage } from "../../shared/schema";
import type { IStorage } from "../storage";
import { withSource } from "../logger";
import { NotFoundError, ValidationError, toError } from "../types/errors";
import { drainPages } from "../utils/pagination/drainPages";
import { nowIso, scanQuotes } from "./quoteRecords";

const log = withSource("tags");

export interface TagRenameResult {
  oldTag: string;
  newTag: string;
  quotesUpdated: number;
  allTags: string[];
}

export interface TagDeleteResult {
  deletedTag: string;
  quotesUpdated: number;
}

export interface TagCleanupResult {
  removedTags: string[];
  remainingTags: string[];
}

function sortedUnique(values: Iterable<string>): string[] {
  return Array.from(new Set(values)).sort();
}

export class TagCatalog {
  constructor(private readonly storage: IStorage) {}

  async listTagNames(): Promise<string[]> {
    const names: string[] = [];
    for await (const row of drainPages((startKey) => this.storage.scanTags({ startKey }))) {
      if (row.tag) names.push(row.tag);
    }
    return sortedUnique(names);
  }

  /** Every registered tag with the number of quotes using it, by name. */
  async listTagUsage(): Promise<TagUsage[]> {
    const names = await this.listTagNames();
    const counts = new Map<string, number>(names.map((name) => [name, 0]));

    for await (const quote of scanQuotes(this.storage)) {
      for (const tag of quote.tags) {
        const current = counts.get(tag);
        if (current !== undefined) counts.set(tag, current + 1);
      }
    }

    log.debug({ tags: names.length }, "counted tag usage");
    return names.map((name) => ({ name, quoteCount: counts.get(name) ?? 0 }));
  }

  /** Tags referenced by at least one quote. */
  async listUsedTags(): Promise<string[]> {
    const used = new Set<string>();
    for await (const quote of scanQuotes(this.storage)) {
      for (const tag of quote.tags) used.add(tag);
    }
    return sortedUnique(used);
  }

  /**
   * Register tags carried by a saved quote. Unknown tags are added to the
   * tags table and the metadata row; failures are logged only.
   */
  async registerQuoteTags(tags: string[]): Promise<void> {
    if (tags.length === 0) return;
    try {
      const createdAt = nowIso();
      for (const tag of sortedUnique(tags)) {
        const existing = await this.storage.getTag(tag);
        if (!existing) await this.storage.putTag({ tag, createdAt });
      }
      await this.updateMetadata((current) => [...current, ...tags]);
    } catch (error) {
      log.error({ err: toError(error), tags }, "failed to register quote tags");
    }
  }

  async addTag(tag: string): Promise<string[]> {
    const existing = await this.storage.getTag(tag);
    if (existing) {
      throw new ValidationError(`Tag '${tag}' already exists`, { tag });
    }
    await this.storage.putTag({ tag, createdAt: nowIso() });
    await this.updateMetadata((current) => [...current, tag]);
    log.info({ tag }, "added tag");
    return this.listTagNames();
  }

  async renameTag(oldTag: string, newTag: string): Promise<TagRenameResult> {
    if (oldTag === newTag) {
      throw new ValidationError("New tag name must be different from old tag name", { tag: oldTag });
    }
    const existing = await this.storage.getTag(oldTag);
    if (!existing) {
      throw new NotFoundError(`Tag '${oldTag}' not found`, { tag: oldTag });
    }
    if (await this.storage.getTag(newTag)) {
      throw new ValidationError(`Tag '${newTag}' already exists`, { tag: newTag });
    }

    await this.storage.putTag({ tag: newTag, createdAt: existing.createdAt });
    await this.storage.deleteTag(oldTag);

    const quotesUpdated = await this.rewriteQuoteTags(oldTag, (tags) =>
      dedupeTags(tags.map((tag) => (tag === oldTag ? newTag : tag)))
    );
    await this.updateMetadata((current) => current.filter((tag) => tag !== oldTag).concat(newTag));

    log.info({ oldTag, newTag, quotesUpdated }, "renamed tag");
    return { oldTag, newTag, quotesUpdated, allTags: await this.listTagNames() };
  }

  async deleteTag(tag: string): Promise<TagDeleteResult> {
    const existing = await this.storage.getTag(tag);
    if (!existing) {
      throw new NotFoundError(`Tag '${tag}' not found`, { tag });
    }

    const quotesUpdated = await this.rewriteQuoteTags(tag, (tags) => tags.filter((t) => t !== tag));
    await this.storage.deleteTag(tag);
    await this.updateMetadata((current) => current.filter((t) => t !== tag));

    log.info({ tag, quotesUpdated }, "deleted tag");
    return { deletedTag: tag, quotesUpdated };
  }

  /** Remove registered tags that no quote uses. */
  async removeUnusedTags(): Promise<TagCleanupResult> {
    const registered = await this.listTagNames();
    const used = new Set(await this.listUsedTags());
    const unused = registered.filter((tag) => !used.has(tag));

    const removed: string[] = [];
    for (const tag of unused) {
      try {
        await this.storage.deleteTag(tag);
        removed.push(tag);
      } catch (error) {
        log.error({ err: toError(error), tag }, "failed to delete unused tag");
      }
    }
    if (removed.length > 0) {
      await this.updateMetadata((current) => current.filter((tag) => !removed.includes(tag)));
    }

    const remaining = registered.filter((tag) => !removed.includes(tag));
    log.info({ removed: removed.length, remaining: remaining.length }, "removed unused tags");
    return { removedTags: removed, remainingTags: remaining };
  }

  private async rewriteQuoteTags(tag: string, rewrite: (tags: string[]) => string[]): Promise<number> {
    const updatedAt = nowIso();
    let updated = 0;
    // Keyset pages are ordered by id, so rewriting tags mid-scan does not move rows
    for await (const quote of scanQuotes(this.storage)) {
      if (!quote.tags.includes(tag)) continue;
      await this.storage.putQuote({ ...quote, tags: rewrite(quote.tags), updatedAt });
      updated++;
    }
    return updated;
  }

  private async updateMetadata(change: (current: string[]) => string[]): Promise<void> {
    try {
      const existing = await this.storage.getQuote(TAGS_METADATA_ID);
      const current = existing?.tags ?? [];
      const row: QuoteRow = {
        id: TAGS_METADATA_ID,
        quote: null,
        author: null,
        tags: sortedUnique(change(current)),
        type: null,
        imageUrl: null,
        createdAt: existing?.createdAt ?? null,
        updatedAt: nowIso(),
        createdBy: null,
        updatedBy: null,
      };
      await this.storage.putQuote(row);
    } catch (error) {
      log.error({ err: toError(error) }, "failed to update tags metadata");
    }
  }
}

// A quote carries a tag once only
function dedupeTags(tags: string[]): string[] {
  return Array.from(new Set(tags));
}
