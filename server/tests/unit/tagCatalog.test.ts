import { describe, it, expect, beforeEach } from 'vitest';
import { TAGS_METADATA_ID } from '@shared/schema';
import { MemStorage } from '../../storage';
import { TagCatalog } from '../../quotes/tagCatalog';
import { NotFoundError, ValidationError } from '../../types/errors';
import { makeQuote } from '../helpers/quoteFixtures';

const CREATED = '2024-01-01T00:00:00.000Z';

describe('TagCatalog', () => {
  let storage: MemStorage;
  let catalog: TagCatalog;

  async function metadataTags(): Promise<string[] | undefined> {
    return (await storage.getQuote(TAGS_METADATA_ID))?.tags;
  }

  beforeEach(async () => {
    storage = new MemStorage({ pageSize: 2 });
    catalog = new TagCatalog(storage);
    for (const tag of ['life', 'wisdom', 'humor']) {
      await storage.putTag({ tag, createdAt: CREATED });
    }
    await storage.putQuote(makeQuote('q1', 'Be yourself', 'Oscar Wilde', { tags: ['wisdom', 'life'] }));
    await storage.putQuote(makeQuote('q2', 'Keep going', 'Mark Twain', { tags: ['life'] }));
    await storage.putQuote(makeQuote('q3', 'Art is a lie', 'Pablo Picasso', { tags: ['art'] }));
  });

  it('lists registered tags with usage counts', async () => {
    expect(await catalog.listTagUsage()).toEqual([
      { name: 'humor', quoteCount: 0 },
      { name: 'life', quoteCount: 2 },
      { name: 'wisdom', quoteCount: 1 },
    ]);
  });

  it('does not count the metadata row as a quote', async () => {
    await catalog.addTag('poetry');
    const usage = await catalog.listTagUsage();
    expect(usage.find((t) => t.name === 'poetry')).toEqual({ name: 'poetry', quoteCount: 0 });
  });

  it('adds a tag to the table and the metadata row', async () => {
    expect(await catalog.addTag('courage')).toEqual(['courage', 'humor', 'life', 'wisdom']);
    expect(await storage.getTag('courage')).toBeDefined();
    expect(await metadataTags()).toEqual(['courage']);
  });

  it('rejects a tag that already exists', async () => {
    await expect(catalog.addTag('life')).rejects.toThrow("Tag 'life' already exists");
    await expect(catalog.addTag('life')).rejects.toBeInstanceOf(ValidationError);
  });

  it('renames a tag everywhere it is used', async () => {
    await storage.putQuote({
      id: TAGS_METADATA_ID,
      quote: null,
      author: null,
      tags: ['humor', 'life', 'wisdom'],
      type: null,
      imageUrl: null,
      createdAt: CREATED,
      updatedAt: CREATED,
      createdBy: null,
      updatedBy: null,
    });

    const result = await catalog.renameTag('life', 'living');

    expect(result).toEqual({
      oldTag: 'life',
      newTag: 'living',
      quotesUpdated: 2,
      allTags: ['humor', 'living', 'wisdom'],
    });
    expect((await storage.getQuote('q1'))?.tags).toEqual(['wisdom', 'living']);
    expect((await storage.getQuote('q2'))?.tags).toEqual(['living']);
    expect((await storage.getQuote('q3'))?.tags).toEqual(['art']);
    expect(await storage.getTag('life')).toBeUndefined();
    expect(await storage.getTag('living')).toEqual({ tag: 'living', createdAt: CREATED });
    expect(await metadataTags()).toEqual(['humor', 'living', 'wisdom']);
  });

  it('merges a renamed tag into one the quote already carries', async () => {
    await storage.putQuote(makeQuote('q4', 'Laugh often', 'Anon', { tags: ['life', 'joy'] }));
    await catalog.renameTag('life', 'joy');
    expect((await storage.getQuote('q4'))?.tags).toEqual(['joy']);
  });

  it('validates renames', async () => {
    await expect(catalog.renameTag('life', 'life')).rejects.toThrow(
      'New tag name must be different from old tag name'
    );
    await expect(catalog.renameTag('missing', 'other')).rejects.toBeInstanceOf(NotFoundError);
    await expect(catalog.renameTag('life', 'wisdom')).rejects.toThrow("Tag 'wisdom' already exists");
  });

  it('deletes a tag and strips it from quotes', async () => {
    expect(await catalog.deleteTag('life')).toEqual({ deletedTag: 'life', quotesUpdated: 2 });
    expect((await storage.getQuote('q1'))?.tags).toEqual(['wisdom']);
    expect((await storage.getQuote('q2'))?.tags).toEqual([]);
    expect(await storage.getTag('life')).toBeUndefined();
  });

  it('refuses to delete an unknown tag', async () => {
    await expect(catalog.deleteTag('missing')).rejects.toThrow("Tag 'missing' not found");
  });

  it('removes registered tags no quote uses', async () => {
    // 'art' is carried by q3 but was never registered
    expect(await catalog.removeUnusedTags()).toEqual({
      removedTags: ['humor'],
      remainingTags: ['life', 'wisdom'],
    });
    expect(await catalog.listTagNames()).toEqual(['life', 'wisdom']);
  });

  it('registers unknown tags carried by a saved quote', async () => {
    await catalog.registerQuoteTags(['life', 'stoicism']);
    expect(await storage.getTag('stoicism')).toBeDefined();
    expect(await metadataTags()).toEqual(['life', 'stoicism']);
  });
});
