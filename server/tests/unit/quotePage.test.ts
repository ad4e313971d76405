import { describe, it, expect } from 'vitest';
import type { Quote } from '@shared/schema';
import { isQuote } from '../../quotes/quoteRecords';
import { buildDescription, escapeHtml, renderNotFoundPage, renderQuotePage } from '../../pages/quotePage';
import { makeQuote } from '../helpers/quoteFixtures';

const SITE = {
  name: 'Quote Desk',
  url: 'https://quotes.example.test',
  previewImageUrl: 'https://quotes.example.test/images/preview.png',
};

function asQuote(row = makeQuote('q1', 'Be yourself', 'Oscar Wilde', { tags: ['self', 'wisdom'] })): Quote {
  if (!isQuote(row)) throw new Error('fixture is not a quote');
  return row;
}

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#x27;&amp;&#x27;&lt;/a&gt;');
  });
});

describe('buildDescription', () => {
  it('keeps short quotes whole', () => {
    expect(buildDescription('Be yourself', 'Oscar Wilde')).toBe('"Be yourself" - Oscar Wilde');
  });

  it('cuts long quotes at 100 characters', () => {
    expect(buildDescription('a'.repeat(120), 'Anon')).toBe(`"${'a'.repeat(100)}..." - Anon`);
    expect(buildDescription('b'.repeat(100), 'Anon')).toBe(`"${'b'.repeat(100)}" - Anon`);
  });
});

describe('renderQuotePage', () => {
  it('renders Open Graph and Twitter tags', () => {
    const html = renderQuotePage(asQuote(), SITE);
    expect(html).toContain('<meta property="og:title" content="Quote by Oscar Wilde">');
    expect(html).toContain('<meta property="og:url" content="https://quotes.example.test/quote/q1">');
    expect(html).toContain('<meta property="og:description" content="&quot;Be yourself&quot; - Oscar Wilde">');
    expect(html).toContain('<meta name="twitter:card" content="summary_large_image">');
    expect(html).toContain('<meta property="article:tag" content="self">');
    expect(html).toContain('<meta property="article:tag" content="wisdom">');
    expect(html).toContain('<meta http-equiv="refresh" content="5;url=https://quotes.example.test">');
  });

  it('escapes quote text and author', () => {
    const html = renderQuotePage(asQuote(makeQuote('q2', '<script>alert(1)</script>', 'Eve & "Mallory"')), SITE);
    expect(html).toContain('<div class="quote">"&lt;script&gt;alert(1)&lt;/script&gt;"</div>');
    expect(html).toContain('<title>Eve &amp; &quot;Mallory&quot; - Quote Desk</title>');
    expect(html).not.toContain('<script>');
  });
});

describe('renderNotFoundPage', () => {
  it('renders the fallback page for the site', () => {
    const html = renderNotFoundPage(SITE);
    expect(html).toContain('<h1>Quote Not Found</h1>');
    expect(html).toContain('<meta property="og:url" content="https://quotes.example.test">');
  });
});
