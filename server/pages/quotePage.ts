/**
 * Share pages for a single quote.
 *
 * Social crawlers read the Open Graph and Twitter Card tags; people opening
 * the link see the quote and are sent on to the app after a short delay.
 */

import type { Quote } from "../../shared/schema";

export interface SiteInfo {
  name: string;
  url: string;
  previewImageUrl: string;
}

const DESCRIPTION_QUOTE_CHARS = 100;
const REDIRECT_DELAY_SECONDS = 5;

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

const PAGE_STYLE = `
        body {
            font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
            background: linear-gradient(135deg, #667eea 0%, #764ba2 100%);
            color: white;
            display: flex;
            justify-content: center;
            align-items: center;
            min-height: 100vh;
            margin: 0;
            padding: 20px;
        }
        .container {
            max-width: 800px;
            text-align: center;
            background: rgba(255, 255, 255, 0.1);
            padding: 40px;
            border-radius: 20px;
        }
        .quote { font-size: 1.5em; font-style: italic; margin-bottom: 20px; line-height: 1.6; }
        .author { font-size: 1.2em; font-weight: bold; margin-bottom: 30px; }
        .tags, .redirect { font-size: 0.9em; opacity: 0.85; margin-bottom: 30px; }
        a { color: white; text-decoration: underline; }`;

/**
 * Meta description: the quote (cut at 100 characters with "...") and its author.
 * Inputs are raw text; the result is raw text too.
 */
export function buildDescription(quote: string, author: string): string {
  const chars = Array.from(quote);
  if (chars.length <= DESCRIPTION_QUOTE_CHARS) {
    return `"${quote}" - ${author}`;
  }
  return `"${chars.slice(0, DESCRIPTION_QUOTE_CHARS).join("")}..." - ${author}`;
}

export function renderQuotePage(quote: Quote, site: SiteInfo): string {
  const text = escapeHtml(quote.quote);
  const author = escapeHtml(quote.author || "Unknown");
  const siteName = escapeHtml(site.name);
  const siteUrl = escapeHtml(site.url);
  const pageUrl = `${siteUrl}/quote/${encodeURIComponent(quote.id)}`;
  const image = escapeHtml(site.previewImageUrl);
  const description = escapeHtml(buildDescription(quote.quote, quote.author || "Unknown"));
  const tagMeta = quote.tags
    .map((tag) => `<meta property="article:tag" content="${escapeHtml(tag)}">`)
    .join("\n    ");
  const tagLine = quote.tags.length
    ? `<div class="tags">Tags: ${escapeHtml(quote.tags.join(", "))}</div>`
    : "";

  return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${author} - ${siteName}</title>
    <meta name="title" content="${author} - ${siteName}">
    <meta name="description" content="${description}">

    <meta property="og:type" content="article">
    <meta property="og:url" content="${pageUrl}">
    <meta property="og:title" content="Quote by ${author}">
    <meta property="og:description" content="${description}">
    <meta property="og:image" content="${image}">
    <meta property="og:image:width" content="1200">
    <meta property="og:image:height" content="630">
    <meta property="og:site_name" content="${siteName}">
    <meta property="og:locale" content="en_US">

    <meta name="twitter:card" content="summary_large_image">
    <meta name="twitter:url" content="${pageUrl}">
    <meta name="twitter:title" content="Quote by ${author}">
    <meta name="twitter:description" content="${description}">
    <meta name="twitter:image" content="${image}">

    <meta property="article:author" content="${author}">
    ${tagMeta}

    <meta http-equiv="refresh" content="${REDIRECT_DELAY_SECONDS};url=${siteUrl}">
    <style>${PAGE_STYLE}
    </style>
</head>
<body>
    <div class="container">
        <div class="quote">"${text}"</div>
        <div class="author">— ${author}</div>
        ${tagLine}
        <div class="redirect">
            Redirecting to ${siteName}...
            <a href="${siteUrl}">Click here if not redirected</a>
        </div>
    </div>
</body>
</html>`;
}

export function renderNotFoundPage(site: SiteInfo): string {
  const siteName = escapeHtml(site.name);
  const siteUrl = escapeHtml(site.url);
  const image = escapeHtml(site.previewImageUrl);
  const description = "Discover and share inspiring, witty, and wise quotes.";

  return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${siteName} - Share Inspiring Quotes</title>
    <meta name="description" content="${description}">
    <meta property="og:type" content="website">
    <meta property="og:url" content="${siteUrl}">
    <meta property="og:title" content="${siteName} - Share Inspiring Quotes">
    <meta property="og:description" content="${description}">
    <meta property="og:image" content="${image}">
    <meta name="twitter:card" content="summary_large_image">
    <meta name="twitter:title" content="${siteName} - Share Inspiring Quotes">
    <meta name="twitter:image" content="${image}">
    <meta http-equiv="refresh" content="${REDIRECT_DELAY_SECONDS};url=${siteUrl}">
    <style>${PAGE_STYLE}
    </style>
</head>
<body>
    <div class="container">
        <h1>Quote Not Found</h1>
        <p>The quote you're looking for doesn't exist or has been removed.</p>
        <p>Redirecting to ${siteName}... <a href="${siteUrl}">Click here if not redirected</a></p>
    </div>
</body>
</html>`;
}

export function renderErrorPage(site: SiteInfo): string {
  const siteName = escapeHtml(site.name);
  return `<!DOCTYPE html>
<html>
<head>
    <meta charset="UTF-8">
    <title>Error - ${siteName}</title>
</head>
<body>
    <h1>Error</h1>
    <p>An error occurred while loading this quote.</p>
    <p><a href="${escapeHtml(site.url)}">Go to ${siteName}</a></p>
</body>
</html>`;
}
