import express, { type Express, type Request, type Response } from "express";
import { createServer, type Server } from "http";
import { randomUUID } from "crypto";
import { readFileSync } from "fs";
import { resolve } from "path";
import type { QuoteRow } from "../shared/schema";
import { storage, type IStorage } from "./storage";
import { authenticateFirebase } from "./middleware/authenticateFirebase";
import { requireAdmin } from "./middleware/requireAdmin";
import {
  CustomImageSchema,
  DeliveryRunSchema,
  DuplicateCheckSchema,
  ExportQuerySchema,
  ListQuotesQuerySchema,
  QuoteInputSchema,
  RenameTagBodySchema,
  SearchQuotesQuerySchema,
  SubscriptionInputSchema,
  TagBodySchema,
  validate,
} from "./middleware/validateRequest";
import { config } from "./config";
import { metrics } from "./metrics";
import { withSource } from "./logger";
import { NotFoundError, ValidationError, handleApiError, toError } from "./types/errors";
import { QuoteDuplicateScanner } from "./utils/deduplication";
import { isQuote, listAllQuotes, nowIso } from "./quotes/quoteRecords";
import { matchesSearch, pageQuotes } from "./quotes/quoteQueries";
import { TagCatalog } from "./quotes/tagCatalog";
import { exportQuotes } from "./quotes/exporter";
import { renderErrorPage, renderNotFoundPage, renderQuotePage } from "./pages/quotePage";
import { SubscriptionService } from "./subscriptions/subscriptionService";
import { NuggetDeliveryAgent, defaultNuggetSenders, type NuggetSenders } from "./subscriptions/nuggetDelivery";

export interface RouteOptions {
  /** Senders for daily nugget runs; defaults to log-only senders */
  nuggetSenders?: NuggetSenders;
}

const apiLog = withSource("api");
const previewLog = withSource("preview");

const PREVIEW_CACHE_CONTROL = "public, max-age=3600";

function readVersion(): string | null {
  try {
    const raw = readFileSync(resolve(process.cwd(), "package.json"), "utf-8");
    const pkg: unknown = JSON.parse(raw);
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch (err) {
    apiLog.debug({ err: toError(err) }, "package version unavailable");
  }
  return null;
}

function currentUsername(req: Request): string {
  return req.user?.username ?? "unknown";
}

// Subscriptions are keyed by the account email from the ID token
function accountEmail(req: Request): string {
  const email = req.user?.email;
  if (!email) {
    throw new ValidationError("Account has no email address");
  }
  return email;
}

async function requireQuote(store: IStorage, id: string): Promise<QuoteRow> {
  const row = await store.getQuote(id);
  if (!row || !isQuote(row)) {
    throw new NotFoundError("Quote not found", { quoteId: id });
  }
  return row;
}

function adminRouter(store: IStorage, nuggetSenders: NuggetSenders): express.Router {
  const router = express.Router();
  const scanner = new QuoteDuplicateScanner(store);
  const catalog = new TagCatalog(store);
  const subscriptions = new SubscriptionService(store);
  const nuggets = new NuggetDeliveryAgent(nuggetSenders, store);

  router.use(authenticateFirebase, requireAdmin);

  // Quotes
  router.get("/quotes", async (req, res) => {
    const query = validate(ListQuotesQuerySchema, req.query, req, res);
    if (!query) return;
    try {
      const page = pageQuotes(await listAllQuotes(store), query);
      return res.json(page);
    } catch (err) {
      return handleApiError(apiLog, err, res, "list-quotes");
    }
  });

  router.get("/quotes/:id", async (req, res) => {
    try {
      return res.json(await requireQuote(store, req.params.id));
    } catch (err) {
      return handleApiError(apiLog, err, res, "get-quote", { quoteId: req.params.id });
    }
  });

  router.post("/quotes", async (req, res) => {
    const input = validate(QuoteInputSchema, req.body, req, res);
    if (!input) return;
    try {
      const report = await scanner.checkBeforeCreate(input.quote, input.author);
      if (report.isDuplicate) {
        apiLog.info({ duplicateCount: report.duplicateCount }, "quote creation blocked by duplicates");
        return res.status(409).json({ error: "Duplicate quote detected", ...report });
      }

      const now = nowIso();
      const username = currentUsername(req);
      const created = await store.putQuote({
        id: randomUUID(),
        quote: input.quote,
        author: input.author,
        tags: input.tags,
        type: null,
        imageUrl: null,
        createdAt: now,
        updatedAt: now,
        createdBy: username,
        updatedBy: username,
      });
      await catalog.registerQuoteTags(input.tags);

      apiLog.info({ quoteId: created.id, username }, "quote created");
      return res.status(201).json(created);
    } catch (err) {
      return handleApiError(apiLog, err, res, "create-quote");
    }
  });

  router.put("/quotes/:id", async (req, res) => {
    const input = validate(QuoteInputSchema, req.body, req, res);
    if (!input) return;
    const quoteId = req.params.id;
    try {
      const existing = await requireQuote(store, quoteId);
      const updated = await store.putQuote({
        ...existing,
        quote: input.quote,
        author: input.author,
        tags: input.tags,
        updatedAt: nowIso(),
        updatedBy: currentUsername(req),
      });
      await catalog.registerQuoteTags(input.tags);

      apiLog.info({ quoteId }, "quote updated");
      return res.json(updated);
    } catch (err) {
      return handleApiError(apiLog, err, res, "update-quote", { quoteId });
    }
  });

  router.delete("/quotes/:id", async (req, res) => {
    const quoteId = req.params.id;
    try {
      await requireQuote(store, quoteId);
      await store.deleteQuote(quoteId);
      apiLog.info({ quoteId }, "quote deleted");
      return res.json({ message: "Quote deleted successfully", deletedQuoteId: quoteId });
    } catch (err) {
      return handleApiError(apiLog, err, res, "delete-quote", { quoteId });
    }
  });

  router.get("/search", async (req, res) => {
    const query = validate(SearchQuotesQuerySchema, req.query, req, res);
    if (!query) return;
    try {
      const matches = (await listAllQuotes(store)).filter((quote) => matchesSearch(quote, query.q));
      return res.json({ query: query.q, ...pageQuotes(matches, query) });
    } catch (err) {
      return handleApiError(apiLog, err, res, "search-quotes");
    }
  });

  // Tags
  router.get("/tags", async (_req, res) => {
    try {
      const tags = await catalog.listTagUsage();
      return res.json({ tags, count: tags.length });
    } catch (err) {
      return handleApiError(apiLog, err, res, "list-tags");
    }
  });

  router.post("/tags", async (req, res) => {
    const input = validate(TagBodySchema, req.body, req, res);
    if (!input) return;
    try {
      const allTags = await catalog.addTag(input.tag);
      return res.status(201).json({ message: `Tag '${input.tag}' added`, tag: input.tag, allTags });
    } catch (err) {
      return handleApiError(apiLog, err, res, "add-tag", { tag: input.tag });
    }
  });

  // Registered before /tags/:tag so "unused" is not taken for a tag name
  router.delete("/tags/unused", async (_req, res) => {
    try {
      const result = await catalog.removeUnusedTags();
      return res.json({ message: `Removed ${result.removedTags.length} unused tag(s)`, ...result });
    } catch (err) {
      return handleApiError(apiLog, err, res, "remove-unused-tags");
    }
  });

  router.put("/tags/:tag", async (req, res) => {
    const input = validate(RenameTagBodySchema, req.body, req, res);
    if (!input) return;
    const tag = req.params.tag;
    try {
      const result = await catalog.renameTag(tag, input.newTag);
      return res.json({ message: `Tag '${tag}' renamed to '${input.newTag}'`, ...result });
    } catch (err) {
      return handleApiError(apiLog, err, res, "rename-tag", { tag });
    }
  });

  router.delete("/tags/:tag", async (req, res) => {
    const tag = req.params.tag;
    try {
      const result = await catalog.deleteTag(tag);
      return res.json({ message: `Tag '${tag}' deleted`, ...result });
    } catch (err) {
      return handleApiError(apiLog, err, res, "delete-tag", { tag });
    }
  });

  // Duplicate check: reports only, never blocks
  router.post("/check-duplicate", async (req, res) => {
    const input = validate(DuplicateCheckSchema, req.body, req, res);
    if (!input) return;
    try {
      return res.json(await scanner.check(input.quote, input.author));
    } catch (err) {
      apiLog.error({ err: toError(err) }, "duplicate check failed");
      return res.status(500).json({ error: "Failed to check for duplicates" });
    }
  });

  router.post("/save-custom-image", async (req, res) => {
    const input = validate(CustomImageSchema, req.body, req, res);
    if (!input) return;
    try {
      await requireQuote(store, input.quoteId);
      const updated = await store.setQuoteImage(input.quoteId, input.imageUrl, nowIso());
      if (!updated) {
        throw new NotFoundError("Quote not found", { quoteId: input.quoteId });
      }
      return res.json({ message: "Custom image saved", quoteId: updated.id, imageUrl: updated.imageUrl });
    } catch (err) {
      return handleApiError(apiLog, err, res, "save-custom-image", { quoteId: input.quoteId });
    }
  });

  router.get("/export", async (req, res) => {
    const query = validate(ExportQuerySchema, req.query, req, res);
    if (!query) return;
    try {
      const result = await exportQuotes(store, query.format, currentUsername(req));
      res.setHeader("Content-Type", result.contentType);
      res.setHeader("Content-Disposition", `attachment; filename="${result.filename}"`);
      res.setHeader("X-Export-Count", String(result.count));
      res.setHeader("X-Export-Unique-Authors", String(result.statistics.uniqueAuthors));
      res.setHeader("X-Export-Unique-Tags", String(result.statistics.uniqueTags));
      return res.send(result.body);
    } catch (err) {
      return handleApiError(apiLog, err, res, "export-quotes", { format: query.format });
    }
  });

  // Daily nugget subscribers
  router.get("/subscriptions", async (_req, res) => {
    try {
      return res.json(await subscriptions.listAll());
    } catch (err) {
      return handleApiError(apiLog, err, res, "list-subscriptions");
    }
  });

  // One delivery run for a UTC hour, as the hourly trigger would start it
  router.post("/subscriptions/deliver", async (req, res) => {
    const input = validate(DeliveryRunSchema, req.body, req, res);
    if (!input) return;
    const hourUtc = input.hourUtc ?? new Date().getUTCHours();
    try {
      const result = await nuggets.runOnce(hourUtc);
      return res.json({ message: `Daily delivery complete for UTC hour ${hourUtc}`, ...result });
    } catch (err) {
      return handleApiError(apiLog, err, res, "deliver-nuggets", { hourUtc });
    }
  });

  router.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  return router;
}

function subscriptionRouter(store: IStorage): express.Router {
  const router = express.Router();
  const subscriptions = new SubscriptionService(store);

  router.use(authenticateFirebase);

  router.get("/", async (req, res) => {
    try {
      return res.json(await subscriptions.get(accountEmail(req)));
    } catch (err) {
      return handleApiError(apiLog, err, res, "get-subscription");
    }
  });

  router.put("/", async (req, res) => {
    const input = validate(SubscriptionInputSchema, req.body, req, res);
    if (!input) return;
    try {
      const subscription = await subscriptions.save(accountEmail(req), input);
      return res.json({ message: "Subscription updated successfully", subscription });
    } catch (err) {
      return handleApiError(apiLog, err, res, "update-subscription");
    }
  });

  router.delete("/", async (req, res) => {
    try {
      await subscriptions.remove(accountEmail(req));
      return res.json({ message: "Subscription deleted successfully" });
    } catch (err) {
      return handleApiError(apiLog, err, res, "delete-subscription");
    }
  });

  router.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  return router;
}

export function registerRoutes(app: Express, store: IStorage = storage, options: RouteOptions = {}): Server {
  // Dev-only Prometheus metrics endpoint
  app.get("/metrics", async (_req, res) => {
    if (!config.isDev) {
      return res.status(404).json({ error: "Not found" });
    }
    try {
      const content = await metrics.getMetricsContent();
      res.setHeader("Content-Type", metrics.register.contentType);
      return res.send(content);
    } catch (err) {
      apiLog.error({ err: toError(err) }, "metrics collection failed");
      return res.status(500).json({ error: "Metrics error" });
    }
  });

  // Health check endpoint
  app.get("/api/healthz", async (_req, res) => {
    const start = performance.now();
    let storageOk = true;
    let storageMessage: string | null = null;
    try {
      await store.scanQuotes({ limit: 1 });
    } catch (err) {
      storageOk = false;
      storageMessage = toError(err).message;
      apiLog.warn({ err: toError(err) }, "healthz storage check failed");
    }

    return res.status(200).json({
      status: storageOk ? "ok" : "down",
      version: readVersion(),
      duration_ms: Math.round(performance.now() - start),
      checks: {
        storage: { ok: storageOk, kind: store.constructor.name, message: storageMessage },
      },
    });
  });

  app.use("/api/admin", adminRouter(store, options.nuggetSenders ?? defaultNuggetSenders()));
  app.use("/api/subscriptions", subscriptionRouter(store));

  // Share page for social crawlers
  app.get("/quote/:id", async (req, res) => {
    const quoteId = req.params.id;
    try {
      const row = await store.getQuote(quoteId);
      res.type("html").setHeader("Cache-Control", PREVIEW_CACHE_CONTROL);
      if (!row || !isQuote(row)) {
        previewLog.info({ quoteId }, "preview requested for missing quote");
        return res.status(404).send(renderNotFoundPage(config.site));
      }
      return res.status(200).send(renderQuotePage(row, config.site));
    } catch (err) {
      previewLog.error({ err: toError(err), quoteId }, "preview page failed");
      res.removeHeader("Cache-Control");
      return res.status(500).type("html").send(renderErrorPage(config.site));
    }
  });

  const httpServer = createServer(app);

  return httpServer;
}
