import { sql } from "drizzle-orm";
import { pgTable, text, varchar, index, boolean, jsonb } from "drizzle-orm/pg-core";

/** Row id of the tag metadata record that shares the quotes table. */
export const TAGS_METADATA_ID = "TAGS_METADATA";

/** Prefix reserved for metadata rows in the quotes table. */
export const METADATA_ID_PREFIX = "TAGS_";

/** `type` value carried by image generation job rows in the quotes table. */
export const IMAGE_GENERATION_JOB_TYPE = "image_generation_job";

// Quotes, plus the non-quote rows (tag metadata, image jobs) stored alongside them.
// quote/author are nullable because those rows have neither.
export const quotes = pgTable(
  "quotes",
  {
    id: varchar("id").primaryKey(),
    quote: text("quote"),
    author: text("author"),
    tags: text("tags").array().notNull().default(sql`'{}'::text[]`),
    type: varchar("type", { length: 50 }),
    imageUrl: text("image_url"),
    createdAt: text("created_at"),
    updatedAt: text("updated_at"),
    createdBy: text("created_by"),
    updatedBy: text("updated_by"),
  },
  (table) => ({
    typeIdx: index("quotes_type_idx").on(table.type),
  }),
);

export type QuoteRow = typeof quotes.$inferSelect;

export const tags = pgTable("tags", {
  tag: varchar("tag").primaryKey(),
  createdAt: text("created_at").notNull(),
});

export type TagRow = typeof tags.$inferSelect;

export const DELIVERY_METHODS = ["email", "push"] as const;
export type DeliveryMethod = (typeof DELIVERY_METHODS)[number];

export const DEFAULT_DELIVERY_HOUR = 8;
export const DEFAULT_TIMEZONE = "America/New_York";

// deliveryHour is the subscriber's local hour; other keys are kept as sent
export interface NotificationPreferences {
  deliveryHour: number;
  [key: string]: unknown;
}

// Daily nugget subscriptions, one per account email
export const subscriptions = pgTable(
  "subscriptions",
  {
    email: varchar("email").primaryKey(),
    isSubscribed: boolean("is_subscribed").notNull().default(false),
    deliveryMethod: varchar("delivery_method", { length: 20, enum: DELIVERY_METHODS }).notNull().default("email"),
    timezone: text("timezone").notNull().default(DEFAULT_TIMEZONE),
    notificationPreferences: jsonb("notification_preferences").$type<NotificationPreferences>().notNull(),
    createdAt: text("created_at").notNull(),
    updatedAt: text("updated_at").notNull(),
  },
  (table) => ({
    subscribedIdx: index("subscriptions_is_subscribed_idx").on(table.isSubscribed),
  }),
);

export type SubscriptionRow = typeof subscriptions.$inferSelect;

/** A quote row that is known to carry text and attribution. */
export type Quote = QuoteRow & { quote: string; author: string };

export type QuoteSortField = "quote" | "author" | "createdAt" | "updatedAt";
export type SortOrder = "asc" | "desc";
export type ExportFormat = "json" | "csv";

export interface TagUsage {
  name: string;
  quoteCount: number;
}
