/**
 * Delivery hour matching for daily nuggets.
 *
 * Offsets come from a fixed table instead of a timezone database. Daylight
 * saving is approximated by month (March through November, UTC) and applied
 * to every zone in the table that observes it, Sydney included.
 */

import { DEFAULT_DELIVERY_HOUR, type SubscriptionRow } from "../../shared/schema";

const STANDARD_OFFSETS = new Map<string, number>([
  ["America/New_York", -5],
  ["America/Chicago", -6],
  ["America/Denver", -7],
  ["America/Los_Angeles", -8],
  ["America/Phoenix", -7],
  ["Europe/London", 0],
  ["Europe/Paris", 1],
  ["Asia/Tokyo", 9],
  ["Australia/Sydney", 10],
]);

const DAYLIGHT_OFFSETS = new Map<string, number>([
  ...STANDARD_OFFSETS,
  ["America/New_York", -4],
  ["America/Chicago", -5],
  ["America/Denver", -6],
  ["America/Los_Angeles", -7],
  ["Europe/London", 1],
  ["Europe/Paris", 2],
  ["Australia/Sydney", 11],
]);

/** Zones outside the table are treated as US Eastern standard time all year. */
export const FALLBACK_UTC_OFFSET = -5;

export const KNOWN_TIMEZONES: readonly string[] = Array.from(STANDARD_OFFSETS.keys());

export function isDaylightSavingPeriod(now: Date): boolean {
  const month = now.getUTCMonth() + 1;
  return month >= 3 && month <= 11;
}

export function utcOffsetFor(timezone: string, now: Date): number {
  const table = isDaylightSavingPeriod(now) ? DAYLIGHT_OFFSETS : STANDARD_OFFSETS;
  return table.get(timezone) ?? FALLBACK_UTC_OFFSET;
}

/** Local wall-clock hour (0-23) for a UTC hour and a whole-hour offset. */
export function localHourFor(hourUtc: number, offset: number): number {
  return (((hourUtc + offset) % 24) + 24) % 24;
}

export function deliveryHourOf(subscription: Pick<SubscriptionRow, "notificationPreferences">): number {
  const hour = subscription.notificationPreferences.deliveryHour;
  return Number.isInteger(hour) ? hour : DEFAULT_DELIVERY_HOUR;
}

/**
 * Active subscribers whose local hour at `hourUtc` is their chosen delivery hour.
 * Order is preserved.
 */
export function selectSubscribersForHour(
  hourUtc: number,
  subscriptions: readonly SubscriptionRow[],
  now: Date
): SubscriptionRow[] {
  return subscriptions.filter(
    (subscription) =>
      subscription.isSubscribed &&
      localHourFor(hourUtc, utcOffsetFor(subscription.timezone, now)) === deliveryHourOf(subscription)
  );
}
