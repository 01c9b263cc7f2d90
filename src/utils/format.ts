import type { FetchedItem, SourceIdentity } from "../types/subscription.js";

const RULE = "-".repeat(50);

export interface TimestampStyle {
  timeZone: string;
  label: string;
}

export function buildPermalink(itemId: string): string {
  return `https://twitter.com/i/web/status/${itemId}`;
}

/** `YYYY-MM-DD HH:mm:ss <label>` in the given zone. */
export function formatTimestamp(date: Date, style: TimestampStyle): string {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone: style.timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  }).formatToParts(date);

  const pick = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((part) => part.type === type)?.value ?? "00";

  const stamp = `${pick("year")}-${pick("month")}-${pick("day")} ${pick("hour")}:${pick("minute")}:${pick("second")}`;
  return style.label ? `${stamp} ${style.label}` : stamp;
}

export function formatItemMessage(source: SourceIdentity, item: FetchedItem, style: TimestampStyle): string {
  return [
    `[${formatTimestamp(item.observedAt, style)}] New tweet detected!`,
    `Twitter User: ${source}`,
    `Tweet ID: ${item.id}`,
    `Type: ${item.isRetransmission ? "Retweet" : "Original Tweet"}`,
    `Hashtags: ${item.tags.length > 0 ? item.tags.join(", ") : "None"}`,
    `Content: ${item.text}`,
    `Link: ${buildPermalink(item.id)}`,
    RULE,
  ].join("\n");
}

export function formatFetchFailure(source: SourceIdentity, reason: string): string {
  return `Failed to fetch tweets for ${source}: ${reason}`;
}

export function formatWorkerFault(source: SourceIdentity, reason: string): string {
  return `An error occurred in tweet monitor for ${source}: ${reason}`;
}
