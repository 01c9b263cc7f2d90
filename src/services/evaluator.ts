import type { EvaluationDecision, FetchedItem } from "../types/subscription.js";

const RETRANSMISSION_PREFIX = "RT ";
const TAG_PATTERN = /#\w+/g;

function normalizeText(input: string): string {
  return input.trim().toLowerCase();
}

export function isRetransmission(text: string): boolean {
  return text.startsWith(RETRANSMISSION_PREFIX);
}

/** Hash-prefixed tokens in order of appearance, duplicates kept. */
export function extractTags(text: string): string[] {
  return text.match(TAG_PATTERN) ?? [];
}

export function matchesKeywords(text: string, keywords: readonly string[]): boolean {
  const needles = keywords.map(normalizeText).filter(Boolean);
  if (needles.length === 0) return true;
  const haystack = text.toLowerCase();
  return needles.some((needle) => haystack.includes(needle));
}

/**
 * Decides whether a freshly fetched item should be relayed.
 *
 * The caller owns `lastSeenId` and advances it only when acting on a `notify`
 * decision, so an item rejected by the keyword filter never moves the marker.
 */
export function evaluate(
  item: FetchedItem | null,
  lastSeenId: string | undefined,
  keywords: readonly string[],
): EvaluationDecision {
  if (!item) return { action: "skip", reason: "empty" };
  if (item.id === lastSeenId) return { action: "skip", reason: "already_seen" };
  if (!matchesKeywords(item.text, keywords)) return { action: "skip", reason: "filtered" };
  return { action: "notify", item };
}
