/** Opaque id of the conversation notifications are delivered to (a Telegram chat id). */
export type EndpointId = string;

/** Upstream account being polled. */
export type SourceIdentity = string;

export interface SubscriptionKey {
  endpoint: EndpointId;
  source: SourceIdentity;
}

export interface SubscriptionRequest extends SubscriptionKey {
  keywords: string[];
}

export interface SubscriptionInfo extends SubscriptionKey {
  keywords: string[];
  startedAt: string;
}

export interface FetchedItem {
  id: string;
  text: string;
  isRetransmission: boolean;
  tags: string[];
  observedAt: Date;
}

export type EvaluationDecision =
  | { action: "skip"; reason: "empty" | "already_seen" | "filtered" }
  | { action: "notify"; item: FetchedItem };

export type StartResult =
  | { status: "started"; subscription: SubscriptionInfo }
  | { status: "conflict" }
  | { status: "limit_reached"; limit: number }
  | { status: "invalid"; message: string };

export interface StopResult {
  stoppedCount: number;
}

export interface DeliveryResult {
  ok: boolean;
  status?: number;
  error?: string;
}
