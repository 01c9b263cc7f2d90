import type { EndpointId, StartResult, SubscriptionInfo } from "../types/subscription.js";
import { logger } from "../utils/logger.js";
import { STOP_ALL, type SubscriptionService } from "./subscription-service.js";
import type { NotificationSink } from "./telegram-client.js";

export type ChatState =
  | { step: "idle" }
  | { step: "awaiting_identity" }
  | { step: "awaiting_keywords"; source: string }
  | { step: "awaiting_stop" };

export const HELP_TEXT =
  "Send /start to monitor a Twitter user, /stop to stop monitoring, /list to see active monitors.";

interface ConversationServiceOptions {
  subscriptions: SubscriptionService;
  sink: NotificationSink;
}

export function parseKeywordsInput(text: string): string[] {
  const trimmed = text.trim();
  if (trimmed.toLowerCase() === "none") return [];
  return trimmed
    .split(",")
    .map((word) => word.trim())
    .filter(Boolean);
}

/** `/start@my_bot args` -> `start` */
function parseCommand(text: string): string | null {
  if (!text.startsWith("/")) return null;
  const [head = ""] = text.slice(1).split(/\s+/, 1);
  const [name = ""] = head.split("@", 1);
  return name.toLowerCase();
}

function describeStart(source: string, result: StartResult): string {
  switch (result.status) {
    case "started":
      return `Configuration received. Monitoring Twitter user ${source}. You will receive notifications here.`;
    case "conflict":
      return `Twitter user ${source} is already being monitored in this chat.`;
    case "limit_reached":
      return `This chat already has ${result.limit} active monitors. Stop one before adding another.`;
    case "invalid":
      return `Could not start monitoring: ${result.message}.`;
  }
}

function describeSubscription(subscription: SubscriptionInfo): string {
  const filter = subscription.keywords.length > 0 ? `keywords: ${subscription.keywords.join(", ")}` : "all tweets";
  return `- ${subscription.source} (${filter})`;
}

/**
 * Per-chat dialogue that collects a source identity and keywords before
 * committing a subscription, and the matching stop flow.
 */
export class ConversationService {
  private readonly subscriptions: SubscriptionService;

  private readonly sink: NotificationSink;

  private readonly states = new Map<EndpointId, ChatState>();

  constructor(options: ConversationServiceOptions) {
    this.subscriptions = options.subscriptions;
    this.sink = options.sink;
  }

  stateOf(endpoint: EndpointId): ChatState {
    return this.states.get(endpoint) ?? { step: "idle" };
  }

  async handle(endpoint: EndpointId, text: string): Promise<void> {
    const reply = this.respond(endpoint, text);
    const result = await this.sink.deliver(reply, endpoint);
    if (!result.ok) {
      logger.warn("conversation_reply_failed", { endpoint, status: result.status, error: result.error });
    }
  }

  respond(endpoint: EndpointId, text: string): string {
    const input = text.trim();
    const command = parseCommand(input);

    if (command !== null) return this.runCommand(endpoint, command);

    const state = this.stateOf(endpoint);
    switch (state.step) {
      case "awaiting_identity": {
        if (!input) return "Please send the Twitter user ID you want to monitor.";
        this.states.set(endpoint, { step: "awaiting_keywords", source: input });
        return "Optional: enter filter keywords separated by commas, or type 'none' to monitor all tweets.";
      }
      case "awaiting_keywords": {
        this.states.delete(endpoint);
        const result = this.subscriptions.start({
          endpoint,
          source: state.source,
          keywords: parseKeywordsInput(input),
        });
        return describeStart(state.source, result);
      }
      case "awaiting_stop": {
        this.states.delete(endpoint);
        return this.commitStop(endpoint, input);
      }
      case "idle":
        return HELP_TEXT;
    }
  }

  private runCommand(endpoint: EndpointId, command: string): string {
    switch (command) {
      case "start":
        this.states.set(endpoint, { step: "awaiting_identity" });
        return "Welcome! Send me the Twitter user ID you want to monitor.";
      case "stop":
        this.states.set(endpoint, { step: "awaiting_stop" });
        return "Enter the Twitter user ID to stop monitoring, or type 'all' to stop all monitors for this chat.";
      case "list": {
        const active = this.subscriptions.list(endpoint);
        if (active.length === 0) return "No active monitors in this chat.";
        return ["Active monitors in this chat:", ...active.map(describeSubscription)].join("\n");
      }
      case "cancel":
        this.states.delete(endpoint);
        return "Operation cancelled.";
      default:
        return HELP_TEXT;
    }
  }

  private commitStop(endpoint: EndpointId, input: string): string {
    const { stoppedCount } = this.subscriptions.stop({ endpoint, source: input });
    if (input.toLowerCase() === STOP_ALL) {
      return `Stopped ${stoppedCount} monitors in this chat.`;
    }
    if (stoppedCount > 0) return `Stopped monitoring Twitter user ${input}.`;
    return `No active monitor found for Twitter user ${input}.`;
  }
}
