/**
 * RelayAggregator turns one upstream stream into what callers consume:
 *
 * - {@link RelayAggregator.generateResponse}: the whole reply as one string
 * - {@link RelayAggregator.streamDeliveries}: chunks as they arrive, then
 *   exactly one `final` delivery
 * - {@link RelayAggregator.generateResponseStream}: the same, through a
 *   `(text, isComplete)` callback
 *
 * None of these reject. Failures become an apology string, or a final
 * delivery whose outcome carries the text to show.
 */

import type {
  AgentRecord,
  ChatMessage,
  UpstreamErrorOrigin,
  UpstreamEvent,
} from "@agent-bridge/shared";
import { errorMessage } from "../errors.js";
import { type Logger, createSilentLogger } from "../logging/logger.js";
import type { UpstreamStreamer } from "../upstream/StreamingClient.js";
import {
  buildConversation,
  parseModelSettings,
  resolveInstanceName,
  resolveStreamingInstanceName,
} from "./context.js";

export const APOLOGY_MESSAGE =
  "I apologize, but I encountered an error while processing your request. Please try again.";

export const EMPTY_RESPONSE_MESSAGE =
  "The agent connected but returned no response.";

/** Sent to the callback when delivering a chunk to the caller fails */
export const STREAMING_ERROR_MESSAGE = "An error occurred during streaming.";

/** Callback text prefix announcing the platform's thread id */
export const THREAD_INFO_PREFIX = "__THREAD_INFO__";

export interface RelayRequest {
  message: string;
  /** Prior messages, oldest first, not including `message` */
  history: readonly ChatMessage[];
  agent: AgentRecord;
  /** Continue an existing platform thread */
  threadId?: string;
}

export type RelayOutcome =
  | { status: "completed" }
  | { status: "upstream_error"; text: string; origin: UpstreamErrorOrigin }
  | { status: "failed"; text: string };

export type RelayDelivery =
  | { kind: "chunk"; text: string }
  | { kind: "thread_info"; threadId: string }
  | { kind: "final"; outcome: RelayOutcome };

export type StreamCallback = (
  text: string,
  isComplete: boolean,
) => void | Promise<void>;

/**
 * Text a final delivery adds to the reply ("" when completed).
 */
export function outcomeText(outcome: RelayOutcome): string {
  return outcome.status === "completed" ? "" : outcome.text;
}

function errorOutcome(
  event: Extract<UpstreamEvent, { kind: "error" }>,
): RelayOutcome {
  // Platform errors are prefixed; socket failures carry their own wording
  return {
    status: "upstream_error",
    text: event.origin === "agent" ? `Error: ${event.message}` : event.message,
    origin: event.origin,
  };
}

export interface RelayAggregatorOptions {
  upstream: UpstreamStreamer;
  logger?: Logger;
}

export class RelayAggregator {
  private readonly upstream: UpstreamStreamer;
  private readonly logger: Logger;

  constructor(options: RelayAggregatorOptions) {
    this.upstream = options.upstream;
    this.logger = (options.logger ?? createSilentLogger()).child({
      component: "relay",
    });
  }

  /**
   * Relay a message and yield deliveries as the agent answers.
   *
   * The last element is always `{ kind: "final" }`, unless the consumer
   * stops iterating first.
   */
  streamDeliveries(
    request: RelayRequest,
  ): AsyncGenerator<RelayDelivery, void, undefined> {
    return this.deliveries(
      request,
      resolveStreamingInstanceName(request.agent),
    );
  }

  private async *deliveries(
    request: RelayRequest,
    instanceName: string,
  ): AsyncGenerator<RelayDelivery, void, undefined> {
    const settings = parseModelSettings(request.agent.model_settings);
    const messages = buildConversation(
      request.agent,
      request.history,
      request.message,
    );
    const log = this.logger.child({ agent: instanceName });

    let outcome: RelayOutcome = { status: "completed" };
    let chunks = 0;
    try {
      const events = this.upstream.stream(
        instanceName,
        request.message,
        { ...settings, messages },
        request.threadId,
      );
      for await (const event of events) {
        switch (event.kind) {
          case "chunk":
          case "raw":
            if (event.text) {
              chunks++;
              yield { kind: "chunk", text: event.text };
            }
            break;
          case "thread_info":
            yield { kind: "thread_info", threadId: event.threadId };
            break;
          case "error":
            log.error(
              { origin: event.origin, err: event.message },
              "Upstream reported an error",
            );
            outcome = errorOutcome(event);
            break;
          case "typing":
            log.trace({ isTyping: event.isTyping }, "Agent typing");
            break;
          case "connected":
          case "complete":
          case "ignored":
            break;
        }
      }
    } catch (error) {
      log.error({ err: errorMessage(error) }, "Relay failed");
      outcome = { status: "failed", text: APOLOGY_MESSAGE };
    }

    log.debug({ chunks, outcome: outcome.status }, "Relay finished");
    yield { kind: "final", outcome };
  }

  /**
   * Relay a message and return the full reply. Never rejects.
   *
   * Socket failures after some text has arrived keep that text; errors
   * reported by the agent give the apology, as buffered callers have no
   * other error channel.
   */
  async generateResponse(request: RelayRequest): Promise<string> {
    const parts: string[] = [];
    const instanceName = resolveInstanceName(request.agent);
    for await (const delivery of this.deliveries(request, instanceName)) {
      if (delivery.kind === "chunk") {
        parts.push(delivery.text);
      } else if (delivery.kind === "final") {
        const { outcome } = delivery;
        if (
          outcome.status === "failed" ||
          (outcome.status === "upstream_error" && outcome.origin === "agent")
        ) {
          return APOLOGY_MESSAGE;
        }
      }
    }

    const text = parts.join("").trim();
    return text || EMPTY_RESPONSE_MESSAGE;
  }

  /**
   * Relay a message, reporting through `callback`:
   * - `(chunk, false)` for each chunk
   * - `("__THREAD_INFO__" + id, false)` for each thread id
   * - `(text, true)` exactly once at the end; text is "" on success
   *
   * If the callback throws on a chunk the relay stops and the terminal call
   * carries {@link STREAMING_ERROR_MESSAGE}. Never rejects.
   */
  async generateResponseStream(
    request: RelayRequest,
    callback: StreamCallback,
  ): Promise<void> {
    let terminal = "";
    try {
      for await (const delivery of this.streamDeliveries(request)) {
        if (delivery.kind === "chunk") {
          await callback(delivery.text, false);
        } else if (delivery.kind === "thread_info") {
          await callback(`${THREAD_INFO_PREFIX}${delivery.threadId}`, false);
        } else {
          terminal = outcomeText(delivery.outcome);
        }
      }
    } catch (error) {
      this.logger.error(
        { err: errorMessage(error) },
        "Stream callback failed, ending relay",
      );
      terminal = STREAMING_ERROR_MESSAGE;
    }

    try {
      await callback(terminal, true);
    } catch (error) {
      this.logger.error(
        { err: errorMessage(error) },
        "Final stream callback failed",
      );
    }
  }
}
