/**
 * SseSessionTransport - MCP transport over one Server-Sent-Events stream plus correlated POSTs
 *
 * Lifecycle: connecting -> open -> closing -> closed.
 * The long-lived GET response carries every outbound message; each POST /messages request
 * for the same session id is fed in through handlePostMessage.
 */
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { type JSONRPCMessage, JSONRPCMessageSchema } from "@modelcontextprotocol/sdk/types.js";
import type {
  EventStreamResponse,
  PostResult,
  SessionHandle,
  TransportState,
} from "../../types/index.js";
import { logDebug, logInfo, logWarn } from "../../utils/logging.js";

export interface SseSessionTransportOptions {
  sessionId: string;
  /** Interval between keep-alive comments; 0 disables them. */
  keepAliveMs?: number;
}

const SSE_HEADERS: Record<string, string> = {
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache, no-transform",
  Connection: "keep-alive",
  "X-Accel-Buffering": "no",
};

export class SseSessionTransport implements Transport, SessionHandle {
  onclose?: () => void;
  onerror?: (error: Error) => void;
  onmessage?: (message: JSONRPCMessage) => void;

  readonly sessionId: string;
  /** Settles once the transport reaches `closed`, whatever triggered it. */
  readonly closed: Promise<void>;

  private currentState: TransportState = "connecting";
  private keepAliveTimer: NodeJS.Timeout | null = null;
  private resolveClosed: () => void = () => {};
  /** Frames written since the socket buffer last filled; 0 while the client keeps up. */
  private bufferedFrames = 0;
  private readonly keepAliveMs: number;

  constructor(
    private readonly endpoint: string,
    private readonly response: EventStreamResponse,
    options: SseSessionTransportOptions,
  ) {
    this.sessionId = options.sessionId;
    this.keepAliveMs = options.keepAliveMs ?? 0;
    this.closed = new Promise<void>((resolve) => {
      this.resolveClosed = resolve;
    });

    this.response.on("close", () => this.handleDisconnect());
    this.response.on("drain", () => this.handleDrain());
  }

  get state(): TransportState {
    return this.currentState;
  }

  async start(): Promise<void> {
    if (this.currentState !== "connecting") {
      throw new Error(`SSE transport ${this.sessionId} cannot start from state ${this.currentState}`);
    }

    if (this.response.writableEnded) {
      this.finish();
      throw new Error(`SSE stream for session ${this.sessionId} ended before it opened`);
    }

    this.response.writeHead(200, SSE_HEADERS);
    this.currentState = "open";
    this.writeEvent("endpoint", this.endpoint);

    if (this.keepAliveMs > 0 && this.currentState === "open") {
      this.keepAliveTimer = setInterval(() => this.writeRaw(": ping\n\n"), this.keepAliveMs);
      this.keepAliveTimer.unref();
    }

    logInfo(`SSE stream open: ${this.sessionId}`);
  }

  /**
   * Writes one outbound message. Once the stream is gone this is a logged no-op:
   * late results for a dropped session are discarded rather than raised.
   */
  async send(message: JSONRPCMessage): Promise<void> {
    if (this.currentState !== "open") {
      logDebug(`Dropping outbound message for ${this.currentState} session ${this.sessionId}`);
      return;
    }
    this.writeEvent("message", JSON.stringify(message));
  }

  /**
   * Validates a POSTed body and injects it into the inbound side of the channel.
   */
  handlePostMessage(body: unknown): PostResult {
    if (this.currentState !== "open") {
      return { status: "closed" };
    }

    const candidates = Array.isArray(body) ? body : [body];
    const messages: JSONRPCMessage[] = [];
    for (const candidate of candidates) {
      const parsed = JSONRPCMessageSchema.safeParse(candidate);
      if (!parsed.success) {
        const reason = parsed.error.issues[0]?.message ?? "not a JSON-RPC message";
        this.onerror?.(new Error(`Invalid message for session ${this.sessionId}: ${reason}`));
        return { status: "invalid", reason };
      }
      messages.push(parsed.data);
    }

    for (const message of messages) {
      this.onmessage?.(message);
    }
    return { status: "accepted" };
  }

  /** Graceful close from the protocol loop or from shutdown. */
  async close(): Promise<void> {
    if (this.currentState === "closing" || this.currentState === "closed") {
      return this.closed;
    }

    this.currentState = "closing";
    this.stopKeepAlive();
    if (!this.response.writableEnded) {
      try {
        this.response.end();
      } catch (error) {
        logDebug(`Ending SSE stream ${this.sessionId} failed`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    this.finish();
    return this.closed;
  }

  private handleDisconnect(): void {
    if (this.currentState === "closing" || this.currentState === "closed") {
      return;
    }
    logInfo(`SSE client disconnected: ${this.sessionId}`);
    this.currentState = "closing";
    this.stopKeepAlive();
    this.finish();
  }

  private writeEvent(event: string, data: string): void {
    const lines = data
      .split(/\r\n|\r|\n/)
      .map((line) => `data: ${line}`)
      .join("\n");
    this.writeRaw(`event: ${event}\n${lines}\n\n`);
  }

  private writeRaw(frame: string): void {
    if (this.currentState !== "open") {
      return;
    }
    try {
      const flushed = this.response.write(frame);
      if (!flushed || this.bufferedFrames > 0) {
        this.bufferedFrames += 1;
        if (this.bufferedFrames === 1) {
          logDebug(`SSE client ${this.sessionId} is not keeping up, buffering outbound frames`);
        }
      }
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      logWarn(`SSE write failed for ${this.sessionId}: ${failure.message}`);
      this.onerror?.(failure);
      void this.close();
    }
  }

  private handleDrain(): void {
    if (this.bufferedFrames > 0) {
      logDebug(`SSE client ${this.sessionId} caught up after ${this.bufferedFrames} buffered frames`);
      this.bufferedFrames = 0;
    }
  }

  private stopKeepAlive(): void {
    if (this.keepAliveTimer) {
      clearInterval(this.keepAliveTimer);
      this.keepAliveTimer = null;
    }
  }

  private finish(): void {
    this.currentState = "closed";
    this.resolveClosed();
    this.onclose?.();
  }
}
