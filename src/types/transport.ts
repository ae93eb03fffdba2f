/**
 * Session and streaming transport type definitions
 */

// ─── SESSION LIFECYCLE ────────────────────────────────────────────────
export type TransportState = "connecting" | "open" | "closing" | "closed";

/** Anything the registry can tear down at shutdown. */
export interface SessionHandle {
  close(): Promise<void>;
}

export interface Session<THandle extends SessionHandle = SessionHandle> {
  readonly id: string;
  readonly handle: THandle;
}

// ─── SERVER-PUSH STREAM ───────────────────────────────────────────────
/**
 * The slice of an HTTP response the SSE transport writes to.
 * Express and node:http responses satisfy it; tests pass an in-memory fake.
 */
export interface EventStreamResponse {
  readonly writableEnded: boolean;
  writeHead(statusCode: number, headers: Record<string, string>): unknown;
  write(chunk: string): boolean;
  end(): unknown;
  on(event: "close", listener: () => void): unknown;
  on(event: "drain", listener: () => void): unknown;
}

export type PostResult =
  | { status: "accepted" }
  | { status: "closed" }
  | { status: "invalid"; reason: string };
