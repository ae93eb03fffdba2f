/**
 * DdgSearchServer - Wires the search backend, enrichment and transports together
 * Uses dependency injection so tests can swap the backend and fetcher for in-process fakes
 */
import type { Server as HttpServer } from "node:http";
import type { AddressInfo } from "node:net";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type {
  IEnrichmentPipeline,
  IPageFetcher,
  ISearchBackend,
  ServerDependencies,
} from "../types/index.js";
import { errorMeta } from "../utils/errors.js";
import { logError, logInfo, setLogLevel } from "../utils/logging.js";
import { CONFIG, type ServerConfig, loadServerConfig } from "./config.js";
import { createHttpApp } from "./httpApp.js";
import { DuckDuckGoBackend } from "./modules/DuckDuckGoBackend.js";
import { EnrichmentPipeline } from "./modules/EnrichmentPipeline.js";
import { PageFetcher } from "./modules/PageFetcher.js";
import { SessionRegistry } from "./modules/SessionRegistry.js";
import type { SseSessionTransport } from "./modules/SseSessionTransport.js";
import { createProtocolServer } from "./protocolServer.js";
import { ToolInvoker } from "./ToolInvoker.js";

export type TransportMode = "http" | "stdio";

export class DdgSearchServer {
  private readonly config: ServerConfig;
  private readonly searchBackend: ISearchBackend;
  private readonly pageFetcher: IPageFetcher;
  private readonly enrichmentPipeline: IEnrichmentPipeline;
  private readonly toolInvoker: ToolInvoker;
  private readonly registry = new SessionRegistry<SseSessionTransport>();
  private httpServer: HttpServer | null = null;
  private shuttingDown = false;

  constructor(dependencies?: ServerDependencies, config: ServerConfig = loadServerConfig()) {
    this.config = config;
    setLogLevel(config.logLevel);

    this.searchBackend =
      dependencies?.searchBackend ?? new DuckDuckGoBackend(config.searchTimeoutMs);
    this.pageFetcher =
      dependencies?.pageFetcher ?? new PageFetcher(undefined, config.fetchTimeoutMs);
    this.enrichmentPipeline =
      dependencies?.enrichmentPipeline ??
      new EnrichmentPipeline(this.pageFetcher, config.fetchTimeoutMs);
    this.toolInvoker = new ToolInvoker(this.searchBackend, this.enrichmentPipeline, {
      enrichConcurrency: config.enrichConcurrency,
    });

    logInfo("DdgSearchServer initialized", {
      backend: this.searchBackend.name,
      tools: this.toolInvoker.toolNames,
    });
  }

  /**
   * Starts the HTTP listener and resolves with the bound address. Port 0 picks a free port.
   */
  async listen(
    port: number = this.config.port,
    host: string = this.config.host,
  ): Promise<AddressInfo> {
    const app = createHttpApp({
      registry: this.registry,
      createServer: () => createProtocolServer(this.toolInvoker),
      keepAliveMs: this.config.keepAliveMs,
      maxBodySize: this.config.maxBodySize,
    });

    const server = await new Promise<HttpServer>((resolve, reject) => {
      const listening = app.listen(port, host, (error?: Error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(listening);
      });
    });
    this.httpServer = server;

    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error(`Unexpected listen address: ${String(address)}`);
    }
    logInfo(`HTTP server listening on ${address.address}:${address.port}`, {
      sse: CONFIG.PATHS.sse,
      health: CONFIG.PATHS.health,
    });
    return address;
  }

  async run(mode: TransportMode = "http"): Promise<void> {
    this.setupProcessHandlers();
    try {
      if (mode === "stdio") {
        const server = createProtocolServer(this.toolInvoker);
        await server.connect(new StdioServerTransport());
        logInfo("DdgSearchServer connected over stdio");
        return;
      }
      await this.listen();
    } catch (error) {
      logError("Failed to start server:", errorMeta(error));
      process.exit(1);
    }
  }

  /** Closes every live session, then the HTTP listener. Safe to call more than once. */
  async shutdown(): Promise<void> {
    if (this.shuttingDown) return;
    this.shuttingDown = true;

    await this.registry.closeAll();

    const server = this.httpServer;
    this.httpServer = null;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeAllConnections();
      });
    }
    logInfo("Server shutdown completed");
  }

  get activeSessions(): number {
    return this.registry.size;
  }

  getToolInvoker(): ToolInvoker {
    return this.toolInvoker;
  }

  private setupProcessHandlers(): void {
    const onSignal = (signal: NodeJS.Signals) => {
      logInfo(`${signal} received, shutting down gracefully...`);
      this.shutdown().then(
        () => process.exit(0),
        (error: unknown) => {
          logError("Error during shutdown:", errorMeta(error));
          process.exit(1);
        },
      );
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);

    process.on("unhandledRejection", (reason) => {
      logError("Unhandled promise rejection", errorMeta(reason));
    });
  }
}
