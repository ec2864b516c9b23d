/**
 * SSE Transport for Run Events
 *
 * Bridges HTTP Server-Sent Events with the engine's run event channel. Each
 * connection follows one run: it receives a `connected` event carrying the
 * run snapshot, then every status, turn and log event of that run. The stream
 * ends once the run reaches a terminal status.
 */
import type { Response } from "express";
import { isTerminalStatus, type AgentRun, type RunEvent } from "agentry-shared";
import { Logger } from "agentry-kernel";
import { writeSSEEvent } from "../middleware/engine";

/**
 * Anything that fans out run events by run id (AgentEngine does).
 */
export interface RunEventSource {
  subscribe(runId: string, handler: (event: RunEvent) => void): () => void;
}

interface SSEConnection {
  res: Response;
  runId: string;
  unsubscribe: () => void;
  heartbeatInterval: NodeJS.Timeout;
}

export interface SSETransportConfig {
  /** Heartbeat interval in ms (default: 30000) */
  heartbeatInterval?: number;
  /** Maximum open streams (default: unlimited). New connections are rejected with 503. */
  maxConnections?: number;
}

export class SSETransport {
  private readonly log = Logger.for(this);
  private readonly connections = new Map<string, SSEConnection>();

  constructor(private readonly config: SSETransportConfig = {}) {}

  /**
   * Open a stream for a run. Returns false when the connection was rejected
   * (the response has been sent).
   */
  connect(connectionId: string, res: Response, run: AgentRun, source: RunEventSource): boolean {
    if (this.config.maxConnections !== undefined && this.connections.size >= this.config.maxConnections) {
      this.log.warn({ maxConnections: this.config.maxConnections }, "SSE connection rejected: limit reached");
      res.status(503).json({
        error: { code: "TOO_MANY_CONNECTIONS", message: "Server connection limit reached. Please try again later." },
      });
      return false;
    }

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no");
    res.flushHeaders();

    writeSSEEvent(res, { connectionId, run }, "connected");
    if (isTerminalStatus(run.status)) {
      res.end();
      return true;
    }

    const heartbeatMs = this.config.heartbeatInterval ?? 30000;
    const connection: SSEConnection = {
      res,
      runId: run.id,
      unsubscribe: source.subscribe(run.id, (event) => this.send(connectionId, event)),
      heartbeatInterval: setInterval(() => {
        res.write(": heartbeat\n\n");
      }, heartbeatMs),
    };
    this.connections.set(connectionId, connection);

    res.on("close", () => {
      this.log.debug({ connectionId }, "Client closed connection");
      this.disconnect(connectionId);
    });

    this.log.debug({ connectionId, runId: run.id, total: this.connections.size }, "SSE connected");
    return true;
  }

  /**
   * Disconnect an SSE client (or all if no connectionId).
   */
  disconnect(connectionId?: string): void {
    if (connectionId === undefined) {
      for (const id of Array.from(this.connections.keys())) {
        this.disconnect(id);
      }
      return;
    }

    const connection = this.connections.get(connectionId);
    if (!connection) {
      return;
    }
    this.connections.delete(connectionId);
    clearInterval(connection.heartbeatInterval);
    connection.unsubscribe();
    if (!connection.res.writableEnded) {
      connection.res.end();
    }
    this.log.debug({ connectionId }, "SSE disconnected");
  }

  /**
   * Send a shutdown event to every client and close the streams.
   */
  closeAll(): void {
    this.log.info({ connections: this.connections.size }, "Closing SSE connections");
    for (const [connectionId, connection] of Array.from(this.connections)) {
      if (!connection.res.writableEnded) {
        writeSSEEvent(connection.res, { message: "Server is shutting down" }, "server_shutdown");
      }
      this.disconnect(connectionId);
    }
  }

  isConnected(connectionId: string): boolean {
    return this.connections.has(connectionId);
  }

  get size(): number {
    return this.connections.size;
  }

  private send(connectionId: string, event: RunEvent): void {
    const connection = this.connections.get(connectionId);
    if (!connection) {
      return;
    }
    writeSSEEvent(connection.res, event, event.type);
    if (event.type === "status" && isTerminalStatus(event.status)) {
      this.disconnect(connectionId);
    }
  }
}
