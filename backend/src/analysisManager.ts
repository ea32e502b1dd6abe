import { randomUUID } from "crypto";
import type { ClientMessage, ColorCode, ServerMessage } from "@movescan/shared";
import { analyzePosition } from "./analysis";
import { clientMessageSchema } from "./schemas";

/** The slice of a `ws` socket the manager writes to. */
export interface MessageSocket {
  send(data: string): void;
}

interface ConnectionContext {
  id: string;
  socket: MessageSocket;
  analyses: number;
}

export class AnalysisManager {
  private connections: Map<string, ConnectionContext> = new Map();

  get connectionCount(): number {
    return this.connections.size;
  }

  addConnection(socket: MessageSocket): ConnectionContext {
    const context: ConnectionContext = {
      id: randomUUID(),
      socket,
      analyses: 0
    };
    this.connections.set(context.id, context);
    console.log(`Connection ${context.id} opened (${this.connectionCount} active)`);
    this.send(context.id, { type: "ack", connectionId: context.id });
    return context;
  }

  removeConnection(connectionId: string): void {
    const context = this.connections.get(connectionId);
    if (!context) return;
    this.connections.delete(connectionId);
    console.log(`Connection ${connectionId} closed after ${context.analyses} analyses`);
  }

  handleRawMessage(connectionId: string, raw: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.sendError(connectionId, "Invalid JSON payload");
      return;
    }
    const parseResult = clientMessageSchema.safeParse(parsed);
    if (!parseResult.success) {
      this.sendError(connectionId, "Invalid message payload");
      return;
    }
    this.handleMessage(connectionId, parseResult.data);
  }

  private handleMessage(connectionId: string, message: ClientMessage): void {
    const connection = this.connections.get(connectionId);
    if (!connection) return;

    switch (message.type) {
      case "analyze":
        this.handleAnalyze(connection, message.requestId, message.board, message.color);
        break;
      case "ping":
        this.send(connectionId, { type: "pong" });
        break;
      default:
        this.sendError(connectionId, "Unsupported message");
    }
  }

  private handleAnalyze(
    connection: ConnectionContext,
    requestId: string,
    board: string[][],
    color: ColorCode
  ): void {
    const result = analyzePosition({ board, color });
    if (!result.ok) {
      this.sendError(connection.id, result.error, requestId);
      return;
    }
    connection.analyses += 1;
    this.send(connection.id, { type: "report", requestId, payload: result.value });
  }

  private send(connectionId: string, message: ServerMessage): void {
    const connection = this.connections.get(connectionId);
    if (!connection) return;
    try {
      connection.socket.send(JSON.stringify(message));
    } catch (error) {
      console.error("Failed to send message", error);
    }
  }

  private sendError(connectionId: string, message: string, requestId?: string): void {
    const error: ServerMessage = requestId === undefined ? { type: "error", message } : { type: "error", message, requestId };
    this.send(connectionId, error);
  }
}
