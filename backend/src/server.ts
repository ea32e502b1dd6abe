import { createServer } from "http";
import { WebSocketServer } from "ws";
import { AnalysisManager } from "./analysisManager";
import { createApp } from "./app";
import type { ServerConfig } from "./config";

export interface RunningServer {
  url: string;
  manager: AnalysisManager;
  close: () => Promise<void>;
}

export const startServer = async (config: ServerConfig): Promise<RunningServer> => {
  const app = createApp();
  const manager = new AnalysisManager();
  const httpServer = createServer(app);
  const wss = new WebSocketServer({ server: httpServer, path: "/ws" });

  wss.on("connection", (socket) => {
    const context = manager.addConnection(socket);

    socket.on("message", (data) => {
      manager.handleRawMessage(context.id, data.toString());
    });

    socket.on("close", () => {
      manager.removeConnection(context.id);
    });

    socket.on("error", (error) => {
      console.error("WebSocket error", error);
      manager.removeConnection(context.id);
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(config.port, config.host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });

  const address = httpServer.address();
  if (!address || typeof address === "string") {
    throw new Error("Server is not listening on a TCP port");
  }
  const host = config.host === "0.0.0.0" ? "localhost" : config.host;

  const close = async (): Promise<void> => {
    for (const client of wss.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve, reject) => {
      wss.close((error) => (error ? reject(error) : resolve()));
    });
    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => (error ? reject(error) : resolve()));
    });
  };

  return { url: `http://${host}:${address.port}`, manager, close };
};
