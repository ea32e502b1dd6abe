import { config as loadEnv } from "dotenv";
import { loadConfig } from "./config";
import { startServer } from "./server";

const main = async (): Promise<void> => {
  loadEnv();
  const config = loadConfig();
  const server = await startServer(config);
  console.log(`Server listening on ${server.url}`);

  const shutdown = (signal: string): void => {
    console.log(`Received ${signal}, shutting down`);
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error("Failed to shut down cleanly", error);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
};

main().catch((error: unknown) => {
  console.error("Failed to start server", error);
  process.exit(1);
});
