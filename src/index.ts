import "dotenv/config";
import { createApp } from "./app";
import { openStorage } from "./db";
import { validateEnvironment } from "./middleware/validateEnv";
import { createServices } from "./services";

async function main() {
  const env = validateEnvironment();
  const { storage, close } = await openStorage(env);
  const services = createServices(storage, env);
  const app = createApp({ env, services });

  const server = app.listen(env.PORT, () => {
    console.log(`Nutrition tracker backend listening on port ${env.PORT}`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close(() => {
      close()
        .catch((err: unknown) => console.error("Error closing storage:", err))
        .finally(() => process.exit(0));
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
