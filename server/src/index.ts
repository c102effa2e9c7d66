import { createApp } from "./app.js";
import { env } from "./config/env.js";

function main() {
  const app = createApp();

  const server = app.listen(env.PORT, () => {
    console.log(`✓ Server running on port ${env.PORT}`);
    console.log(`  Environment: ${env.NODE_ENV}`);
    console.log(`  Frontend URL: ${env.FRONTEND_URL}`);
    console.log(`  Checkpoints: ${env.SYNC_POINTS}, microsectors: ${env.MICROSECTOR_COUNT}`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`\n${signal} received. Shutting down gracefully...`);
    server.close((err) => {
      if (err) {
        console.error("✗ Error while closing server:", err);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main();
