import "dotenv/config";
import { createApp } from "./app";
import { loadConfig, validateEnvironment } from "./config";
import { createServices } from "./services";

const log = console.log;

function main() {
  const config = loadConfig();

  const problems = validateEnvironment(config);
  if (problems.length > 0) {
    console.error("❌ Environment is not ready:");
    problems.forEach((problem) => console.error(`   - ${problem}`));
    process.exit(1);
  }

  const services = createServices(config);
  const { server } = createApp(services);

  server.on("error", (err: NodeJS.ErrnoException) => {
    if (err.code === "EADDRINUSE") {
      console.error(`❌ Port ${config.port} is already in use. Please stop the other process or use a different port.`);
    } else {
      console.error("❌ Server error:", err);
    }
    process.exit(1);
  });

  const shutdown = () => {
    log("[Server] Shutting down");
    server.close(() => {
      if (!services.database) {
        process.exit(0);
      }
      services.database.pool.end().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error("[DB] ❌ Failed to close pool:", error);
          process.exit(1);
        },
      );
    });
  };
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);

  server.listen(config.port, "0.0.0.0", () => {
    log(`express server serving on port ${config.port}${config.isCloudRun ? " (Cloud Run)" : ""}`);
  });
}

main();
