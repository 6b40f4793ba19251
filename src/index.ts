import { createApp, createServices } from "./app.js";
import { readPositiveInt, validateSecurityConfig } from "./auth/config.js";
import { describeError, logError, logInfo } from "./observability/logger.js";

validateSecurityConfig();

const services = createServices();
const app = createApp(services);
const PORT = readPositiveInt(process.env.PORT, 4000);

const server = app.listen(PORT, () => {
  logInfo("server.listening", { data: { port: PORT } });
});
services.pool.start();

function shutdown(signal: string): void {
  logInfo("server.shutdown", { data: { signal } });
  server.close();
  services.pool.stop().then(
    () => process.exit(0),
    (error: unknown) => {
      logError("server.shutdown_failed", { data: { error: describeError(error) } });
      process.exit(1);
    }
  );
}

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));
