// backend/services/gateway/index.ts
import { ENV_FILES_LOADED } from "./src/bootstrap"; // env cascade + asserts first
import "./src/log.init";
import { getLogger } from "@edge/shared/src/utils/logger";
import { loadGatewayConfig } from "./src/config";
import { createGatewayRuntime } from "./src/runtime";

async function start(): Promise<void> {
  const log = getLogger();
  const config = loadGatewayConfig();
  const runtime = await createGatewayRuntime(config);

  const server = runtime.app.listen(config.port, () => {
    log.info(
      {
        port: config.port,
        credentialSource: config.auth.credentialSource,
        registry: config.registry.baseUrl,
        envFiles: ENV_FILES_LOADED,
      },
      `[${config.serviceName}] listening`
    );
  });
  runtime.reconciler.start();

  const shutdown = (signal: string) => {
    log.info(`[${config.serviceName}] ${signal} received, shutting down…`);
    runtime
      .close()
      .catch((err: unknown) => log.error({ err }, "runtime close failed"))
      .finally(() => server.close(() => process.exit(0)));
  };
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));

  server.on("error", (err) => {
    log.error({ err }, `[${config.serviceName}] server error`);
    process.exit(1);
  });
}

start().catch((err: unknown) => {
  getLogger().error({ err }, "[gateway] fatal during bootstrap");
  process.exit(1);
});
