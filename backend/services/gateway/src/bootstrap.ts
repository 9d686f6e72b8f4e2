// backend/services/gateway/src/bootstrap.ts
/**
 * Side-effect module: load the env cascade (repo → services → gateway) and
 * assert the keys the gateway cannot boot without. Import before anything
 * that reads process.env, including the logger.
 */

import path from "node:path";
import { assertEnv, loadEnvCascadeForService } from "@edge/shared/src/env";

export const ENV_FILES_LOADED = loadEnvCascadeForService(
  path.resolve(__dirname, "..")
);

assertEnv(["GATEWAY_PORT", "JWT_SECRET", "REGISTRY_BASE_URL"]);
