// backend/services/gateway/src/log.init.ts
// Side-effect init so logs carry { service: "gateway" } everywhere.

import { initLogger } from "@edge/shared/src/utils/logger";
import { SERVICE_NAME } from "./config";

initLogger(SERVICE_NAME);
