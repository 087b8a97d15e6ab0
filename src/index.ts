#!/usr/bin/env node
import { startServer } from "./server/index.js";
import { getErrorMessage, logError } from "./core/logging.js";

startServer().catch((err: unknown) => {
  logError("Fatal:", getErrorMessage(err));
  process.exit(1);
});
