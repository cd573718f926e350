#!/usr/bin/env node
import { describeError } from "./errors.js";
import { startTuiApp } from "./index.js";

startTuiApp().catch((error: unknown) => {
  console.error(`[ponder] ${describeError(error)}`);
  process.exitCode = 1;
});
