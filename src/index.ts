#!/usr/bin/env node

/**
 * osc-mqtt-bridge process entry point.
 */

import { main } from "./cli.js";

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error("Fatal error running osc-mqtt-bridge:", error);
    process.exit(1);
  },
);
