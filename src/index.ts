#!/usr/bin/env node
import { createFuturesClient } from "./futures-client.js";
import { initLogger } from "./logger.js";
import { main } from "./program.js";

main(process.argv.slice(2), {
  env: process.env,
  createLogger: (config) => initLogger(config),
  createGateway: createFuturesClient,
  writeOutput: (text) => process.stdout.write(text),
  writeError: (text) => process.stderr.write(text)
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
