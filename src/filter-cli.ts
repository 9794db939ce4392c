#!/usr/bin/env node
import process from "node:process";
import { applyArgs, parseArgs, USAGE } from "./cli-args.js";
import { loadConfig, loadEnvFile } from "./config.js";
import { ConfigError } from "./errors.js";
import { createLogger, errorMessage, setLogLevel } from "./log.js";
import { runFilter } from "./pipeline.js";

const log = createLogger("cli");

async function run(): Promise<number> {
  loadEnvFile();
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  const config = applyArgs(await loadConfig(args.configPath), args);
  setLogLevel(config.logLevel);

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) return;
    log.warn(`received ${signal}, stopping after teardown`);
    controller.abort(new Error(`interrupted_by_${signal}`));
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  try {
    const result = await runFilter(config, { signal: controller.signal });
    const { summary } = result.report;
    log.info(
      `done: ${summary.residential} residential, ${summary.datacenter} datacenter, ${summary.unknown} unknown; kept ${result.written.kept.length} in ${result.written.configPath}`,
    );
    return result.exitCode;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

run()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      console.error(error.message);
      console.error(USAGE);
    } else {
      log.error(errorMessage(error));
    }
    process.exitCode = 1;
  });
