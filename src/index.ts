#!/usr/bin/env node
import logger from "./config/logger";
import { loadBatchEnv, type BatchEnv } from "./config/env";
import { resolveBatchSettings } from "./config/batchSettings";
import { loadProviderConfig, type ProviderConfig } from "./config/providerConfig";
import { parseArgs, usage } from "./cli/parser";
import { runBatch } from "./bootstrap/runBatch";
import { alwaysConfirm, createTerminalConfirm, type ConfirmFn } from "./bootstrap/confirm";
import { createShutdownManager } from "./bootstrap/shutdown";
import { formatReport } from "./services/messaging/report";
import {
  createTwilioProvider,
  type ScheduledSmsProvider,
} from "./services/messaging/twilioProvider";
import { errorMessage, isFatalError } from "./utils/errors";

// Use CommonJS-compatible main module detection
const isMainModule =
  typeof require !== "undefined" && typeof module !== "undefined" && require.main === module;

export interface MainOptions {
  env?: BatchEnv;
  createProvider?: (config: ProviderConfig) => ScheduledSmsProvider;
  confirm?: ConfirmFn;
  output?: NodeJS.WritableStream;
  registerSignals?: boolean;
}

async function main(argv: string[], options: MainOptions = {}): Promise<number> {
  const output = options.output ?? process.stdout;
  const args = parseArgs(argv);
  if (args.kind === "help") {
    output.write(`${usage()}\n`);
    return 0;
  }

  const env = options.env ?? loadBatchEnv();
  const providerConfig = await loadProviderConfig(env.configPath);
  const provider = (options.createProvider ?? createTwilioProvider)(providerConfig);
  const settings = resolveBatchSettings(env);

  let completed = 0;
  let total = 0;
  if (options.registerSignals ?? true) {
    createShutdownManager({
      describeProgress: () => `${completed}/${total} recipients processed`,
    }).register();
  }

  const report = await runBatch({
    inputPath: args.inputPath,
    provider,
    settings,
    confirm:
      options.confirm ?? (process.stdin.isTTY ? createTerminalConfirm() : alwaysConfirm),
    onResult: (_result, done, count) => {
      completed = done;
      total = count;
    },
  });

  if (report) {
    output.write(`\n${formatReport(report, settings)}\n`);
  }
  return 0;
}

if (isMainModule) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      if (isFatalError(error)) {
        logger.fatal(errorMessage(error));
        process.exit(error.exitCode);
      }
      logger.fatal({ err: error }, "Unhandled error during batch");
      process.exit(1);
    });
}

export { main };
