#!/usr/bin/env -S tsx
/**
 * Touchscreen clock runtime.
 * Usage: tsx cli/solar-clock.ts [-c config.json] [-v] [--bind-all] [--headless]
 */

import { ClockRuntime } from "../server/app";
import { ConfigError, loadClockConfig } from "../server/config/clock-config";
import { readClockEnv } from "../server/config/env";
import { DisplayError, FramebufferSink, MemorySink, type DisplaySink } from "../server/display/display-sink";
import { createLogger, setLogLevel } from "../server/utils/log";

const log = createLogger("process");

type CliArgs = {
  configPath?: string;
  verbose: boolean;
  bindAll: boolean;
  headless: boolean;
  help: boolean;
};

const USAGE = "Usage: tsx cli/solar-clock.ts [-c|--config <path>] [-v|--verbose] [--bind-all] [--headless]";

function parseArgs(argv: string[]): CliArgs {
  const parsed: CliArgs = { verbose: false, bindAll: false, headless: false, help: false };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === "-c" || token === "--config") {
      const value = argv[i + 1];
      if (value === undefined) throw new ConfigError(`${token} requires a path`);
      parsed.configPath = value;
      i += 1;
    } else if (token?.startsWith("--config=")) {
      parsed.configPath = token.slice("--config=".length);
    } else if (token === "-v" || token === "--verbose") {
      parsed.verbose = true;
    } else if (token === "--bind-all") {
      parsed.bindAll = true;
    } else if (token === "--headless") {
      parsed.headless = true;
    } else if (token === "-h" || token === "--help") {
      parsed.help = true;
    } else {
      throw new ConfigError(`Unknown argument: ${token}`);
    }
  }

  return parsed;
}

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    process.exit(1);
  }
  if (args.help) {
    console.log(USAGE);
    return;
  }
  if (args.verbose) setLogLevel("debug");

  let runtime: ClockRuntime;
  try {
    const config = await loadClockConfig(args.configPath);
    const sink: DisplaySink = args.headless
      ? new MemorySink()
      : new FramebufferSink(config.display.framebuffer, config.display.width, config.display.height);
    runtime = new ClockRuntime({ config, env: readClockEnv(), sink, bindAll: args.bindAll });
    log.info(`${config.location.name}, ${config.location.region} (${config.location.timezone})`);
    await runtime.start();
  } catch (error) {
    if (error instanceof ConfigError || error instanceof DisplayError) {
      log.error(error.message);
    } else {
      log.error("startup failed", error);
    }
    process.exit(1);
  }

  let shuttingDown = false;
  const requestShutdown = (signal: NodeJS.Signals) => {
    log.info(`signal received: ${signal}`);
    if (shuttingDown) return;
    shuttingDown = true;

    const forceExitTimer = setTimeout(() => {
      log.error("forcing exit after graceful shutdown timeout");
      process.exit(1);
    }, 5000);
    forceExitTimer.unref();

    runtime
      .shutdown()
      .then(() => {
        clearTimeout(forceExitTimer);
        process.exit(0);
      })
      .catch((error: unknown) => {
        log.error("shutdown failed", error);
        process.exit(1);
      });
  };

  for (const sig of ["SIGINT", "SIGTERM"] as const) {
    process.on(sig, () => requestShutdown(sig));
  }
  process.on("uncaughtException", (err) => {
    log.error("uncaught exception", err);
  });
  process.on("unhandledRejection", (reason) => {
    log.error("unhandled rejection", reason);
  });

  await runtime.finished();
}

main().catch((error: unknown) => {
  log.error("fatal", error);
  process.exit(1);
});
