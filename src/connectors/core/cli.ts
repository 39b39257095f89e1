#!/usr/bin/env node
import { Command } from "commander";
import { config as loadDotenv } from "dotenv";
import { loadTapConfig, readStructuredFile } from "../sailthru/config.js";
import { createSailthruRegistry } from "../sailthru/streams.js";
import { createServices, discover, runSync } from "../sailthru/tap.js";
import { parseCatalog } from "./catalog.js";
import { createLogger, isLogLevel } from "./logger.js";
import type { Logger, SyncResult } from "./types.js";

loadDotenv();
loadDotenv({ path: ".env.local", override: true });

function rootLogger(level: string | undefined): Logger {
  const resolved = level ?? process.env.LOG_LEVEL ?? "info";
  if (!isLogLevel(resolved)) {
    throw new Error(`Unknown log level "${resolved}"`);
  }
  return createLogger("sailthru-tap", resolved);
}

// Summary goes to stderr: stdout carries the message stream
function printResults(results: SyncResult[]): void {
  process.stderr.write("\n═══ Sync Summary ═══\n\n");
  for (const r of results) {
    const status = r.error ? "✗" : "✓";
    const bookmark = r.bookmark ? `, bookmark ${r.bookmark}` : "";
    process.stderr.write(
      `${status} ${r.stream} (${r.mode}): ${r.recordsEmitted} records${bookmark} [${(r.durationMs / 1000).toFixed(1)}s]\n`,
    );
    if (r.error) {
      process.stderr.write(`  ${r.error.name}: ${r.error.message}\n`);
    }
  }
}

async function run(action: (logger: Logger) => Promise<boolean>, level?: string) {
  let logger: Logger;
  try {
    logger = rootLogger(level);
  } catch (err) {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
    return;
  }
  try {
    const ok = await action(logger);
    process.exitCode = ok ? 0 : 1;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(message, { error: err instanceof Error ? err.name : "Error" });
    process.exitCode = 1;
  }
}

const program = new Command()
  .name("sailthru-tap")
  .description(
    "Extract Sailthru campaigns, lists, users and purchases as a line-delimited message stream",
  )
  .version("0.1.0");

program
  .command("discover")
  .description("Verify credentials and print the stream catalog")
  .requiredOption("--config <path>", "Config file (JSON or YAML)")
  .option("--log-level <level>", "debug, info, warn or error")
  .action(async (opts: { config: string; logLevel?: string }) => {
    await run(async (logger) => {
      const config = loadTapConfig(opts.config);
      const catalog = await discover(createServices(config, logger), logger);
      process.stdout.write(`${JSON.stringify(catalog, null, 2)}\n`);
      return true;
    }, opts.logLevel);
  });

program
  .command("sync")
  .description("Sync the selected streams")
  .requiredOption("--config <path>", "Config file (JSON or YAML)")
  .option("--state <path>", "State file; read at start, rewritten at checkpoints")
  .option("--catalog <path>", "Catalog file; every stream is selected without one")
  .option("--log-level <level>", "debug, info, warn or error")
  .action(
    async (opts: {
      config: string;
      state?: string;
      catalog?: string;
      logLevel?: string;
    }) => {
      await run(async (logger) => {
        const config = loadTapConfig(opts.config);
        const catalog = opts.catalog
          ? parseCatalog(readStructuredFile(opts.catalog))
          : undefined;
        const results = await runSync({
          config,
          services: createServices(config, logger),
          logger,
          catalog,
          statePath: opts.state ?? null,
        });
        printResults(results);
        return results.every((r) => !r.error);
      }, opts.logLevel);
    },
  );

program
  .command("streams")
  .description("List available streams in sync order")
  .action(() => {
    for (const stream of createSailthruRegistry().list()) {
      const parent = stream.parent ? ` <- ${stream.parent}` : "";
      process.stdout.write(`${stream.id} (${stream.replicationMode})${parent}\n`);
    }
  });

await program.parseAsync();
