import { loadConfig } from "../config";
import { runDocuments, runMeasures, runMetadata, runPipeline, runReconcile, runStatus } from "../core/commands";
import type { CommandContext } from "../core/commands";
import { closeDispatchers } from "../core/fetch";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";

export type CommandName = "metadata" | "documents" | "measures" | "reconcile" | "run" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  force: boolean;
  ignoreHttpsErrors: boolean;
  startPage?: number;
  maxDocs?: number;
  seed?: number;
  configPath?: string;
}

const COMMANDS: readonly CommandName[] = ["metadata", "documents", "measures", "reconcile", "run", "status"];

const HELP_TEXT = `
Usage:
  ats-harvester <command> [options]

Commands:
  metadata   Load the newest metadata snapshots, or crawl the listing when there are none
  documents  Fetch the per-language documents of every paper not yet on disk
  measures   Scrape measure pages into one JSON file per measure
  reconcile  Attach metadata to fetched documents and write reconciled_documents.jsonl
  run        metadata, documents and reconcile in sequence
  status     Report snapshot, document and measure counts

Options:
  --config <path>        Optional path to JSON config file
  --force                metadata/run: crawl even when snapshots exist;
                         documents: refetch existing files; measures: rescrape existing ids
  --start-page <n>       First listing page to request
  --max-docs <n>         Limit the number of papers fetched by documents/run
  --seed <n>             Seed for the document shuffle
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help             Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  return COMMANDS.find((command) => command === raw);
}

function readIntOption(argv: string[], flag: string): number | undefined {
  const index = argv.indexOf(flag);
  const raw = index >= 0 ? argv[index + 1] : undefined;
  const parsed = raw ? Number.parseInt(raw, 10) : undefined;
  return parsed !== undefined && Number.isFinite(parsed) ? parsed : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  let configPath: string | undefined;
  const configIndex = argv.indexOf("--config");
  if (configIndex >= 0 && argv[configIndex + 1]) {
    configPath = argv[configIndex + 1];
  }

  return {
    command,
    force: argv.includes("--force"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    startPage: readIntOption(argv, "--start-page"),
    maxDocs: readIntOption(argv, "--max-docs"),
    seed: readIntOption(argv, "--seed"),
    configPath,
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  let config = loadConfig(parsed.configPath);
  if (parsed.ignoreHttpsErrors) {
    config = { ...config, ignoreHttpsErrors: true };
  }
  if (parsed.seed !== undefined) {
    config = { ...config, shuffleSeed: parsed.seed };
  }

  const runId = createRunId();
  const sink = createSink(config, runId);
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, level: config.logLevel });
  const context: CommandContext = { runId, config, sink, logger, metrics };
  const options = { force: parsed.force, startPage: parsed.startPage, maxDocs: parsed.maxDocs };

  logger.info("command_start", {
    command: parsed.command,
    force: parsed.force,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    startPage: parsed.startPage,
    maxDocs: parsed.maxDocs,
    shuffleSeed: config.shuffleSeed,
  });

  try {
    switch (parsed.command) {
      case "metadata":
        await runMetadata({ ...context, logger: logger.child("metadata") }, options);
        break;
      case "documents":
        await runDocuments({ ...context, logger: logger.child("documents") }, options);
        break;
      case "measures":
        await runMeasures({ ...context, logger: logger.child("measures") }, options);
        break;
      case "reconcile":
        await runReconcile({ ...context, logger: logger.child("reconcile") });
        break;
      case "run":
        await runPipeline({ ...context, logger: logger.child("pipeline") }, options);
        break;
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
      default:
        console.error(`Unsupported command: ${String(parsed.command)}`);
        return 1;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } finally {
    await closeDispatchers();
    if (config.logLevel !== "silent") {
      metrics.printSummary();
    }
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
