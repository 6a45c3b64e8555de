import { AppConfig, loadConfig } from "../config";
import { runCrawl, runExport, runPdfs, runPipeline, runSources, runStatus } from "../core/commands";
import { consoleDestination, createRunId, fileDestination, LogDestination, Logger, MetricsRegistry } from "../observability";
import { LocalJsonSink } from "../sink";

export type CommandName = "crawl" | "pdfs" | "sources" | "run" | "export" | "status";

const COMMANDS: readonly CommandName[] = ["crawl", "pdfs", "sources", "run", "export", "status"];

export interface ParsedCliArgs {
  command: CommandName;
  dryRun: boolean;
  force: boolean;
  ignoreHttpsErrors: boolean;
  noExtract: boolean;
  maxDocs?: number;
  concurrency?: number;
  configPath?: string;
  outPath?: string;
}

const HELP_TEXT = `
Usage:
  paper-harvester <command> [options]

Commands:
  crawl     Fetch the conference index and save one JSON record per paper page
  pdfs      Download the PDF referenced by every record
  sources   Look up every record on arXiv and fetch its source bundle
  run       crawl, then pdfs, then sources
  export    Write titles, abstracts and topics of all records to one text file
  status    Count records and artifacts already on disk

Options:
  --config <path>        Optional path to JSON config file
  --dry-run              Crawl without writing records
  --force                Re-crawl pages whose record already exists
  --max-docs <n>         Limit the number of paper pages crawled
  --concurrency <n>      Override the download concurrency cap
  --no-extract           Keep source bundles packed
  --out <path>           Output file for export
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help             Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  return COMMANDS.find((command) => command === raw);
}

function optionValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  return index >= 0 ? argv[index + 1] : undefined;
}

function optionInt(argv: string[], flag: string): number | undefined {
  const raw = optionValue(argv, flag);
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

  const concurrency = optionInt(argv, "--concurrency");
  return {
    command,
    dryRun: argv.includes("--dry-run"),
    force: argv.includes("--force"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    noExtract: argv.includes("--no-extract"),
    maxDocs: optionInt(argv, "--max-docs"),
    concurrency: concurrency !== undefined && concurrency >= 1 ? concurrency : undefined,
    configPath: optionValue(argv, "--config"),
    outPath: optionValue(argv, "--out"),
  };
}

function logDestinations(config: AppConfig): LogDestination[] {
  const destinations = [fileDestination(config.logFile)];
  if (config.logToConsole) {
    destinations.push(consoleDestination);
  }
  return destinations;
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  let config = loadConfig(parsed.configPath);
  if (parsed.ignoreHttpsErrors) {
    config = {
      ...config,
      ignoreHttpsErrors: true,
    };
  }

  const runId = createRunId();
  const sink = new LocalJsonSink(config, runId);
  const metrics = new MetricsRegistry();
  const logger = new Logger({
    component: "cli",
    runId,
    minLevel: config.logLevel,
    destinations: logDestinations(config),
  });
  const context = { runId, config, sink, logger, metrics };
  const downloadOptions = { concurrency: parsed.concurrency, extract: parsed.noExtract ? false : undefined };

  logger.info("command_start", {
    command: parsed.command,
    dryRun: parsed.dryRun,
    force: parsed.force,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    maxDocs: parsed.maxDocs,
    concurrency: parsed.concurrency,
  });

  try {
    switch (parsed.command) {
      case "crawl":
        await runCrawl(
          { ...context, logger: logger.child("crawl") },
          { dryRun: parsed.dryRun, force: parsed.force, maxDocs: parsed.maxDocs },
        );
        break;
      case "pdfs":
        await runPdfs({ ...context, logger: logger.child("pdfs") }, downloadOptions);
        break;
      case "sources":
        await runSources({ ...context, logger: logger.child("sources") }, downloadOptions);
        break;
      case "run":
        await runPipeline(
          { ...context, logger: logger.child("pipeline") },
          { ...downloadOptions, force: parsed.force, maxDocs: parsed.maxDocs },
        );
        break;
      case "export":
        await runExport({ ...context, logger: logger.child("export") }, parsed.outPath);
        break;
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    logger.error("command_failed", {
      command: parsed.command,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  } finally {
    metrics.logSummary(logger);
  }
}
