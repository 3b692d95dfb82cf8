import { Command } from "commander";

import { analyzeCommand } from "./analyze.js";
import { loadConfigForCli } from "./config.js";
import { explainCommand } from "./explain.js";
import { initCommand } from "./init.js";

type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

function parseNumberOption(value: string): number {
  return Number(value);
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function buildCli(): Command {
  const program = new Command();

  program
    .name("schedlog")
    .description("Classify scheduler log events and build scheduled/unscheduled reports")
    .version("0.1.0")
    .option(
      "--config <path>",
      "Override config path (defaults to $SCHEDLOG_CONFIG or the nearest .schedlog/config.yaml)",
    )
    .option("--debug", "Show error details and stack traces", false)
    .option("--no-debug", "Hide error details");

  program
    .command("init")
    .description("Create .schedlog/config.yaml in the current directory")
    .option("--force", "Overwrite an existing config", false)
    .action(async (opts: { force: boolean }) => {
      await initCommand({ force: opts.force });
    });

  program
    .command("analyze")
    .description("Parse, classify and aggregate log files into a report")
    .argument("<sources...>", "Log files, quoted glob patterns, or - for stdin")
    .option("--out <dir>", "Report output directory (default: report.output_dir)")
    .option("--run-id <id>", "Run ID (default: timestamp)")
    .option("--bucket-width <n>", "Trend bucket width in timestamp units", parseNumberOption)
    .option("--since <ts>", "Ignore events before this timestamp")
    .option("--until <ts>", "Ignore events after this timestamp")
    .option("--snapshots <glob>", "Dashboard snapshot files to reference (repeatable)", collect)
    .option("--json", "Print the report document as JSON", false)
    .action(
      async (
        sources: string[],
        opts: {
          out?: string;
          runId?: string;
          bucketWidth?: number;
          since?: string;
          until?: string;
          snapshots?: string[];
          json: boolean;
        },
      ) => {
        const globals = program.opts<GlobalOptions>();
        const { appContext } = loadConfigForCli({
          explicitConfigPath: globals.config,
          outputDir: opts.out,
        });
        await analyzeCommand(appContext, {
          sources,
          runId: opts.runId,
          bucketWidth: opts.bucketWidth,
          since: opts.since,
          until: opts.until,
          snapshots: opts.snapshots,
          json: opts.json,
          debug: globals.debug,
        });
      },
    );

  program
    .command("explain")
    .description("Show how a single log line is parsed and classified")
    .argument("<line>", "Raw log line (quote it)")
    .action((line: string) => {
      const globals = program.opts<GlobalOptions>();
      const { appContext } = loadConfigForCli({ explicitConfigPath: globals.config });
      explainCommand(appContext, line);
    });

  return program;
}
