import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import chalk from "chalk";
import ora from "ora";
import { logger } from "./utils/logger.js";
import { loadReport } from "./utils/report.js";
import { formatConsoleOutput } from "./output/console.js";
import { formatJsonOutput } from "./output/json.js";
import { marshalReport } from "./core/marshal.js";

// Re-export for programmatic usage
export { marshalReport, MarshalError, type MarshalOptions } from "./core/marshal.js";
export { loadReport, ReportLoadError } from "./utils/report.js";
export { formatJsonOutput } from "./output/json.js";
export { renderTree, summarize } from "./output/console.js";
export { PackageUrlError } from "./sbom/purl.js";
export { NAMESPACE, type Component, type ComponentType, type Property } from "./sbom/component.js";
export type * from "./types.js";

export function createCli(argv?: string[]) {
  const y = yargs(argv ?? hideBin(process.argv))
    .scriptName("bomgraph")
    .version("0.1.0")
    .command(
      "$0 [report]",
      "Build the SBOM component graph of a scan report",
      (y) =>
        y
          .positional("report", {
            type: "string",
            default: "report.json",
            describe: "Path to the JSON scan report",
          })
          .option("output", {
            type: "string",
            choices: ["console", "json"],
            default: "console",
            describe: "Output format (console or json)",
          })
          .option("pretty", {
            type: "boolean",
            default: true,
            describe: "Indent JSON output",
          })
          .option("log-level", {
            type: "string",
            choices: ["fatal", "error", "warn", "info", "debug", "trace", "silent"],
            describe: "Log level (overrides LOG_LEVEL)",
          }),
      async (args) => {
        if (args.logLevel) {
          logger.level = args.logLevel;
        }
        const spinner = ora("Loading report...").start();

        try {
          const report = loadReport(String(args.report));

          spinner.text = `Building component graph for ${report.ArtifactName}`;
          const skipped: string[] = [];
          const root = marshalReport(report, {
            onSkip: (pkgId, err) => {
              skipped.push(pkgId);
              logger.warn({ err, pkgId }, "Skipping package that cannot be converted to a component");
            },
          });

          spinner.stop();

          if (args.output === "json") {
            console.log(JSON.stringify(formatJsonOutput(root), null, args.pretty ? 2 : undefined));
          } else {
            formatConsoleOutput(root);
          }

          if (skipped.length > 0) {
            console.error(
              chalk.yellow(`Skipped ${skipped.length} package${skipped.length !== 1 ? "s" : ""}: ${skipped.join(", ")}`),
            );
          }
        } catch (err) {
          spinner.fail("SBOM generation failed");
          logger.error({ err }, "SBOM generation failed");
          throw err;
        }
      },
    )
    .help()
    .strict();

  return y;
}
