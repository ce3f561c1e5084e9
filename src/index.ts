#!/usr/bin/env node
import { Command, Option } from "commander";
import { resolveConfig } from "./config.js";
import { generateCoverageReport } from "./coverage-report.js";
import { CoverageReportError } from "./lib/errors.js";
import { createLogger } from "./lib/logger.js";
import { renderReport } from "./report-generator.js";

const program = new Command();

program
  .name("ri-coverage")
  .description(
    "Report which running EC2 and RDS instances are covered by reservations, and which reservations go unused"
  )
  .version("1.0.0")
  .option("--region <region>", "AWS region to inspect (default: AWS_REGION or us-east-1)")
  .option("--profile <name>", "Named AWS profile (default: AWS_PROFILE or ambient credentials)")
  .option("--inventory <file>", "Read an inventory snapshot JSON instead of querying AWS")
  .addOption(
    new Option("--format <format>", "Output format")
      .choices(["text", "markdown", "json"])
      .default("text")
  )
  .option("--no-color", "Disable coloured output")
  .option("-v, --verbose", "Log debug detail to stderr", false)
  .action(async (rawOptions: unknown) => {
    const logger = createLogger({ component: "CLI" }, { minLevel: "WARN" });
    try {
      const config = resolveConfig(rawOptions, {
        env: process.env,
        stdoutIsTTY: process.stdout.isTTY,
      });
      const runLogger = createLogger(
        { component: "CLI", region: config.fetcher.region },
        { minLevel: config.verbose ? "DEBUG" : "WARN" }
      );

      const report = await generateCoverageReport(config, { logger: runLogger });
      console.log(renderReport(report, config.format, { color: config.color }));
    } catch (error) {
      if (error instanceof Error) {
        if (!(error instanceof CoverageReportError)) {
          logger.error("Unexpected failure", error);
        }
        console.error(`Error: ${error.message}`);
      } else {
        console.error("An unexpected error occurred");
      }
      process.exit(1);
    }
  });

await program.parseAsync();
