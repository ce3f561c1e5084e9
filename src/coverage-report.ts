import { analyzeInventory, type CoverageReport } from "./lib/coverage-matcher.js";
import { FileInventorySource } from "./lib/inventory-file.js";
import { InventoryFetcher } from "./lib/inventory-fetcher.js";
import { createLogger, type Logger } from "./lib/logger.js";
import type { InventorySource, ReportConfig } from "./types.js";

export interface GenerateReportOptions {
  /** Overrides the source the configuration would pick */
  source?: InventorySource;
  now?: Date;
  logger?: Logger;
}

/**
 * Picks the inventory source for a configuration: a snapshot file when one
 * is given, otherwise the AWS APIs.
 */
export function createInventorySource(config: ReportConfig, logger: Logger): InventorySource {
  if (config.inventoryFile) {
    return new FileInventorySource(config.inventoryFile);
  }
  return new InventoryFetcher(config.fetcher, logger.child({ component: "InventoryFetcher" }));
}

/**
 * Loads the inventory and matches both resource families.
 *
 * @throws {InventoryError} If the inventory cannot be read
 * @throws {ValidationError} If the inventory contains malformed records
 */
export async function generateCoverageReport(
  config: ReportConfig,
  options: GenerateReportOptions = {}
): Promise<CoverageReport> {
  const logger = options.logger ?? createLogger({ component: "CoverageReport" });
  const source = options.source ?? createInventorySource(config, logger);

  const inventory = await source.fetchInventory();
  const report = analyzeInventory(inventory, { now: options.now });

  const uncovered = [...report.compute.instances, ...report.database.instances].filter(
    (entry) => entry.coverage === null
  ).length;
  logger.info("Coverage computed", {
    region: report.region,
    uncovered,
    unusedReservations: report.compute.unused.length + report.database.unused.length,
  });

  return report;
}
