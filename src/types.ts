import type { AwsCredentialIdentity } from "@aws-sdk/types";
import type { Inventory } from "./lib/schemas.js";

export type ReportFormat = "text" | "markdown" | "json";

/**
 * Where an inventory snapshot comes from: the AWS APIs or a saved file.
 */
export interface InventorySource {
  fetchInventory(): Promise<Inventory>;
}

/**
 * Everything the AWS inventory fetcher needs, passed in explicitly rather
 * than read from the environment.
 */
export interface FetcherConfig {
  /** AWS region to inspect (e.g., us-east-1) */
  region: string;
  /** Named profile from the shared config files; ambient credential chain when absent */
  profile?: string;
  /** Static credentials; take precedence over profile */
  credentials?: AwsCredentialIdentity;
  /** Safety limit for paginated describe calls */
  maxPages: number;
  /** Custom API endpoint (e.g., a local emulator) */
  endpoint?: string;
}

export interface ReportConfig {
  fetcher: FetcherConfig;
  /** Read this inventory snapshot instead of calling AWS */
  inventoryFile?: string;
  format: ReportFormat;
  color: boolean;
  verbose: boolean;
}

export type {
  ComputeInstance,
  ComputeReservation,
  DatabaseInstance,
  DatabaseReservation,
  Instance,
  Inventory,
  NetworkPlacement,
  Reservation,
  ReservationScope,
  ScheduledEvent,
} from "./lib/schemas.js";

export type {
  AnnotatedInstance,
  CoverageAssignment,
  CoverageReport,
  CoverageResult,
  ReservationUsage,
} from "./lib/coverage-matcher.js";
