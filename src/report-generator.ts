import type {
  AnnotatedInstance,
  CoverageReport,
  CoverageResult,
  ReservationUsage,
} from "./lib/coverage-matcher.js";
import { daysUntil, formatDateString, formatMonthDay, reservationEnd } from "./lib/date-utils.js";
import { annualCost, formatAnnualCost } from "./lib/pricing.js";
import type {
  ComputeInstance,
  ComputeReservation,
  DatabaseInstance,
  DatabaseReservation,
  Reservation,
  ScheduledEvent,
} from "./lib/schemas.js";
import type { ReportFormat } from "./types.js";

const ANSI = {
  green: "\x1b[92m",
  red: "\x1b[91m",
  yellow: "\x1b[93m",
  reset: "\x1b[0m",
} as const;

type Color = Exclude<keyof typeof ANSI, "reset">;

export interface TextReportOptions {
  color?: boolean;
}

/**
 * How the count marker after a reservation's type reads:
 * - `slot`: " (k of n)" when a multi-count reservation covers an instance
 * - `count`: " (xN)" with N the listed units, for unused and partial listings
 */
type CountMarker = { kind: "slot"; slot: number } | { kind: "count"; count: number };

function countMarker(reservation: Reservation, marker: CountMarker): string {
  if (marker.kind === "slot") {
    return reservation.instanceCount > 1
      ? ` (${marker.slot} of ${reservation.instanceCount})`
      : "";
  }
  return ` (x${marker.count})`;
}

function networkLabel(network: ComputeInstance["network"]): string {
  return network === "vpc" ? "--VPC--" : "Classic";
}

function multiAzLabel(multiAz: boolean): string {
  return multiAz ? "MultiAZ" : "NoMulti";
}

function daysLeft(reservation: Reservation, now: Date): number {
  return daysUntil(reservationEnd(reservation.start, reservation.durationSeconds), now);
}

/** Cost and remaining term, common tail of every reservation description. */
function termSummary(reservation: Reservation, now: Date): string {
  const cost = formatAnnualCost(annualCost(reservation)).padStart(10);
  const days = String(daysLeft(reservation, now)).padStart(3);
  return `${cost}  ${days} days left`;
}

/** Reservation ids are long; the first segment identifies them well enough. */
function shortReservationId(id: string): string {
  return `${id.split("-")[0]}...`;
}

function describeComputeReservation(
  reservation: ComputeReservation,
  marker: CountMarker,
  now: Date
): string {
  const where =
    reservation.scope.kind === "region" ? "(region)" : reservation.scope.availabilityZone;
  return [
    where.padEnd(10),
    networkLabel(reservation.network).padEnd(7),
    (reservation.instanceType + countMarker(reservation, marker)).padEnd(22),
    termSummary(reservation, now),
  ].join(" ");
}

function describeDatabaseReservation(
  reservation: DatabaseReservation,
  marker: CountMarker,
  now: Date
): string {
  return [
    multiAzLabel(reservation.multiAz),
    (reservation.instanceType + countMarker(reservation, marker)).padEnd(22),
    reservation.productDescription.padEnd(12),
    termSummary(reservation, now),
  ].join(" ");
}

function describeReservation(
  reservation: Reservation,
  marker: CountMarker,
  now: Date
): string {
  return reservation.family === "compute"
    ? `${describeComputeReservation(reservation, marker, now)} ${shortReservationId(reservation.id)}`
    : `${describeDatabaseReservation(reservation, marker, now)} ${reservation.id}`;
}

function describeComputeInstance(instance: ComputeInstance): string {
  return [
    instance.name.padEnd(24),
    instance.availabilityZone.padEnd(10),
    networkLabel(instance.network).padEnd(7),
    instance.instanceType.padEnd(11),
  ].join(" ");
}

function describeDatabaseInstance(instance: DatabaseInstance): string {
  return [
    instance.name.padEnd(16),
    instance.availabilityZone.padEnd(10),
    multiAzLabel(instance.multiAz),
    instance.instanceType.padEnd(13),
    instance.engine.padEnd(8),
  ].join(" ");
}

/**
 * Event descriptions with the time left until each one starts,
 * e.g. "scheduled reboot in 6 days (3/8)".
 */
export function describeEvents(events: readonly ScheduledEvent[], now: Date): string {
  return events
    .map(
      (event) =>
        `${event.description} in ${daysUntil(event.notBefore, now)} days (${formatMonthDay(event.notBefore)})`
    )
    .join(",");
}

class TextWriter {
  readonly lines: string[] = [];

  constructor(private readonly color: boolean) {}

  paint(color: Color, text: string): string {
    return this.color ? `${ANSI[color]}${text}${ANSI.reset}` : text;
  }

  push(line: string): void {
    this.lines.push(line);
  }
}

function writeInstanceLine(writer: TextWriter, entry: AnnotatedInstance, now: Date): void {
  const { instance, coverage } = entry;
  const description =
    instance.family === "compute"
      ? describeComputeInstance(instance)
      : describeDatabaseInstance(instance);

  let line: string;
  if (coverage) {
    const reservation = describeReservation(
      coverage.reservation,
      { kind: "slot", slot: coverage.slot },
      now
    );
    line = writer.paint("green", `${description} ${reservation}`);
  } else {
    line = writer.paint("red", `${description} NOT COVERED`);
  }

  if (instance.events.length > 0) {
    line += ` ${writer.paint("yellow", `EVENTS! ${describeEvents(instance.events, now)}`)}`;
  }
  writer.push(line);
}

function writeReservationSection(
  writer: TextWriter,
  title: string,
  entries: readonly ReservationUsage[],
  color: Color,
  count: (usage: ReservationUsage) => number,
  now: Date
): void {
  if (entries.length === 0) {
    writer.push(`${title} (none)`);
    return;
  }
  writer.push(title);
  for (const usage of entries) {
    writer.push(
      writer.paint(
        color,
        describeReservation(usage.reservation, { kind: "count", count: count(usage) }, now)
      )
    );
  }
}

function writeFamily(
  writer: TextWriter,
  label: string,
  result: CoverageResult,
  now: Date
): void {
  writer.push(`${label} INSTANCES:`);
  for (const entry of result.instances) {
    writeInstanceLine(writer, entry, now);
  }

  writeReservationSection(
    writer,
    `${label} UNUSED RESERVATIONS:`,
    result.usage.filter((usage) => usage.used === 0),
    "red",
    (usage) => usage.purchased,
    now
  );
  writeReservationSection(
    writer,
    `${label} PARTIALLY USED RESERVATIONS:`,
    result.usage.filter((usage) => usage.used > 0 && usage.remaining > 0),
    "yellow",
    (usage) => usage.remaining,
    now
  );
}

/**
 * Renders the aligned console report.
 *
 * @example
 * ```
 * EC2 INSTANCES:
 * web-1                    us-east-1a --VPC-- t3.micro    (region)   --VPC-- t3.micro (1 of 2)         $675/yr  305 days left 4b2f8c1e...
 * batch                    us-east-1b --VPC-- m5.large    NOT COVERED
 * EC2 UNUSED RESERVATIONS: (none)
 * EC2 PARTIALLY USED RESERVATIONS:
 * (region)   --VPC-- t3.micro (x1)             $675/yr  305 days left 4b2f8c1e...
 * ```
 */
export function generateTextReport(
  report: CoverageReport,
  options: TextReportOptions = {}
): string {
  const writer = new TextWriter(options.color ?? false);
  writeFamily(writer, "EC2", report.compute, report.generatedAt);
  writeFamily(writer, "RDS", report.database, report.generatedAt);
  return writer.lines.join("\n");
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|");
}

function describeScope(reservation: Reservation): string {
  return reservation.scope.kind === "region"
    ? `${reservation.scope.region} (region)`
    : reservation.scope.availabilityZone;
}

function pushMarkdownFamily(
  lines: string[],
  label: string,
  result: CoverageResult,
  now: Date
): void {
  lines.push(`## ${label} instances`);
  lines.push("");
  if (result.instances.length === 0) {
    lines.push("No running instances.");
  } else {
    lines.push("| Instance | Zone | Type | Coverage | Annual cost | Days left |");
    lines.push("|----------|------|------|----------|-------------|-----------|");
    for (const { instance, coverage } of result.instances) {
      const cells = [escapeCell(instance.name), instance.availabilityZone, instance.instanceType];
      if (coverage) {
        const marker = countMarker(coverage.reservation, { kind: "slot", slot: coverage.slot });
        cells.push(
          `${escapeCell(coverage.reservation.id)}${marker}`,
          formatAnnualCost(coverage.annualCost),
          String(coverage.daysRemaining)
        );
      } else {
        cells.push("**NOT COVERED**", "", "");
      }
      lines.push(`| ${cells.join(" | ")} |`);
    }
  }
  lines.push("");

  const open = result.usage.filter((usage) => usage.remaining > 0);
  lines.push(`## ${label} reservations with spare capacity`);
  lines.push("");
  if (open.length === 0) {
    lines.push("None.");
  } else {
    lines.push("| Reservation | Scope | Type | Used | Remaining | Annual cost | Days left |");
    lines.push("|-------------|-------|------|------|-----------|-------------|-----------|");
    for (const usage of open) {
      const { reservation } = usage;
      lines.push(
        `| ${[
          escapeCell(reservation.id),
          describeScope(reservation),
          reservation.instanceType,
          `${usage.used} of ${usage.purchased}`,
          String(usage.remaining),
          formatAnnualCost(annualCost(reservation)),
          String(daysLeft(reservation, now)),
        ].join(" | ")} |`
      );
    }
  }
}

/**
 * Renders the report as Markdown tables, one set per resource family.
 */
export function generateMarkdownReport(report: CoverageReport): string {
  const lines: string[] = [];

  lines.push("# Reserved instance coverage");
  lines.push(`region ${report.region}, generated ${formatDateString(report.generatedAt)}`);
  lines.push("");

  pushMarkdownFamily(lines, "EC2", report.compute, report.generatedAt);
  lines.push("");
  pushMarkdownFamily(lines, "RDS", report.database, report.generatedAt);

  return lines.join("\n");
}

/**
 * Serialises the report; dates become ISO 8601 strings.
 */
export function generateJsonReport(report: CoverageReport): string {
  return JSON.stringify(report, null, 2);
}

export function renderReport(
  report: CoverageReport,
  format: ReportFormat,
  options: TextReportOptions = {}
): string {
  switch (format) {
    case "text":
      return generateTextReport(report, options);
    case "markdown":
      return generateMarkdownReport(report);
    case "json":
      return generateJsonReport(report);
  }
}
