import { z } from "zod";
import { daysUntil, reservationEnd } from "./date-utils.js";
import { annualCost } from "./pricing.js";
import {
  InstanceSchema,
  InventorySchema,
  ReservationSchema,
  parseWithSchema,
  type Instance,
  type InstanceInput,
  type InventoryInput,
  type Reservation,
  type ReservationInput,
} from "./schemas.js";
import { regionFromAvailabilityZone } from "./validation-utils.js";

/**
 * A reservation unit assigned to an instance.
 */
export interface CoverageAssignment {
  reservation: Reservation;
  /** 1-based position of the instance among those this reservation covers */
  slot: number;
  /** Whole days until the reservation term ends (negative once expired) */
  daysRemaining: number;
  /** Annualised cost of one reservation unit in USD */
  annualCost: number;
}

export interface AnnotatedInstance {
  instance: Instance;
  /** null means NOT COVERED */
  coverage: CoverageAssignment | null;
}

export interface ReservationUsage {
  reservation: Reservation;
  purchased: number;
  used: number;
  remaining: number;
}

export interface CoverageResult {
  instances: AnnotatedInstance[];
  /** Reservations that cover no instance at all, in input order */
  unused: Reservation[];
  /** Every reservation with its consumed and remaining counts, in input order */
  usage: ReservationUsage[];
}

export interface CoverageReport {
  region: string;
  generatedAt: Date;
  compute: CoverageResult;
  database: CoverageResult;
}

export interface MatchOptions {
  /** Clock used for days-remaining; defaults to the current time */
  now?: Date;
}

/**
 * Mutable remaining-count for one reservation during a single matching pass.
 */
interface ReservationSlot {
  reservation: Reservation;
  purchased: number;
  remaining: number;
  annualCost: number;
  daysRemaining: number;
}

/**
 * Attributes an instance and a reservation must share, placement aside.
 */
function attributeKey(record: Instance | Reservation): string {
  switch (record.family) {
    case "compute":
      return `compute|${record.instanceType}|${record.network}`;
    case "database":
      return `database|${record.instanceType}|${record.engine}|${
        record.multiAz ? "multi-az" : "single-az"
      }`;
  }
}

function zoneKey(attributes: string, availabilityZone: string): string {
  return `${attributes}@az:${availabilityZone}`;
}

function regionKey(attributes: string, region: string): string {
  return `${attributes}@region:${region}`;
}

function reservationKey(reservation: Reservation): string {
  const attributes = attributeKey(reservation);
  return reservation.scope.kind === "availability-zone"
    ? zoneKey(attributes, reservation.scope.availabilityZone)
    : regionKey(attributes, reservation.scope.region);
}

function firstAvailable(
  slots: ReservationSlot[] | undefined
): ReservationSlot | undefined {
  return slots?.find((slot) => slot.remaining > 0);
}

/**
 * Matches running instances against reservations.
 *
 * Reservations are indexed once by (attributes, placement). Each instance, in
 * input order, takes one unit from the first reservation with units left that
 * is scoped to its exact zone, and only then from one scoped to its region.
 * Among equally specific reservations the earliest in input order wins.
 *
 * @param instances - Running instances (validated before matching)
 * @param reservations - Active reservations (validated before matching)
 * @param options - Optional clock override
 *
 * @returns Per-instance coverage, fully unused reservations and per-reservation usage
 *
 * @throws {ValidationError} If any instance or reservation is malformed
 *
 * @example
 * ```typescript
 * const result = matchCoverage(instances, reservations, { now: new Date() });
 * for (const { instance, coverage } of result.instances) {
 *   console.log(instance.name, coverage ? coverage.reservation.id : "NOT COVERED");
 * }
 * ```
 */
export function matchCoverage(
  instancesInput: readonly InstanceInput[],
  reservationsInput: readonly ReservationInput[],
  options: MatchOptions = {}
): CoverageResult {
  const instances = parseWithSchema(
    z.array(InstanceSchema),
    instancesInput,
    "instance list"
  );
  const reservations = parseWithSchema(
    z.array(ReservationSchema),
    reservationsInput,
    "reservation list"
  );
  const now = options.now ?? new Date();

  const slots: ReservationSlot[] = reservations.map((reservation) => ({
    reservation,
    purchased: reservation.instanceCount,
    remaining: reservation.instanceCount,
    annualCost: annualCost(reservation),
    daysRemaining: daysUntil(
      reservationEnd(reservation.start, reservation.durationSeconds),
      now
    ),
  }));

  const index = new Map<string, ReservationSlot[]>();
  for (const slot of slots) {
    const key = reservationKey(slot.reservation);
    const existing = index.get(key);
    if (existing) {
      existing.push(slot);
    } else {
      index.set(key, [slot]);
    }
  }

  const annotated: AnnotatedInstance[] = instances.map((instance) => {
    const attributes = attributeKey(instance);
    const slot =
      firstAvailable(index.get(zoneKey(attributes, instance.availabilityZone))) ??
      firstAvailable(
        index.get(
          regionKey(attributes, regionFromAvailabilityZone(instance.availabilityZone))
        )
      );

    if (!slot) {
      return { instance, coverage: null };
    }

    slot.remaining -= 1;
    return {
      instance,
      coverage: {
        reservation: slot.reservation,
        slot: slot.purchased - slot.remaining,
        daysRemaining: slot.daysRemaining,
        annualCost: slot.annualCost,
      },
    };
  });

  const usage: ReservationUsage[] = slots.map((slot) => ({
    reservation: slot.reservation,
    purchased: slot.purchased,
    used: slot.purchased - slot.remaining,
    remaining: slot.remaining,
  }));

  return {
    instances: annotated,
    unused: usage
      .filter((entry) => entry.used === 0)
      .map((entry) => entry.reservation),
    usage,
  };
}

/**
 * Runs the matcher for both resource families of an inventory snapshot.
 *
 * @throws {ValidationError} If the inventory is malformed
 */
export function analyzeInventory(
  inventoryInput: InventoryInput,
  options: MatchOptions = {}
): CoverageReport {
  const inventory = parseWithSchema(InventorySchema, inventoryInput, "inventory");
  const now = options.now ?? new Date();

  return {
    region: inventory.region,
    generatedAt: now,
    compute: matchCoverage(
      inventory.compute.instances,
      inventory.compute.reservations,
      { now }
    ),
    database: matchCoverage(
      inventory.database.instances,
      inventory.database.reservations,
      { now }
    ),
  };
}
