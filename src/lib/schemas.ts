import { z } from "zod";
import { ValidationError } from "./errors.js";
import { isAvailabilityZone, isRegion } from "./validation-utils.js";

/**
 * Inventory Schemas
 * =================
 *
 * Runtime validation for the records the coverage matcher consumes. The
 * TypeScript types used across the project are inferred from these schemas,
 * so a field added here is a field the whole pipeline sees.
 *
 * Record Categories
 * -----------------
 * 1. INSTANCES (compute | database)
 *    - Running resources that may be offset by a reservation
 *    - Discriminated on `family`
 *
 * 2. RESERVATIONS (compute | database)
 *    - Active purchased commitments with an instance count
 *    - Scoped to a single availability zone or a whole region
 *
 * 3. INVENTORY SNAPSHOT
 *    - Both families for one region, as produced by the inventory fetcher
 *      or loaded from a JSON file (dates as ISO strings)
 *
 * Validation Patterns
 * -------------------
 * - Regions: us-east-1, eu-west-2, us-gov-west-1
 * - Availability zones: us-east-1a, us-west-2-lax-1a
 * - Counts and durations: positive integers
 * - Prices: non-negative finite numbers in USD
 */

const nonEmptyString = (label: string) =>
  z.string().min(1, `${label} must not be empty`);

const regionSchema = z
  .string()
  .refine(isRegion, (value) => ({ message: `Invalid region: "${value}"` }));

const availabilityZoneSchema = z
  .string()
  .refine(isAvailabilityZone, (value) => ({
    message: `Invalid availability zone: "${value}"`,
  }));

export const NetworkPlacementSchema = z.enum(["vpc", "classic"]);

/**
 * Upcoming maintenance event reported for an instance (reboot, retirement).
 */
export const ScheduledEventSchema = z.object({
  code: z.string().optional(),
  description: nonEmptyString("Event description"),
  notBefore: z.coerce.date(),
});

const instanceFields = {
  id: nonEmptyString("Instance id"),
  name: nonEmptyString("Instance name"),
  availabilityZone: availabilityZoneSchema,
  instanceType: nonEmptyString("Instance type"),
  events: z.array(ScheduledEventSchema).default([]),
};

export const ComputeInstanceSchema = z.object({
  family: z.literal("compute"),
  ...instanceFields,
  network: NetworkPlacementSchema,
});

export const DatabaseInstanceSchema = z.object({
  family: z.literal("database"),
  ...instanceFields,
  engine: nonEmptyString("Database engine"),
  multiAz: z.boolean(),
});

export const InstanceSchema = z.discriminatedUnion("family", [
  ComputeInstanceSchema,
  DatabaseInstanceSchema,
]);

export const ReservationScopeSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("availability-zone"),
    availabilityZone: availabilityZoneSchema,
  }),
  z.object({
    kind: z.literal("region"),
    region: regionSchema,
  }),
]);

const priceSchema = z.number().finite().nonnegative();

/**
 * Only hourly recurring charges exist for EC2 and RDS reservations; any
 * other frequency would make the annual cost meaningless.
 */
export const RecurringChargeSchema = z.object({
  frequency: z.literal("Hourly"),
  amount: priceSchema,
});

const reservationFields = {
  id: nonEmptyString("Reservation id"),
  instanceType: nonEmptyString("Instance type"),
  scope: ReservationScopeSchema,
  instanceCount: z.number().int().positive(),
  start: z.coerce.date(),
  durationSeconds: z.number().int().positive(),
  fixedPrice: priceSchema,
  usagePrice: priceSchema,
  recurringCharges: z.array(RecurringChargeSchema).default([]),
  productDescription: nonEmptyString("Product description"),
};

export const ComputeReservationSchema = z.object({
  family: z.literal("compute"),
  ...reservationFields,
  network: NetworkPlacementSchema,
});

export const DatabaseReservationSchema = z.object({
  family: z.literal("database"),
  ...reservationFields,
  engine: nonEmptyString("Database engine"),
  multiAz: z.boolean(),
});

export const ReservationSchema = z.discriminatedUnion("family", [
  ComputeReservationSchema,
  DatabaseReservationSchema,
]);

export const InventorySchema = z.object({
  region: regionSchema,
  compute: z.object({
    instances: z.array(ComputeInstanceSchema),
    reservations: z.array(ComputeReservationSchema),
  }),
  database: z.object({
    instances: z.array(DatabaseInstanceSchema),
    reservations: z.array(DatabaseReservationSchema),
  }),
});

export type NetworkPlacement = z.infer<typeof NetworkPlacementSchema>;
export type ScheduledEvent = z.infer<typeof ScheduledEventSchema>;
export type ComputeInstance = z.infer<typeof ComputeInstanceSchema>;
export type DatabaseInstance = z.infer<typeof DatabaseInstanceSchema>;
export type Instance = z.infer<typeof InstanceSchema>;
export type InstanceInput = z.input<typeof InstanceSchema>;
export type ReservationScope = z.infer<typeof ReservationScopeSchema>;
export type RecurringCharge = z.infer<typeof RecurringChargeSchema>;
export type ComputeReservation = z.infer<typeof ComputeReservationSchema>;
export type DatabaseReservation = z.infer<typeof DatabaseReservationSchema>;
export type Reservation = z.infer<typeof ReservationSchema>;
export type ReservationInput = z.input<typeof ReservationSchema>;
export type Inventory = z.infer<typeof InventorySchema>;
export type InventoryInput = z.input<typeof InventorySchema>;

/**
 * Parses a value against a schema, converting zod failures into a
 * ValidationError that lists every offending path.
 *
 * @param schema - Schema to validate against
 * @param value - Untrusted value
 * @param label - Human-readable name of the value for the error message
 *
 * @throws {ValidationError} If the value does not match the schema
 */
export function parseWithSchema<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  label: string
): z.output<S> {
  const parseResult = schema.safeParse(value);
  if (!parseResult.success) {
    const issues = parseResult.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    const summary = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ValidationError(`Invalid ${label}: ${summary}`, {
      details: { issues },
      cause: parseResult.error,
    });
  }
  return parseResult.data;
}
