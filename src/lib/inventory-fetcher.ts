import {
  DescribeInstanceStatusCommand,
  DescribeInstancesCommand,
  DescribeReservedInstancesCommand,
  type EC2Client,
  type Instance as Ec2Instance,
  type InstanceStatus,
  type ReservedInstances,
} from "@aws-sdk/client-ec2";
import {
  DescribeDBInstancesCommand,
  DescribeReservedDBInstancesCommand,
  DescribeReservedDBInstancesOfferingsCommand,
  type DBInstance,
  type RDSClient,
  type ReservedDBInstance,
} from "@aws-sdk/client-rds";
import type { FetcherConfig, InventorySource } from "../types.js";
import { getEC2Client, getRDSClient, type ClientCacheConfig } from "./aws-clients.js";
import { InventoryError, ValidationError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import {
  ComputeInstanceSchema,
  ComputeReservationSchema,
  DatabaseInstanceSchema,
  DatabaseReservationSchema,
  parseWithSchema,
  type ComputeInstance,
  type ComputeReservation,
  type DatabaseInstance,
  type DatabaseReservation,
  type Inventory,
  type ScheduledEvent,
} from "./schemas.js";
import { sanitizeDisplayName } from "./validation-utils.js";

/**
 * Reserved DB product descriptions whose engine name differs from the
 * `Engine` reported on running DB instances.
 */
const ENGINE_BY_PRODUCT: Record<string, string> = {
  postgresql: "postgres",
};

/**
 * Licence suffix on commercial engine products, e.g. "oracle-se2(li)".
 */
const LICENCE_SUFFIX_REGEX = /\((?:byol|li|bring-your-own-license|license-included)\)$/;

/**
 * Scheduled events that will no longer happen.
 */
const SETTLED_EVENT_MARKERS = ["[Canceled]", "[Completed]"];

/**
 * Maps a reserved DB product description to the engine it covers.
 *
 * @example
 * ```typescript
 * engineForProduct("postgresql");     // "postgres"
 * engineForProduct("oracle-se2(li)"); // "oracle-se2"
 * ```
 */
export function engineForProduct(productDescription: string): string {
  const normalized = productDescription
    .trim()
    .toLowerCase()
    .replace(LICENCE_SUFFIX_REGEX, "")
    .trim();
  return ENGINE_BY_PRODUCT[normalized] ?? normalized;
}

function compareBy<T>(key: (item: T) => string) {
  return (a: T, b: T): number => {
    const left = key(a);
    const right = key(b);
    return left < right ? -1 : left > right ? 1 : 0;
  };
}

/**
 * Queries the EC2 and RDS APIs of one region and returns the running
 * instances and active reservations of both families.
 *
 * Safety features:
 * - Pagination stops at `config.maxPages` per operation (partial results are logged)
 * - Instance names are sanitized before they reach the terminal
 * - Every SDK failure is wrapped in an InventoryError naming the operation
 *
 * @example
 * ```typescript
 * const fetcher = new InventoryFetcher({ region: "eu-west-1", maxPages: 50 });
 * const inventory = await fetcher.fetchInventory();
 * ```
 */
export class InventoryFetcher implements InventorySource {
  private readonly logger: Logger;

  constructor(
    private readonly config: FetcherConfig,
    logger?: Logger
  ) {
    this.logger = (logger ?? createLogger({ component: "InventoryFetcher" })).child({
      region: config.region,
    });
  }

  async fetchInventory(): Promise<Inventory> {
    const compute = await this.fetchCompute();
    const database = await this.fetchDatabase();

    this.logger.info("Fetched inventory", {
      computeInstances: compute.instances.length,
      computeReservations: compute.reservations.length,
      databaseInstances: database.instances.length,
      databaseReservations: database.reservations.length,
    });

    return { region: this.config.region, compute, database };
  }

  private clientConfig(): ClientCacheConfig {
    return {
      region: this.config.region,
      profile: this.config.profile,
      credentials: this.config.credentials,
      additionalConfig: this.config.endpoint
        ? { endpoint: this.config.endpoint }
        : undefined,
    };
  }

  /**
   * Sends one API request, wrapping any failure in an InventoryError.
   */
  private async call<T>(operation: string, request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InventoryError(operation, `${operation} failed: ${reason}`, {
        cause: error,
      });
    }
  }

  /**
   * Follows a pagination token until the API stops returning one or the
   * page limit is reached.
   */
  private async collectPages<T>(
    operation: string,
    fetchPage: (token: string | undefined) => Promise<{ items: T[]; next?: string }>
  ): Promise<T[]> {
    const items: T[] = [];
    let token: string | undefined;
    let pageCount = 0;

    do {
      if (pageCount >= this.config.maxPages) {
        this.logger.warn("Pagination stopped at page limit, results are partial", {
          operation,
          maxPages: this.config.maxPages,
        });
        break;
      }

      pageCount++;
      const page = await this.call(operation, () => fetchPage(token));
      items.push(...page.items);
      token = page.next;

      this.logger.debug("Fetched page", { operation, page: pageCount, items: page.items.length });
    } while (token);

    return items;
  }

  private async fetchCompute(): Promise<Inventory["compute"]> {
    const ec2 = getEC2Client(this.clientConfig());

    const rawInstances = await this.describeRunningInstances(ec2);
    const events = await this.describeScheduledEvents(ec2);
    const rawReservations = await this.call("DescribeReservedInstances", () =>
      ec2.send(
        new DescribeReservedInstancesCommand({
          Filters: [{ Name: "state", Values: ["active"] }],
        })
      )
    );

    const instances = rawInstances
      .filter((instance) => {
        const isSpot =
          instance.InstanceLifecycle === "spot" || Boolean(instance.SpotInstanceRequestId);
        if (isSpot) {
          this.logger.debug("Skipping spot instance", { instanceId: instance.InstanceId });
        }
        return !isSpot;
      })
      .map((instance) => this.toComputeInstance(instance, events))
      .sort(compareBy((instance) => instance.name));

    const reservations = (rawReservations.ReservedInstances ?? [])
      .filter((reservation) => reservation.State === "active")
      .map((reservation) => this.toComputeReservation(reservation));

    return { instances, reservations };
  }

  private describeRunningInstances(ec2: EC2Client): Promise<Ec2Instance[]> {
    return this.collectPages("DescribeInstances", async (token) => {
      const response = await ec2.send(
        new DescribeInstancesCommand({
          Filters: [{ Name: "instance-state-name", Values: ["running"] }],
          NextToken: token,
        })
      );
      return {
        items: (response.Reservations ?? []).flatMap((group) => group.Instances ?? []),
        next: response.NextToken,
      };
    });
  }

  /**
   * Upcoming scheduled events keyed by instance id.
   */
  private async describeScheduledEvents(
    ec2: EC2Client
  ): Promise<Map<string, ScheduledEvent[]>> {
    const statuses: InstanceStatus[] = await this.collectPages(
      "DescribeInstanceStatus",
      async (token) => {
        const response = await ec2.send(new DescribeInstanceStatusCommand({ NextToken: token }));
        return { items: response.InstanceStatuses ?? [], next: response.NextToken };
      }
    );

    const eventsByInstance = new Map<string, ScheduledEvent[]>();
    for (const status of statuses) {
      if (!status.InstanceId) {
        continue;
      }
      for (const event of status.Events ?? []) {
        const description = event.Description ?? "";
        if (SETTLED_EVENT_MARKERS.some((marker) => description.includes(marker))) {
          continue;
        }
        if (!event.NotBefore) {
          continue;
        }
        const scheduled: ScheduledEvent = {
          code: event.Code,
          description: sanitizeDisplayName(description) || event.Code || "scheduled event",
          notBefore: event.NotBefore,
        };
        const existing = eventsByInstance.get(status.InstanceId);
        if (existing) {
          existing.push(scheduled);
        } else {
          eventsByInstance.set(status.InstanceId, [scheduled]);
        }
      }
    }
    return eventsByInstance;
  }

  private toComputeInstance(
    instance: Ec2Instance,
    events: Map<string, ScheduledEvent[]>
  ): ComputeInstance {
    const nameTag = instance.Tags?.find((tag) => tag.Key === "Name")?.Value;
    const name = nameTag ? sanitizeDisplayName(nameTag) : "";

    return parseWithSchema(
      ComputeInstanceSchema,
      {
        family: "compute",
        id: instance.InstanceId,
        name: name || instance.InstanceId,
        availabilityZone: instance.Placement?.AvailabilityZone,
        instanceType: instance.InstanceType,
        network: instance.VpcId ? "vpc" : "classic",
        events: (instance.InstanceId && events.get(instance.InstanceId)) || [],
      },
      `EC2 instance ${instance.InstanceId ?? "(no id)"}`
    );
  }

  private toComputeReservation(reservation: ReservedInstances): ComputeReservation {
    const label = `EC2 reservation ${reservation.ReservedInstancesId ?? "(no id)"}`;

    let scope: ComputeReservation["scope"];
    if (reservation.Scope === "Region") {
      scope = { kind: "region", region: this.config.region };
    } else if (reservation.Scope === "Availability Zone") {
      scope = {
        kind: "availability-zone",
        availabilityZone: reservation.AvailabilityZone ?? "",
      };
    } else {
      throw new ValidationError(
        `Invalid ${label}: unknown scope "${reservation.Scope ?? ""}"`,
        { details: { reservationId: reservation.ReservedInstancesId } }
      );
    }

    return parseWithSchema(
      ComputeReservationSchema,
      {
        family: "compute",
        id: reservation.ReservedInstancesId,
        instanceType: reservation.InstanceType,
        scope,
        instanceCount: reservation.InstanceCount,
        start: reservation.Start,
        durationSeconds: reservation.Duration,
        fixedPrice: reservation.FixedPrice,
        usagePrice: reservation.UsagePrice,
        recurringCharges: (reservation.RecurringCharges ?? []).map((charge) => ({
          frequency: charge.Frequency,
          amount: charge.Amount,
        })),
        productDescription: reservation.ProductDescription,
        network: reservation.ProductDescription?.includes("VPC") ? "vpc" : "classic",
      },
      label
    );
  }

  private async fetchDatabase(): Promise<Inventory["database"]> {
    const rds = getRDSClient(this.clientConfig());
    const logger = this.logger.child({ family: "database" });

    const rawInstances: DBInstance[] = await this.collectPages(
      "DescribeDBInstances",
      async (marker) => {
        const response = await rds.send(new DescribeDBInstancesCommand({ Marker: marker }));
        return { items: response.DBInstances ?? [], next: response.Marker };
      }
    );

    const rawReservations: ReservedDBInstance[] = await this.collectPages(
      "DescribeReservedDBInstances",
      async (marker) => {
        const response = await rds.send(
          new DescribeReservedDBInstancesCommand({ Marker: marker })
        );
        return { items: response.ReservedDBInstances ?? [], next: response.Marker };
      }
    );

    const instances: DatabaseInstance[] = [];
    for (const instance of rawInstances) {
      if (!instance.AvailabilityZone) {
        logger.warn("Skipping database instance without availability zone", {
          dbInstanceId: instance.DBInstanceIdentifier,
          status: instance.DBInstanceStatus,
        });
        continue;
      }
      instances.push(this.toDatabaseInstance(instance));
    }
    instances.sort(compareBy((instance) => instance.name));

    const offeringProducts = new Map<string, string | undefined>();
    const reservations: DatabaseReservation[] = [];
    for (const reservation of rawReservations) {
      if (reservation.State !== "active") {
        continue;
      }

      const productDescription =
        reservation.ProductDescription ||
        (await this.lookupOfferingProduct(
          rds,
          reservation.ReservedDBInstancesOfferingId,
          offeringProducts
        ));
      if (!productDescription) {
        logger.warn("Skipping reservation with unknown product", {
          reservationId: reservation.ReservedDBInstanceId,
          offeringId: reservation.ReservedDBInstancesOfferingId,
        });
        continue;
      }

      reservations.push(this.toDatabaseReservation(reservation, productDescription));
    }

    return { instances, reservations };
  }

  /**
   * Resolves the product of a reservation that came back without one,
   * through the offering it was bought from.
   */
  private async lookupOfferingProduct(
    rds: RDSClient,
    offeringId: string | undefined,
    cache: Map<string, string | undefined>
  ): Promise<string | undefined> {
    if (!offeringId) {
      return undefined;
    }
    if (cache.has(offeringId)) {
      return cache.get(offeringId);
    }

    const response = await this.call("DescribeReservedDBInstancesOfferings", () =>
      rds.send(
        new DescribeReservedDBInstancesOfferingsCommand({
          ReservedDBInstancesOfferingId: offeringId,
        })
      )
    );
    const product = response.ReservedDBInstancesOfferings?.[0]?.ProductDescription;
    cache.set(offeringId, product);
    return product;
  }

  private toDatabaseInstance(instance: DBInstance): DatabaseInstance {
    const id = instance.DBInstanceIdentifier;
    return parseWithSchema(
      DatabaseInstanceSchema,
      {
        family: "database",
        id,
        name: id ? sanitizeDisplayName(id) : id,
        availabilityZone: instance.AvailabilityZone,
        instanceType: instance.DBInstanceClass,
        engine: instance.Engine,
        multiAz: instance.MultiAZ ?? false,
      },
      `RDS instance ${id ?? "(no id)"}`
    );
  }

  private toDatabaseReservation(
    reservation: ReservedDBInstance,
    productDescription: string
  ): DatabaseReservation {
    return parseWithSchema(
      DatabaseReservationSchema,
      {
        family: "database",
        id: reservation.ReservedDBInstanceId,
        instanceType: reservation.DBInstanceClass,
        scope: { kind: "region", region: this.config.region },
        instanceCount: reservation.DBInstanceCount,
        start: reservation.StartTime,
        durationSeconds: reservation.Duration,
        fixedPrice: reservation.FixedPrice,
        usagePrice: reservation.UsagePrice,
        recurringCharges: (reservation.RecurringCharges ?? []).map((charge) => ({
          frequency: charge.RecurringChargeFrequency,
          amount: charge.RecurringChargeAmount,
        })),
        productDescription,
        engine: engineForProduct(productDescription),
        multiAz: reservation.MultiAZ ?? false,
      },
      `RDS reservation ${reservation.ReservedDBInstanceId ?? "(no id)"}`
    );
  }
}
