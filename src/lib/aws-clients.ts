import { Agent } from "node:https";
import { NodeHttpHandler } from "@smithy/node-http-handler";
import type { AwsCredentialIdentity } from "@aws-sdk/types";
import { fromIni } from "@aws-sdk/credential-providers";
import { EC2Client, type EC2ClientConfig } from "@aws-sdk/client-ec2";
import { RDSClient, type RDSClientConfig } from "@aws-sdk/client-rds";

/**
 * Credential expiration buffer in milliseconds (5 minutes).
 * Clients will be refreshed if credentials expire within this buffer.
 */
const CREDENTIAL_EXPIRATION_BUFFER_MS = 5 * 60 * 1000;

/**
 * Default TTL for clients without credential expiration (1 hour).
 */
const DEFAULT_CLIENT_TTL_MS = 60 * 60 * 1000;

/**
 * Connection pooling configuration.
 * - keepAlive: Reuse TCP connections across paginated describe calls
 * - maxSockets: Describe calls are sequential, a small pool is enough
 */
const CONNECTION_POOL_CONFIG = {
  connectionTimeout: 3000,
  socketTimeout: 10000,
  httpsAgent: new Agent({
    keepAlive: true,
    maxSockets: 10,
  }),
};

/**
 * Cached client entry with expiration tracking.
 */
interface CachedClient<T> {
  client: T;
  expiresAt: number;
}

/**
 * Configuration for client caching.
 */
export interface ClientCacheConfig {
  /**
   * Optional static credentials.
   * If provided with expiration, cache will be invalidated before credentials expire.
   */
  credentials?: AwsCredentialIdentity;

  /**
   * AWS region for the client.
   */
  region?: string;

  /**
   * Optional named profile from the shared AWS config files.
   * Ignored when explicit credentials are given.
   */
  profile?: string;

  /**
   * Settings merged over the defaults (e.g., a local endpoint for testing).
   */
  additionalConfig?: {
    maxAttempts?: number;
    endpoint?: string;
  };
}

/**
 * Generates a cache key from client configuration.
 * Key format: clientType:region:profile:accessKeyId:json(additionalConfig)
 *
 * @param clientType - Type of AWS client (e.g., "EC2", "RDS")
 * @param config - Client configuration
 * @returns Cache key string
 */
export function generateCacheKey(
  clientType: string,
  config: ClientCacheConfig
): string {
  const parts = [
    clientType,
    config.region || "default",
    config.profile || "none",
    config.credentials?.accessKeyId || "ambient",
  ];

  if (config.additionalConfig) {
    parts.push(JSON.stringify(config.additionalConfig));
  }

  return parts.join(":");
}

/**
 * Calculates expiration timestamp with buffer for credential refresh.
 *
 * @param credentials - Optional AWS credentials with expiration
 * @returns Expiration timestamp in milliseconds
 */
export function calculateExpirationTime(
  credentials?: AwsCredentialIdentity
): number {
  if (credentials?.expiration) {
    return credentials.expiration.getTime() - CREDENTIAL_EXPIRATION_BUFFER_MS;
  }

  return Date.now() + DEFAULT_CLIENT_TTL_MS;
}

/**
 * Checks if a cached client is still valid (not expired).
 */
export function isCachedClientValid<T>(
  cached: CachedClient<T> | undefined
): cached is CachedClient<T> {
  if (!cached) {
    return false;
  }

  return Date.now() < cached.expiresAt;
}

/**
 * Client cache for one client type, keyed by configuration.
 */
class ClientCache<T> {
  private readonly entries = new Map<string, CachedClient<T>>();

  /**
   * Gets a cached client or creates a new one if not cached or expired.
   */
  get(key: string, factory: () => T, expiresAt: number): T {
    const cached = this.entries.get(key);

    if (isCachedClientValid(cached)) {
      return cached.client;
    }

    const client = factory();
    this.entries.set(key, { client, expiresAt });

    return client;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

const ec2Clients = new ClientCache<EC2Client>();
const rdsClients = new ClientCache<RDSClient>();

/**
 * Clears every cached client.
 * Useful for testing or when you need to force client recreation.
 */
export function clearClientCache(): void {
  ec2Clients.clear();
  rdsClients.clear();
}

/**
 * Gets the number of cached clients across all client types.
 */
export function getClientCacheSize(): number {
  return ec2Clients.size + rdsClients.size;
}

function createRequestHandler(): NodeHttpHandler {
  return new NodeHttpHandler(CONNECTION_POOL_CONFIG);
}

/**
 * Explicit credentials win; a profile is resolved through the shared config
 * files; otherwise the SDK's default provider chain applies.
 */
function resolveCredentials(config: ClientCacheConfig) {
  if (config.credentials) {
    return config.credentials;
  }
  if (config.profile) {
    return fromIni({ profile: config.profile });
  }
  return undefined;
}

/**
 * Gets or creates a cached EC2 client with connection pooling.
 *
 * @param config - Client cache configuration
 * @returns Cached or newly created EC2Client
 *
 * @example
 * ```typescript
 * const ec2 = getEC2Client({ region: "eu-west-1", profile: "audit" });
 * ```
 */
export function getEC2Client(config: ClientCacheConfig = {}): EC2Client {
  const key = generateCacheKey("EC2", config);
  const expiresAt = calculateExpirationTime(config.credentials);

  return ec2Clients.get(
    key,
    () => {
      const clientConfig: EC2ClientConfig = {
        region: config.region,
        credentials: resolveCredentials(config),
        requestHandler: createRequestHandler(),
        ...config.additionalConfig,
      };

      return new EC2Client(clientConfig);
    },
    expiresAt
  );
}

/**
 * Gets or creates a cached RDS client with connection pooling.
 *
 * @param config - Client cache configuration
 * @returns Cached or newly created RDSClient
 */
export function getRDSClient(config: ClientCacheConfig = {}): RDSClient {
  const key = generateCacheKey("RDS", config);
  const expiresAt = calculateExpirationTime(config.credentials);

  return rdsClients.get(
    key,
    () => {
      const clientConfig: RDSClientConfig = {
        region: config.region,
        credentials: resolveCredentials(config),
        requestHandler: createRequestHandler(),
        ...config.additionalConfig,
      };

      return new RDSClient(clientConfig);
    },
    expiresAt
  );
}
