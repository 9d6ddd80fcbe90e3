/**
 * Configuration types for resmap
 */

/**
 * Supported report formats
 */
export type OutputFormat = "json" | "csv";

/**
 * Environment-specific configuration override
 * Allows partial overrides of the base configuration
 */
export interface EnvironmentConfig {
  /** AWS credentials override */
  credentials?: Partial<AWSCredentialsConfig>;

  /** Regions override */
  regions?: string[];

  /** Services override */
  services?: string[];

  /** Tag filter override */
  tags?: Record<string, string[]>;

  /** Worker pool width override */
  concurrency?: number;

  /** Global inclusion override */
  includeGlobal?: boolean;

  /** Report output override */
  output?: Partial<OutputConfig>;
}

/**
 * Main resmap configuration interface
 */
export interface InventoryConfig {
  /** AWS credentials configuration */
  credentials?: AWSCredentialsConfig;

  /** Regions to scan (empty = every region enabled for the account) */
  regions?: string[];

  /** Services to scan (empty = every cataloged service) */
  services?: string[];

  /**
   * Tag filter: tag key to accepted values.
   * Values of one key are OR'ed, keys are AND'ed.
   */
  tags?: Record<string, string[]>;

  /** Number of work units executed concurrently (default: 40) */
  concurrency?: number;

  /**
   * Scan global services even when the region filter does not contain
   * their control-plane region
   */
  includeGlobal?: boolean;

  /** Abort dispatching new work units after this many seconds */
  timeout?: number;

  /** Maximum attempts per AWS API call, including throttling retries (default: 5) */
  maxAttempts?: number;

  /** Record per-service timings in the report metadata */
  timings?: boolean;

  /** Report output configuration */
  output?: OutputConfig;

  /** Environment-specific configurations */
  environments?: Record<string, EnvironmentConfig>;
}

/**
 * AWS credentials configuration
 */
export interface AWSCredentialsConfig {
  /** AWS profile name from ~/.aws/credentials */
  profile?: string;

  /** AWS access key ID */
  accessKeyId?: string;

  /** AWS secret access key */
  secretAccessKey?: string;

  /** AWS session token (for temporary credentials) */
  sessionToken?: string;
}

/**
 * Report output configuration
 */
export interface OutputConfig {
  /** Report format (default: json) */
  format?: OutputFormat;

  /** Output file path (default: <account>_inventory_<timestamp>.<format>) */
  file?: string;
}

/**
 * Load config options
 */
export interface LoadConfigOptions {
  /** Config file path (default: auto-discover) */
  configPath?: string;

  /** Environment name (e.g., 'dev', 'prod') */
  env?: string;

  /** AWS profile override */
  profile?: string;

  /** Directory to start config discovery and .env lookup from */
  cwd?: string;
}

/**
 * Helper function to define config with type safety
 * Provides autocomplete and type checking in user config files
 */
export function defineConfig(config: InventoryConfig): InventoryConfig {
  return config;
}
