/**
 * Service catalog types
 */

/**
 * Grouping used when listing services
 */
export type ServiceCategory =
  | "compute"
  | "storage"
  | "database"
  | "networking"
  | "security"
  | "management"
  | "integration";

interface ServiceDefinitionBase {
  /** Catalog key (lowercase, e.g. "s3") */
  id: string;

  /** Display name */
  name: string;

  category: ServiceCategory;
}

/**
 * Service scanned once per region
 */
export interface RegionalServiceDefinition extends ServiceDefinitionBase {
  scope: "regional";

  /**
   * Each resource reports its own region, which may differ from the
   * region it was listed from
   */
  regionSelfReporting?: boolean;
}

/**
 * Account-wide service, scanned once and attributed to its control-plane region
 */
export interface GlobalServiceDefinition extends ServiceDefinitionBase {
  scope: "global";
  controlPlaneRegion: string;
}

export type ServiceDefinition =
  | RegionalServiceDefinition
  | GlobalServiceDefinition;
