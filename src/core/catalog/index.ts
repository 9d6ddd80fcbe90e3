/**
 * Service Catalog
 * Static, read-only metadata about every service resmap can scan
 */

import type { ServiceDefinition } from "../../types/catalog.js";
import { SERVICE_DEFINITIONS } from "./services.js";

export class ServiceCatalog {
  private readonly definitions: ReadonlyMap<string, ServiceDefinition>;

  constructor(definitions: readonly ServiceDefinition[]) {
    const byId = new Map<string, ServiceDefinition>();

    for (const definition of definitions) {
      if (byId.has(definition.id)) {
        throw new Error(`Duplicate service in catalog: ${definition.id}`);
      }
      byId.set(definition.id, definition);
    }

    this.definitions = byId;
  }

  /**
   * Check whether a service identifier is cataloged
   */
  has(service: string): boolean {
    return this.definitions.has(service);
  }

  get(service: string): ServiceDefinition | undefined {
    return this.definitions.get(service);
  }

  isGlobal(service: string): boolean {
    return this.definitions.get(service)?.scope === "global";
  }

  /**
   * Region a global service's resources are attributed to
   *
   * @returns The control-plane region, or null for regional/unknown services
   */
  controlPlaneRegion(service: string): string | null {
    const definition = this.definitions.get(service);
    return definition?.scope === "global" ? definition.controlPlaneRegion : null;
  }

  /**
   * Whether each resource of the service carries its own true region
   */
  isRegionSelfReporting(service: string): boolean {
    const definition = this.definitions.get(service);
    return definition?.scope === "regional" && definition.regionSelfReporting === true;
  }

  /**
   * All service identifiers, sorted
   */
  allServices(): string[] {
    return [...this.definitions.keys()].sort();
  }

  /**
   * All definitions, sorted by identifier
   */
  list(): ServiceDefinition[] {
    return this.allServices().flatMap((id) => {
      const definition = this.definitions.get(id);
      return definition ? [definition] : [];
    });
  }
}

let defaultCatalog: ServiceCatalog | undefined;

/**
 * Catalog of the bundled services, built once per process
 */
export function getDefaultCatalog(): ServiceCatalog {
  if (!defaultCatalog) {
    defaultCatalog = new ServiceCatalog(SERVICE_DEFINITIONS);
  }
  return defaultCatalog;
}

export { SERVICE_DEFINITIONS } from "./services.js";
