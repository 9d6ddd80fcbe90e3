/**
 * Region Resolver
 *
 * Turns the account's enabled regions and the user's region/service
 * filters into the ordered list of (service, region) work units.
 */

import type { WorkUnit } from "../../types/inventory.js";
import type { ServiceCatalog } from "../catalog/index.js";
import type { CollectorRegistry } from "../collectors/registry.js";
import { CatalogMismatchError } from "../errors.js";

export interface PlanInput {
  /** Regions enabled for the account */
  enabledRegions: readonly string[];

  /** Region filter (empty = all enabled regions) */
  requestedRegions?: readonly string[];

  /** Service filter (empty = all cataloged services) */
  requestedServices?: readonly string[];

  /** Force global services in even when the region filter excludes them */
  includeGlobal?: boolean;
}

export interface ScanPlan {
  /** Units ordered by service, then region */
  units: WorkUnit[];

  /** Effective services, sorted */
  services: string[];

  /** Effective regions, sorted */
  regions: string[];

  /** Requested services unknown to the catalog */
  unknownServices: string[];

  /** Requested regions that are not enabled for the account */
  ignoredRegions: string[];

  /** Planned services whose records must fall inside the effective regions */
  regionScopedServices: string[];
}

/**
 * Trim, lowercase and deduplicate identifiers, dropping empty ones
 */
export function normalizeIdentifiers(values: readonly string[]): string[] {
  const seen = new Set<string>();

  for (const value of values) {
    const normalized = value.trim().toLowerCase();
    if (normalized.length > 0) {
      seen.add(normalized);
    }
  }

  return [...seen];
}

/**
 * Compute the work units of a scan
 *
 * @throws CatalogMismatchError if a planned service has no collector
 */
export function planScan(
  input: PlanInput,
  catalog: ServiceCatalog,
  registry: CollectorRegistry
): ScanPlan {
  const requestedServices = normalizeIdentifiers(input.requestedServices ?? []);
  const requestedRegions = normalizeIdentifiers(input.requestedRegions ?? []);
  const enabled = new Set(normalizeIdentifiers(input.enabledRegions));

  // Step 1: effective services
  const unknownServices = requestedServices.filter((s) => !catalog.has(s)).sort();
  const services =
    requestedServices.length > 0
      ? requestedServices.filter((s) => catalog.has(s)).sort()
      : catalog.allServices();

  const missing = services.filter((s) => !registry.has(s));
  if (missing.length > 0) {
    throw new CatalogMismatchError(missing);
  }

  // Step 2: effective regions
  const regionFilter = requestedRegions.length > 0;
  const regions = regionFilter
    ? requestedRegions.filter((r) => enabled.has(r)).sort()
    : [...enabled].sort();
  const ignoredRegions = regionFilter
    ? requestedRegions.filter((r) => !enabled.has(r)).sort()
    : [];

  // Step 3: units
  const units: WorkUnit[] = [];
  const regionScopedServices: string[] = [];

  for (const service of services) {
    const collector = registry.get(service);
    if (!collector) {
      throw new CatalogMismatchError([service]);
    }

    const controlPlaneRegion = catalog.controlPlaneRegion(service);

    if (controlPlaneRegion !== null) {
      const included =
        !regionFilter ||
        requestedRegions.includes(controlPlaneRegion) ||
        input.includeGlobal === true;

      if (included) {
        units.push({ service, region: controlPlaneRegion, collector });
      }
      continue;
    }

    if (catalog.isRegionSelfReporting(service)) {
      regionScopedServices.push(service);
    }

    for (const region of regions) {
      units.push({ service, region, collector });
    }
  }

  return {
    units,
    services,
    regions,
    unknownServices,
    ignoredRegions,
    regionScopedServices,
  };
}
