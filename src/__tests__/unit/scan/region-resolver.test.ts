import { describe, it, expect } from '@jest/globals';
import { planScan, normalizeIdentifiers } from '../../../core/scan/region-resolver.js';
import { getDefaultCatalog } from '../../../core/catalog/index.js';
import { CatalogMismatchError } from '../../../core/errors.js';
import { registryFor } from '../../helpers/scan-helpers.js';

const catalog = getDefaultCatalog();
const registry = registryFor(catalog.allServices());
const enabledRegions = ['us-east-1', 'eu-west-1', 'ap-south-1'];

function pairs(units: { service: string; region: string }[]): string[] {
  return units.map((u) => `${u.service}/${u.region}`);
}

describe('Region Resolver', () => {
  describe('normalizeIdentifiers', () => {
    it('should trim, lowercase and deduplicate', () => {
      expect(normalizeIdentifiers([' Lambda', 'lambda', 'S3 ', '', '  '])).toEqual(['lambda', 's3']);
    });
  });

  describe('regional services', () => {
    it('should plan the cross product of services and enabled regions', () => {
      const plan = planScan(
        { enabledRegions, requestedServices: ['lambda', 'dynamodb'] },
        catalog,
        registry
      );

      expect(pairs(plan.units)).toEqual([
        'dynamodb/ap-south-1',
        'dynamodb/eu-west-1',
        'dynamodb/us-east-1',
        'lambda/ap-south-1',
        'lambda/eu-west-1',
        'lambda/us-east-1',
      ]);
      expect(plan.services).toEqual(['dynamodb', 'lambda']);
      expect(plan.regions).toEqual(['ap-south-1', 'eu-west-1', 'us-east-1']);
    });

    it('should restrict to requested regions', () => {
      const plan = planScan(
        { enabledRegions, requestedRegions: ['eu-west-1'], requestedServices: ['lambda'] },
        catalog,
        registry
      );

      expect(pairs(plan.units)).toEqual(['lambda/eu-west-1']);
    });

    it('should ignore requested regions that are not enabled', () => {
      const plan = planScan(
        {
          enabledRegions,
          requestedRegions: ['us-east-1', 'me-south-1'],
          requestedServices: ['sqs'],
        },
        catalog,
        registry
      );

      expect(pairs(plan.units)).toEqual(['sqs/us-east-1']);
      expect(plan.ignoredRegions).toEqual(['me-south-1']);
    });

    it('should plan every cataloged service when none is requested', () => {
      const plan = planScan({ enabledRegions: ['eu-west-1'] }, catalog, registry);

      // 8 regional services in eu-west-1, 4 global services in their control-plane region
      expect(plan.units).toHaveLength(12);
      expect(plan.services).toEqual(catalog.allServices());
    });
  });

  describe('global services', () => {
    it('should include global services when no region filter is given', () => {
      const plan = planScan({ enabledRegions, requestedServices: ['iam'] }, catalog, registry);
      expect(pairs(plan.units)).toEqual(['iam/us-east-1']);
    });

    it('should include global services when the filter contains the control-plane region', () => {
      const plan = planScan(
        { enabledRegions, requestedRegions: ['us-east-1'], requestedServices: ['iam'] },
        catalog,
        registry
      );
      expect(pairs(plan.units)).toEqual(['iam/us-east-1']);
    });

    it('should skip global services when the filter excludes the control-plane region', () => {
      const plan = planScan(
        { enabledRegions, requestedRegions: ['eu-west-1'], requestedServices: ['iam'] },
        catalog,
        registry
      );
      expect(plan.units).toEqual([]);
    });

    it('should force global services in with includeGlobal', () => {
      const plan = planScan(
        {
          enabledRegions,
          requestedRegions: ['eu-west-1'],
          requestedServices: ['iam'],
          includeGlobal: true,
        },
        catalog,
        registry
      );
      expect(pairs(plan.units)).toEqual(['iam/us-east-1']);
    });

    it('should pin global accelerator to us-west-2', () => {
      const plan = planScan(
        { enabledRegions, requestedServices: ['globalaccelerator'] },
        catalog,
        registry
      );
      expect(pairs(plan.units)).toEqual(['globalaccelerator/us-west-2']);
    });

    it('should still evaluate global services when no region is effective', () => {
      const plan = planScan(
        {
          enabledRegions,
          requestedRegions: ['me-south-1'],
          requestedServices: ['lambda', 'route53'],
          includeGlobal: true,
        },
        catalog,
        registry
      );

      expect(plan.regions).toEqual([]);
      expect(pairs(plan.units)).toEqual(['route53/us-east-1']);
    });
  });

  describe('service filter', () => {
    it('should report unknown services without failing the plan', () => {
      const plan = planScan(
        { enabledRegions: ['us-east-1'], requestedServices: ['Lambda', ' ec2 ', 'lambda'] },
        catalog,
        registry
      );

      expect(plan.services).toEqual(['lambda']);
      expect(plan.unknownServices).toEqual(['ec2']);
      expect(pairs(plan.units)).toEqual(['lambda/us-east-1']);
    });

    it('should mark region self-reporting services for region scoping', () => {
      const plan = planScan(
        { enabledRegions, requestedServices: ['s3', 'lambda'] },
        catalog,
        registry
      );
      expect(plan.regionScopedServices).toEqual(['s3']);
    });
  });

  it('should throw when a cataloged service has no collector', () => {
    expect(() =>
      planScan(
        { enabledRegions, requestedServices: ['lambda', 's3'] },
        catalog,
        registryFor(['lambda'])
      )
    ).toThrow(CatalogMismatchError);
  });
});
