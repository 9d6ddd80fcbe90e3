/**
 * Config utility functions
 */

/**
 * Generate example config file content
 */
export function generateExampleConfig(profile: string = 'default'): string {
  return `import { defineConfig } from 'resmap';

export default defineConfig({
  credentials: {
    profile: '${profile}',
  },

  // Empty = every region enabled for the account
  regions: ['us-east-1', 'eu-west-1'],

  // Empty = every supported service (see \`resmap services\`)
  services: [],

  // Keep resources whose Environment tag is prod or staging
  // tags: {
  //   Environment: ['prod', 'staging'],
  // },

  concurrency: 40,
  includeGlobal: true,

  output: {
    format: 'json',
  },

  // Environment-specific configurations
  environments: {
    prod: {
      credentials: {
        profile: 'prod',
      },
      output: {
        format: 'csv',
      },
    },
  },
});
`;
}
