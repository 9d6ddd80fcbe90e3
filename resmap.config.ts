/**
 * resmap configuration
 *
 * Environment variables are loaded from .env files:
 * - Default: .env
 * - Prod: .env.prod (use with --env prod)
 */
import { defineConfig } from "./src/types/config.js";

export default defineConfig({
  credentials: {
    profile: process.env.AWS_PROFILE || "default",
  },

  // Empty = every region enabled for the account
  regions: [],

  // Empty = every supported service
  services: [],

  concurrency: 40,
  includeGlobal: false,

  output: {
    format: "json",
  },

  environments: {
    prod: {
      regions: ["us-east-1", "eu-west-1"],
      tags: {
        Environment: ["prod"],
      },
      output: {
        format: "csv",
      },
    },
  },
});
