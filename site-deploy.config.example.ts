/**
 * Example deployment configuration
 *
 * Copy to site-deploy.config.ts. Environment variables are loaded from .env files first:
 * - Default: .env
 * - Staging: .env.staging (use with --env staging)
 *
 * Command-line flags override every value below.
 */
import type { SiteDeployConfig } from "./src/types/config.js";

const config: SiteDeployConfig = {
  domain: process.env.SITE_DOMAIN || "example.org",
  prefix: process.env.SITE_PREFIX || "example-org",
  region: "eu-west-1",

  bucketLogsLifecycle: 365,
  bucketTransitionLifecycle: 30,

  content: {
    outputDir: "./site/output",
    exclude: ["**/*.map", ".DS_Store"],
  },

  upload: {
    skipUnchanged: true,
  },

  tags: {
    owner: "web",
  },

  environments: {
    staging: {
      domain: "staging.example.org",
      prefix: "example-org-staging",
      upload: { invalidate: false },
    },

    contact: {
      template: { variant: "contact-form" },
      contactForm: {
        senderEmail: "noreply@example.org",
        recipientEmail: "hello@example.org",
      },
    },
  },
};

export default config;
