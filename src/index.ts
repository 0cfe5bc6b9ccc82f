/**
 * cfn-site-deploy - certificate, CloudFormation stack and content deployment for a static site on AWS
 *
 * Main library exports
 */

// Export types
export * from './types/config.js';
export * from './types/aws.js';
export * from './types/deployer.js';
export * from './types/deployment.js';

// Export core functionality
export {
  loadConfig,
  validateConfig,
  configSchema,
  findConfigFile,
  loadConfigFile,
  loadEnvFiles,
  getEnvFilePaths,
  mergeEnvironment,
  type LoadedConfig,
} from './core/config/index.js';
export * from './core/aws/index.js';
export * from './core/deployer/index.js';
export * from './core/pipeline/index.js';
export * from './core/errors.js';
export { createDeployContext, destroyDeployContext, type DeployContext, type DeployClients } from './core/context.js';
export { pollUntil, PollTimeoutError, done, pending, type PollOptions, type PollOutcome } from './core/utils/poll.js';
export { systemClock, type Clock } from './core/utils/clock.js';
