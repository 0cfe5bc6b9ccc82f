/**
 * Configuration layer merger
 */

import { ConfigError } from '../errors.js';

export type PlainObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is PlainObject {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Deep merge two objects; undefined source values leave the target as is
 */
export function deepMerge(target: PlainObject, source: object): PlainObject {
  const result: PlainObject = { ...target };
  const entries: Array<[string, unknown]> = Object.entries(source);

  for (const [key, sourceValue] of entries) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      // Both are objects, merge recursively
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      // Override with source value
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Merge environment-specific configuration over the base.
 * The `environments` map itself never reaches the result.
 *
 * @throws ConfigError when the environment is not declared
 */
export function mergeEnvironment(baseConfig: PlainObject, environment?: string): PlainObject {
  const { environments, ...baseWithoutEnv } = baseConfig;

  if (!environment) {
    return baseWithoutEnv;
  }

  const available = isPlainObject(environments) ? environments : {};
  const envConfig = available[environment];

  if (!isPlainObject(envConfig)) {
    const names = Object.keys(available);
    throw new ConfigError(
      `Environment "${environment}" not found in config. ` +
        `Available environments: ${names.length > 0 ? names.join(', ') : '(none)'}`
    );
  }

  return deepMerge(baseWithoutEnv, envConfig);
}

/**
 * Apply layers left to right (later wins)
 */
export function mergeLayers(...layers: object[]): PlainObject {
  return layers.reduce<PlainObject>((merged, layer) => deepMerge(merged, layer), {});
}
