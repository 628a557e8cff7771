import type { DriverCapabilities } from '../appender/types';

/**
 * Merge a driver's static capabilities with configured overrides and freeze
 * the result; callers hold on to it for the lifetime of the source.
 */
export function resolveCapabilities(
  driverDefaults: DriverCapabilities,
  overrides?: Partial<DriverCapabilities>
): Readonly<DriverCapabilities> {
  return Object.freeze({
    generatedKeys: overrides?.generatedKeys ?? driverDefaults.generatedKeys,
    batchUpdates: overrides?.batchUpdates ?? driverDefaults.batchUpdates,
  });
}

export function describeCapabilities(capabilities: Readonly<DriverCapabilities>): string {
  return `generatedKeys=${capabilities.generatedKeys}, batchUpdates=${capabilities.batchUpdates}`;
}
