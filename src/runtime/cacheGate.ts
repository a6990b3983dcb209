import type { RuntimeDescriptor } from "../config/buildpackConfig";

/**
 * A cached runtime is reused only when the layer recorded the fingerprint the
 * configuration asks for and the artifact is still on disk.
 */
export function isCacheValid(
  descriptor: RuntimeDescriptor,
  cachedFingerprint: string,
  artifactExists: boolean
): boolean {
  return descriptor.expectedFingerprint === cachedFingerprint && artifactExists;
}
