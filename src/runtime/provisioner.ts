import type { RuntimeDescriptor } from "../config/buildpackConfig";
import { IntegrityError } from "../errors/buildErrors";
import { RUNTIME_LAYER_NAME, runtimeJarDownloadPath, runtimeJarPath } from "../io/paths";
import { Layer, LayerStore, layerTypes, metadataString } from "../layers/layer";
import type { Logger } from "../log/logger";
import { moveFile, pathExists, readBinary, removeFile } from "../utils/fs";
import { isCacheValid } from "./cacheGate";
import { FetchImpl, FetchedArtifact, fetchArtifact } from "./fetcher";
import { checkFingerprint } from "./integrity";

export const FINGERPRINT_METADATA_KEY = "fingerprint";
export const URL_METADATA_KEY = "url";

const RUNTIME_LAYER_TYPES = layerTypes({ launch: true, build: false, cache: true });

export interface ProvisionOptions {
  logger: Logger;
  verifyIntegrity?: boolean;
  fetchImpl?: FetchImpl;
}

export interface ProvisionedRuntime {
  layer: Layer;
  artifactPath: string;
  fromCache: boolean;
}

/**
 * Makes sure the runtime jar described by `descriptor` sits in the runtime
 * layer. The jar only appears at its final path once it has been fully
 * downloaded (and verified, when enabled); the layer metadata naming the
 * expected fingerprint is written before the download starts.
 */
export async function ensureRuntime(
  store: LayerStore,
  descriptor: RuntimeDescriptor,
  options: ProvisionOptions
): Promise<ProvisionedRuntime> {
  const { logger } = options;
  const layer = await store.getLayer(RUNTIME_LAYER_NAME);
  const artifactPath = runtimeJarPath(layer.path);

  const cachedFingerprint = metadataString(layer.metadata, FINGERPRINT_METADATA_KEY);
  const artifactExists = await pathExists(artifactPath);

  if (isCacheValid(descriptor, cachedFingerprint, artifactExists)) {
    logger.info("Installed Java function runtime from cache");
    return { layer, artifactPath, fromCache: true };
  }

  logger.debug("Creating function runtime layer");
  await removeFile(artifactPath);
  const updatedLayer = await store.writeMetadata(layer.name, {
    types: RUNTIME_LAYER_TYPES,
    metadata: {
      [URL_METADATA_KEY]: descriptor.url,
      [FINGERPRINT_METADATA_KEY]: descriptor.expectedFingerprint
    }
  });
  logger.debug("Function runtime layer successfully created");

  const downloadPath = runtimeJarDownloadPath(layer.path);
  logger.info("Starting download of function runtime");
  let fetched: FetchedArtifact;
  try {
    fetched = await fetchArtifact(descriptor.url, downloadPath, options.fetchImpl);
  } catch (error) {
    await removeFile(downloadPath);
    throw error;
  }
  logger.debug(`Downloaded ${fetched.bytes} bytes from ${fetched.finalUrl}`);
  logger.info("Function runtime download successful");

  if (options.verifyIntegrity) {
    const check = checkFingerprint(await readBinary(downloadPath), descriptor.expectedFingerprint);
    if (!check.matches) {
      await removeFile(downloadPath);
      throw new IntegrityError(descriptor.expectedFingerprint, check.actual);
    }
    logger.debug(`Function runtime SHA-256 verified: ${check.actual}`);
  } else {
    logger.warning(
      "Function runtime integrity check skipped",
      "The downloaded function runtime was not checked against metadata.runtime.sha256."
    );
  }

  await moveFile(downloadPath, artifactPath);
  logger.info("Function runtime installation successful");

  return { layer: updatedLayer, artifactPath, fromCache: false };
}
