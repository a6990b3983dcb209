import { DetectError } from "../errors/buildErrors";
import { FUNCTION_BUNDLE_LAYER_NAME, functionBundlePath } from "../io/paths";
import { Layer, LayerStore, layerTypes } from "../layers/layer";
import type { Logger } from "../log/logger";
import { UnitManifest } from "../types/functionBundle";
import { removeFile } from "../utils/fs";
import { classifyExitCode } from "./exitCodes";
import { readFunctionBundle } from "./manifest";
import { ProcessRunner } from "./processRunner";

export const DEFAULT_JAVA_COMMAND = "java";

const FUNCTION_BUNDLE_LAYER_TYPES = layerTypes({ launch: true, build: false, cache: false });

export interface DetectOptions {
  runner: ProcessRunner;
  logger: Logger;
  javaCommand?: string;
}

export interface DetectedFunction {
  layer: Layer;
  manifest: UnitManifest;
}

export function detectorArgs(runtimeJarPath: string, appDir: string, layerPath: string): string[] {
  return ["-jar", runtimeJarPath, "bundle", appDir, layerPath];
}

export async function detectFunction(
  store: LayerStore,
  runtimeJarPath: string,
  appDir: string,
  options: DetectOptions
): Promise<DetectedFunction> {
  const { logger } = options;
  const existing = await store.getLayer(FUNCTION_BUNDLE_LAYER_NAME);
  const layer = await store.writeMetadata(existing.name, {
    types: FUNCTION_BUNDLE_LAYER_TYPES,
    metadata: {}
  });

  const manifestPath = functionBundlePath(layer.path);
  await removeFile(manifestPath);

  const command = options.javaCommand ?? DEFAULT_JAVA_COMMAND;
  const args = detectorArgs(runtimeJarPath, appDir, layer.path);
  logger.debug(`Running ${command} ${args.join(" ")}`);
  const result = await options.runner.run(command, args, { cwd: appDir });

  const outcome = classifyExitCode(result.exitCode);
  if (outcome.kind !== "success") {
    throw new DetectError(outcome);
  }
  logger.info("Detection successful");

  const manifest = await readFunctionBundle(manifestPath);
  logger.header(`Detected function: ${manifest.className}`);
  logger.info(`Payload type: ${manifest.payloadType}`);
  logger.info(`Return type: ${manifest.returnType}`);

  return { layer, manifest };
}
