import path from "path";

export const RUNTIME_LAYER_NAME = "sf-fx-runtime-java";
export const FUNCTION_BUNDLE_LAYER_NAME = "function-bundle";

export const RUNTIME_JAR_FILE_NAME = "runtime.jar";
export const FUNCTION_BUNDLE_FILE_NAME = "function-bundle.toml";

export function layerDir(layersDir: string, layerName: string): string {
  return path.join(layersDir, layerName);
}

export function layerMetadataPath(layersDir: string, layerName: string): string {
  return path.join(layersDir, `${layerName}.toml`);
}

export function launchTomlPath(layersDir: string): string {
  return path.join(layersDir, "launch.toml");
}

export function runtimeJarPath(runtimeLayerDir: string): string {
  return path.join(runtimeLayerDir, RUNTIME_JAR_FILE_NAME);
}

export function runtimeJarDownloadPath(runtimeLayerDir: string): string {
  return `${runtimeJarPath(runtimeLayerDir)}.part`;
}

export function functionBundlePath(functionLayerDir: string): string {
  return path.join(functionLayerDir, FUNCTION_BUNDLE_FILE_NAME);
}

export function buildpackTomlPath(buildpackDir: string): string {
  return path.join(buildpackDir, "buildpack.toml");
}

export function platformEnvDir(platformDir: string): string {
  return path.join(platformDir, "env");
}
