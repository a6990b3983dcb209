import path from "path";
import { loadBuildpackConfig } from "../config/buildpackConfig";
import { isDebugEnabled, readPlatformEnv } from "../config/platform";
import { detectFunction } from "../detection/invoker";
import { ExecaProcessRunner, ProcessRunner } from "../detection/processRunner";
import { BuildError } from "../errors/buildErrors";
import { assembleLaunch } from "../launch/assembler";
import { writeLaunchToml } from "../launch/launchToml";
import { FsLayerStore } from "../layers/fsLayerStore";
import { LayerStore } from "../layers/layer";
import { BuildLogger, Logger } from "../log/logger";
import { FetchImpl } from "../runtime/fetcher";
import { ensureRuntime } from "../runtime/provisioner";
import { LaunchDescriptor } from "../types/launch";
import { UnitManifest } from "../types/functionBundle";

export interface BuildOptions {
  layersDir: string;
  platformDir: string;
  appDir: string;
  buildpackDir: string;
  /** Overrides `metadata.runtime.verify_integrity` from buildpack.toml when set. */
  verifyIntegrity?: boolean;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  store?: LayerStore;
  runner?: ProcessRunner;
  fetchImpl?: FetchImpl;
}

export interface BuildResult {
  runtimeJarPath: string;
  runtimeFromCache: boolean;
  functionLayerPath: string;
  manifest: UnitManifest;
  launch: LaunchDescriptor;
  launchTomlPath: string;
}

export async function runBuild(options: BuildOptions): Promise<BuildResult> {
  const layersDir = path.resolve(options.layersDir);
  const appDir = path.resolve(options.appDir);
  const platformEnv = await readPlatformEnv(path.resolve(options.platformDir));
  const logger =
    options.logger ?? new BuildLogger({ debug: isDebugEnabled(options.env ?? process.env, platformEnv) });

  try {
    const config = await loadBuildpackConfig(path.resolve(options.buildpackDir));
    const store = options.store ?? new FsLayerStore(layersDir);
    if (config.buildpack) {
      logger.debug(`Buildpack ${config.buildpack.id} ${config.buildpack.version}`);
    }

    logger.header("Installing Java function runtime");
    const runtime = await ensureRuntime(store, config.runtime, {
      logger,
      verifyIntegrity: options.verifyIntegrity ?? config.verifyIntegrity,
      fetchImpl: options.fetchImpl
    });

    logger.header("Detecting function");
    const detected = await detectFunction(store, runtime.artifactPath, appDir, {
      logger,
      runner: options.runner ?? new ExecaProcessRunner()
    });

    const launch = assembleLaunch(runtime.artifactPath, detected.layer.path);
    const launchTomlPath = await writeLaunchToml(layersDir, [launch]);
    logger.debug(`Wrote ${launchTomlPath}`);

    return {
      runtimeJarPath: runtime.artifactPath,
      runtimeFromCache: runtime.fromCache,
      functionLayerPath: detected.layer.path,
      manifest: detected.manifest,
      launch,
      launchTomlPath
    };
  } catch (error) {
    if (error instanceof BuildError) {
      throw logger.error(error.title, error.detail);
    }
    throw error;
  }
}
