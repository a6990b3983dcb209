#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { runBuild } from "../commands/build";
import { PhaseFailure } from "../errors/buildErrors";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.FUNCTION_BUILDPACK_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

function requireBuildpackDir(value: string | undefined): string {
  const dir = value ?? process.env.CNB_BUILDPACK_DIR;
  if (!dir) {
    throw new Error("CNB_BUILDPACK_DIR is not set in the environment and --buildpack-dir was not given.");
  }
  return dir;
}

const program = new Command();

program
  .name("function-runtime-build")
  .description("Build phase of the JVM function runtime buildpack")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides FUNCTION_BUILDPACK_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("build")
  .description("Install the function runtime, detect the function and write launch.toml")
  .argument("<layers>", "Layers directory")
  .argument("<platform>", "Platform directory")
  .argument("[plan]", "Buildpack plan (unused)")
  .option("--app-dir <path>", "Application directory", process.cwd())
  .option("--buildpack-dir <path>", "Buildpack directory containing buildpack.toml (defaults to CNB_BUILDPACK_DIR)")
  .option("--verify-integrity", "Verify the runtime SHA-256 regardless of buildpack.toml")
  .action(async (layers: string, platform: string, _plan: string | undefined, opts) => {
    await runBuild({
      layersDir: layers,
      platformDir: platform,
      appDir: opts.appDir,
      buildpackDir: requireBuildpackDir(opts.buildpackDir),
      verifyIntegrity: opts.verifyIntegrity === true ? true : undefined
    });
  });

program.parseAsync().catch((error) => {
  // Build failures have already been printed by the logger.
  if (!(error instanceof PhaseFailure)) {
    console.error(error instanceof Error ? error.message : error);
  }
  process.exitCode = 1;
});
