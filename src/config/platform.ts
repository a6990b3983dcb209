import path from "path";
import { platformEnvDir } from "../io/paths";
import { listFiles, readText } from "../utils/fs";

export const DEBUG_ENV_VAR = "HEROKU_BUILDPACK_DEBUG";

export type PlatformEnv = Readonly<Record<string, string>>;

/**
 * Reads the variables the platform hands over as files under `<platform>/env/`,
 * one file per variable with the value as its content.
 */
export async function readPlatformEnv(platformDir: string): Promise<PlatformEnv> {
  const envDir = platformEnvDir(platformDir);
  const env: Record<string, string> = {};
  for (const name of await listFiles(envDir)) {
    env[name] = await readText(path.join(envDir, name));
  }
  return env;
}

export function isDebugEnabled(processEnv: NodeJS.ProcessEnv, platformEnv: PlatformEnv): boolean {
  return processEnv[DEBUG_ENV_VAR] !== undefined || platformEnv[DEBUG_ENV_VAR] !== undefined;
}
