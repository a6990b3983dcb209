import * as TOML from "@iarna/toml";
import { launchTomlPath } from "../io/paths";
import { LaunchDescriptor } from "../types/launch";
import { writeText } from "../utils/fs";

const PROCESS_TYPE_PATTERN = /^[A-Za-z0-9._-]+$/;

export function assertProcessType(processType: string): void {
  if (!PROCESS_TYPE_PATTERN.test(processType)) {
    throw new Error(`Invalid process type: "${processType}"`);
  }
}

export function renderLaunchToml(processes: LaunchDescriptor[]): string {
  const seen = new Set<string>();
  for (const process of processes) {
    assertProcessType(process.processType);
    if (seen.has(process.processType)) {
      throw new Error(`Duplicate process type: "${process.processType}"`);
    }
    seen.add(process.processType);
  }

  return TOML.stringify({
    processes: processes.map((process) => ({
      type: process.processType,
      command: process.command,
      args: process.args,
      direct: false,
      default: process.isDefault
    }))
  });
}

export async function writeLaunchToml(layersDir: string, processes: LaunchDescriptor[]): Promise<string> {
  const filePath = launchTomlPath(layersDir);
  await writeText(filePath, renderLaunchToml(processes));
  return filePath;
}
