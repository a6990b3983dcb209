import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach } from "vitest";
import { ProcessResult, ProcessRunner } from "../src/detection/processRunner";
import { BuildLogger } from "../src/log/logger";

const tempDirs: string[] = [];

afterEach(async () => {
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) await fs.rm(dir, { recursive: true, force: true });
  }
});

export async function makeTempDir(prefix = "fn-build-"): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export interface RecordingLogger {
  logger: BuildLogger;
  stdout: string[];
  stderr: string[];
}

export function recordingLogger(debug = false): RecordingLogger {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const logger = new BuildLogger({
    debug,
    stdout: (line) => stdout.push(line),
    stderr: (line) => stderr.push(line)
  });
  return { logger, stdout, stderr };
}

export interface RecordedRun {
  command: string;
  args: string[];
  cwd?: string;
}

/** Stands in for the detector: records the call and optionally writes the bundle file. */
export class FakeDetector implements ProcessRunner {
  readonly runs: RecordedRun[] = [];

  constructor(
    private readonly exitCode: number | null,
    private readonly bundleToml?: string
  ) {}

  async run(command: string, args: string[], options: { cwd?: string } = {}): Promise<ProcessResult> {
    this.runs.push({ command, args, cwd: options.cwd });
    const layerPath = args[args.length - 1];
    if (this.bundleToml !== undefined && layerPath) {
      await fs.writeFile(path.join(layerPath, "function-bundle.toml"), this.bundleToml, "utf8");
    }
    return this.exitCode === null ? { exitCode: null, signal: "SIGKILL" } : { exitCode: this.exitCode };
  }
}

export const SAMPLE_BUNDLE_TOML = [
  "[function]",
  'class = "com.example.HelloFunction"',
  'payload_class = "java.lang.String"',
  'payload_media_type = "application/json"',
  'return_class = "com.example.Greeting"',
  'return_media_type = "application/json"',
  ""
].join("\n");
