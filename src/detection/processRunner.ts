import execa from "execa";

export interface ProcessResult {
  /** `null` when the process was terminated by a signal. */
  exitCode: number | null;
  signal?: string;
}

export interface ProcessRunner {
  run(command: string, args: string[], options?: { cwd?: string }): Promise<ProcessResult>;
}

/** Runs the command with the build's own stdio so detector output reaches the build log. */
export class ExecaProcessRunner implements ProcessRunner {
  async run(command: string, args: string[], options: { cwd?: string } = {}): Promise<ProcessResult> {
    const result = await execa(command, args, {
      cwd: options.cwd,
      stdio: "inherit",
      reject: false
    });

    if (result.signal) {
      return { exitCode: null, signal: result.signal };
    }
    if (Number.isInteger(result.exitCode)) {
      return { exitCode: result.exitCode };
    }
    const reason = "shortMessage" in result && typeof result.shortMessage === "string" ? result.shortMessage : "";
    throw new Error(reason ? `Failed to start ${command}: ${reason}` : `Failed to start ${command}`, {
      cause: result
    });
  }
}
