import { PhaseFailure } from "../errors/buildErrors";

export type LineSink = (line: string) => void;

export interface Logger {
  header(message: string): void;
  info(message: string): void;
  debug(message: string): void;
  warning(title: string, body: string): void;
  /** Prints the failure and returns the error the caller must throw. */
  error(title: string, body: string): PhaseFailure;
}

export interface BuildLoggerOptions {
  debug?: boolean;
  stdout?: LineSink;
  stderr?: LineSink;
}

export class BuildLogger implements Logger {
  readonly debugEnabled: boolean;
  private stdout: LineSink;
  private stderr: LineSink;

  constructor(options: BuildLoggerOptions = {}) {
    this.debugEnabled = options.debug ?? false;
    this.stdout = options.stdout ?? ((line) => console.log(line));
    this.stderr = options.stderr ?? ((line) => console.error(line));
  }

  header(message: string): void {
    this.stdout(`\n[${message}]`);
  }

  info(message: string): void {
    this.stdout(`[INFO] ${message}`);
  }

  debug(message: string): void {
    if (!this.debugEnabled) return;
    this.stdout(`[DEBUG] ${message}`);
  }

  warning(title: string, body: string): void {
    this.stdout(`\n[WARNING: ${title}]`);
    this.stdout(body.trim());
  }

  error(title: string, body: string): PhaseFailure {
    this.stderr(`\n[ERROR: ${title}]`);
    this.stderr(body.trim());
    return new PhaseFailure(title);
  }
}
