import type { DetectionFailure } from "../detection/exitCodes";

/**
 * Base class for failures that end the build phase with a message meant for
 * the person running the build. `title` is the one-line summary, `detail`
 * the remediation text printed under it.
 */
export abstract class BuildError extends Error {
  readonly title: string;
  readonly detail: string;

  protected constructor(title: string, detail: string, options?: { cause?: unknown }) {
    super(title, options);
    this.name = new.target.name;
    this.title = title;
    this.detail = detail;
  }
}

export class ConfigError extends BuildError {
  constructor(message: string) {
    super("Invalid buildpack configuration", message);
  }
}

export class FetchError extends BuildError {
  readonly url: string;

  constructor(url: string, reason: string, options?: { cause?: unknown }) {
    super(
      "Download of function runtime failed",
      [
        `We couldn't download the function runtime at ${url}.`,
        "",
        "This is usually caused by intermittent network issues. Please try again and contact us should the error persist.",
        "",
        `Reason: ${reason}`
      ].join("\n"),
      options
    );
    this.url = url;
  }
}

export class IntegrityError extends BuildError {
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string) {
    super(
      "Function runtime integrity check failed",
      [
        "We could not verify the integrity of the downloaded function runtime.",
        "Please try again and contact us should the error persist.",
        "",
        `Expected SHA-256: ${expected}`,
        `Actual SHA-256:   ${actual}`
      ].join("\n")
    );
    this.expected = expected;
    this.actual = actual;
  }
}

function describeDetectionFailure(failure: DetectionFailure): { title: string; detail: string } {
  switch (failure.kind) {
    case "no-unit-found":
      return {
        title: "No functions found",
        detail: [
          "Your project does not seem to contain any Java functions.",
          "The output above might contain information about issues with your function."
        ].join("\n")
      };
    case "multiple-units-found":
      return {
        title: "Multiple functions found",
        detail: [
          "Your project contains multiple Java functions.",
          "Currently, only projects that contain exactly one (1) function are supported."
        ].join("\n")
      };
    case "internal":
      return {
        title: "Detection failed",
        detail: `Function detection failed with internal error "${failure.code}"`
      };
    case "unexpected":
      return {
        title: "Detection failed",
        detail: [
          failure.code === null
            ? "Function detection was terminated before it reported an exit code."
            : `Function detection failed with unexpected error code ${failure.code}.`,
          "The output above might contain hints what caused this error to happen."
        ].join("\n")
      };
  }
}

export class DetectError extends BuildError {
  readonly failure: DetectionFailure;

  constructor(failure: DetectionFailure) {
    const { title, detail } = describeDetectionFailure(failure);
    super(title, detail);
    this.failure = failure;
  }
}

export class ManifestParseError extends BuildError {
  readonly manifestPath: string;

  constructor(manifestPath: string, reason: string, options?: { cause?: unknown }) {
    super(
      "Function bundle could not be read",
      [
        `The function detector reported success, but ${manifestPath} could not be read.`,
        reason
      ].join("\n"),
      options
    );
    this.manifestPath = manifestPath;
  }
}

/** The single failure a build phase ends with once a `BuildError` has been rendered. */
export class PhaseFailure extends Error {
  constructor(title: string, options?: { cause?: unknown }) {
    super(title, options);
    this.name = "PhaseFailure";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
