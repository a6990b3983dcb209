import { describe, expect, it } from "vitest";
import { PhaseFailure } from "../src/errors/buildErrors";
import { recordingLogger } from "./helpers";

describe("BuildLogger", () => {
  it("formats headers, info and warnings on stdout", () => {
    const { logger, stdout, stderr } = recordingLogger();
    logger.header("Installing Java function runtime");
    logger.info("Starting download of function runtime");
    logger.warning("Heads up", "\nSomething to know.\n");

    expect(stdout).toEqual([
      "\n[Installing Java function runtime]",
      "[INFO] Starting download of function runtime",
      "\n[WARNING: Heads up]",
      "Something to know."
    ]);
    expect(stderr).toEqual([]);
  });

  it("only prints debug lines when enabled", () => {
    const quiet = recordingLogger(false);
    quiet.logger.debug("hidden");
    expect(quiet.stdout).toEqual([]);

    const verbose = recordingLogger(true);
    verbose.logger.debug("shown");
    expect(verbose.stdout).toEqual(["[DEBUG] shown"]);
  });

  it("prints errors on stderr and returns a failure titled after them", () => {
    const { logger, stdout, stderr } = recordingLogger();

    const failure = logger.error("Multiple functions found", "Only one function is supported.\n");

    expect(failure).toBeInstanceOf(PhaseFailure);
    expect(failure.message).toBe("Multiple functions found");
    expect(stderr).toEqual(["\n[ERROR: Multiple functions found]", "Only one function is supported."]);
    expect(stdout).toEqual([]);
  });
});
