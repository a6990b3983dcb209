import { promises as fs } from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { DEBUG_ENV_VAR, isDebugEnabled, readPlatformEnv } from "../src/config/platform";
import { makeTempDir } from "./helpers";

describe("readPlatformEnv", () => {
  it("reads one variable per file", async () => {
    const platformDir = await makeTempDir("fn-platform-");
    await fs.mkdir(path.join(platformDir, "env"));
    await fs.writeFile(path.join(platformDir, "env", "JAVA_TOOL_OPTIONS"), "-Xmx512m", "utf8");
    await fs.writeFile(path.join(platformDir, "env", DEBUG_ENV_VAR), "", "utf8");

    expect(await readPlatformEnv(platformDir)).toEqual({ JAVA_TOOL_OPTIONS: "-Xmx512m", [DEBUG_ENV_VAR]: "" });
  });

  it("returns nothing when there is no env directory", async () => {
    expect(await readPlatformEnv(await makeTempDir())).toEqual({});
  });
});

describe("isDebugEnabled", () => {
  it("is enabled when the variable is present in either environment", () => {
    expect(isDebugEnabled({ [DEBUG_ENV_VAR]: "" }, {})).toBe(true);
    expect(isDebugEnabled({}, { [DEBUG_ENV_VAR]: "1" })).toBe(true);
    expect(isDebugEnabled({}, {})).toBe(false);
  });
});
