import { promises as fs } from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { parseFunctionBundle, readFunctionBundle } from "../src/detection/manifest";
import { ManifestParseError } from "../src/errors/buildErrors";
import { SAMPLE_BUNDLE_TOML, makeTempDir } from "./helpers";

const MANIFEST_PATH = "/layers/function-bundle/function-bundle.toml";

describe("parseFunctionBundle", () => {
  it("maps the function table", () => {
    expect(parseFunctionBundle(SAMPLE_BUNDLE_TOML, MANIFEST_PATH)).toEqual({
      className: "com.example.HelloFunction",
      payloadType: "java.lang.String",
      payloadMediaType: "application/json",
      returnType: "com.example.Greeting",
      returnMediaType: "application/json"
    });
  });

  it("rejects invalid TOML", () => {
    expect(() => parseFunctionBundle("[function", MANIFEST_PATH)).toThrow(ManifestParseError);
  });

  it("names the missing field", () => {
    const content = SAMPLE_BUNDLE_TOML.replace('return_class = "com.example.Greeting"\n', "");
    try {
      parseFunctionBundle(content, MANIFEST_PATH);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ManifestParseError);
      if (!(error instanceof ManifestParseError)) return;
      expect(error.manifestPath).toBe(MANIFEST_PATH);
      expect(error.detail).toContain("function.return_class: Required");
    }
  });
});

describe("readFunctionBundle", () => {
  it("reports a missing file as a manifest error", async () => {
    const manifestPath = path.join(await makeTempDir(), "function-bundle.toml");
    await expect(readFunctionBundle(manifestPath)).rejects.toBeInstanceOf(ManifestParseError);
  });

  it("reports an unreadable file as a manifest error", async () => {
    const manifestPath = path.join(await makeTempDir(), "function-bundle.toml");
    await fs.mkdir(manifestPath);

    const error = await readFunctionBundle(manifestPath).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ManifestParseError);
    if (!(error instanceof ManifestParseError)) return;
    expect(error.detail).toContain("The file could not be read: ");
    expect(error.cause).toBeInstanceOf(Error);
  });
});
