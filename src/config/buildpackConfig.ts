import * as TOML from "@iarna/toml";
import { z } from "zod";
import { ConfigError, errorMessage } from "../errors/buildErrors";
import { buildpackTomlPath } from "../io/paths";
import { pathExists, readText } from "../utils/fs";

const BuildpackInfoSchema = z.object({
  id: z.string(),
  version: z.string(),
  name: z.string().optional()
});

export const BuildpackTomlSchema = z
  .object({
    api: z.string().optional(),
    buildpack: BuildpackInfoSchema.optional(),
    metadata: z.record(z.unknown()).optional()
  })
  .passthrough();

export type BuildpackToml = z.infer<typeof BuildpackTomlSchema>;
export type BuildpackInfo = z.infer<typeof BuildpackInfoSchema>;

export interface RuntimeDescriptor {
  readonly url: string;
  readonly expectedFingerprint: string;
}

export interface BuildpackConfig {
  buildpack: BuildpackInfo | null;
  runtime: RuntimeDescriptor;
  verifyIntegrity: boolean;
}

/** Looks up a dotted key such as `metadata.runtime.url`; `undefined` when any segment is missing. */
export function lookupKey(document: unknown, dottedKey: string): unknown {
  let current: unknown = document;
  for (const segment of dottedKey.split(".")) {
    if (typeof current !== "object" || current === null || Array.isArray(current)) {
      return undefined;
    }
    if (!Object.hasOwn(current, segment)) return undefined;
    current = Reflect.get(current, segment);
  }
  return current;
}

function requireString(document: BuildpackToml, key: string): string {
  const value = lookupKey(document, key);
  if (value === undefined) {
    throw new ConfigError(`buildpack.toml does not have \`${key}\` key`);
  }
  if (typeof value !== "string") {
    throw new ConfigError(`buildpack.toml's \`${key}\` is not a string`);
  }
  if (value.trim() === "") {
    throw new ConfigError(`buildpack.toml's \`${key}\` is empty`);
  }
  return value;
}

function optionalBoolean(document: BuildpackToml, key: string, fallback: boolean): boolean {
  const value = lookupKey(document, key);
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") {
    throw new ConfigError(`buildpack.toml's \`${key}\` is not a boolean`);
  }
  return value;
}

export function readBuildpackConfig(document: unknown): BuildpackConfig {
  const parsed = BuildpackTomlSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigError(`buildpack.toml is malformed: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`);
  }
  const toml = parsed.data;

  const url = requireString(toml, "metadata.runtime.url");
  if (!z.string().url().safeParse(url).success) {
    throw new ConfigError(`buildpack.toml's \`metadata.runtime.url\` is not a valid URL: ${url}`);
  }
  const expectedFingerprint = requireString(toml, "metadata.runtime.sha256");

  return {
    buildpack: toml.buildpack ?? null,
    runtime: { url, expectedFingerprint },
    verifyIntegrity: optionalBoolean(toml, "metadata.runtime.verify_integrity", false)
  };
}

export async function loadBuildpackConfig(buildpackDir: string): Promise<BuildpackConfig> {
  const filePath = buildpackTomlPath(buildpackDir);
  if (!(await pathExists(filePath))) {
    throw new ConfigError(`buildpack.toml not found at ${filePath}`);
  }

  let document: TOML.JsonMap;
  try {
    document = TOML.parse(await readText(filePath));
  } catch (error) {
    throw new ConfigError(`buildpack.toml could not be parsed: ${errorMessage(error)}`);
  }
  return readBuildpackConfig(document);
}
