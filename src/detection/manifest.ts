import * as TOML from "@iarna/toml";
import { ManifestParseError, errorMessage } from "../errors/buildErrors";
import { FunctionBundleTomlSchema, UnitManifest } from "../types/functionBundle";
import { pathExists, readText } from "../utils/fs";

export function parseFunctionBundle(content: string, manifestPath: string): UnitManifest {
  let document: TOML.JsonMap;
  try {
    document = TOML.parse(content);
  } catch (error) {
    throw new ManifestParseError(manifestPath, `Invalid TOML: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = FunctionBundleTomlSchema.safeParse(document);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ManifestParseError(manifestPath, `Unexpected content: ${problems}`);
  }

  const fn = parsed.data.function;
  return {
    className: fn.class,
    payloadType: fn.payload_class,
    payloadMediaType: fn.payload_media_type,
    returnType: fn.return_class,
    returnMediaType: fn.return_media_type
  };
}

export async function readFunctionBundle(manifestPath: string): Promise<UnitManifest> {
  if (!(await pathExists(manifestPath))) {
    throw new ManifestParseError(manifestPath, "The file does not exist.");
  }
  let content: string;
  try {
    content = await readText(manifestPath);
  } catch (error) {
    throw new ManifestParseError(manifestPath, `The file could not be read: ${errorMessage(error)}`, { cause: error });
  }
  return parseFunctionBundle(content, manifestPath);
}
