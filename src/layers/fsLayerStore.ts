import * as TOML from "@iarna/toml";
import { z } from "zod";
import { layerDir, layerMetadataPath } from "../io/paths";
import { ensureDir, pathExists, readText, writeText } from "../utils/fs";
import { Layer, LayerContent, LayerStore, NO_LAYER_TYPES, layerTypes } from "./layer";

const LayerTomlSchema = z.object({
  launch: z.boolean().default(false),
  build: z.boolean().default(false),
  cache: z.boolean().default(false),
  metadata: z.record(z.union([z.string(), z.number(), z.boolean()])).default({})
});

const LAYER_NAME_PATTERN = /^[A-Za-z0-9._-]+$/;

function assertLayerName(name: string): void {
  if (!LAYER_NAME_PATTERN.test(name) || name === "." || name === "..") {
    throw new Error(`Invalid layer name: ${name}`);
  }
}

/**
 * Layers as the buildpack platform lays them out: `<layers>/<name>/` holds the
 * content and `<layers>/<name>.toml` the types and metadata.
 */
export class FsLayerStore implements LayerStore {
  constructor(private readonly layersDir: string) {}

  async getLayer(name: string): Promise<Layer> {
    assertLayerName(name);
    const dir = layerDir(this.layersDir, name);
    await ensureDir(dir);
    const content = await this.readMetadata(name);
    return { name, path: dir, ...content };
  }

  async readMetadata(name: string): Promise<LayerContent> {
    assertLayerName(name);
    const filePath = layerMetadataPath(this.layersDir, name);
    if (!(await pathExists(filePath))) {
      return { types: NO_LAYER_TYPES, metadata: {} };
    }

    const parsed = LayerTomlSchema.safeParse(TOML.parse(await readText(filePath)));
    if (!parsed.success) {
      throw new Error(`Layer metadata ${filePath} is invalid: ${parsed.error.message}`);
    }
    const { launch, build, cache, metadata } = parsed.data;
    return { types: layerTypes({ launch, build, cache }), metadata };
  }

  async writeMetadata(name: string, content: LayerContent): Promise<Layer> {
    assertLayerName(name);
    const dir = layerDir(this.layersDir, name);
    await ensureDir(dir);

    const document = {
      launch: content.types.launch,
      build: content.types.build,
      cache: content.types.cache,
      metadata: { ...content.metadata }
    };
    await writeText(layerMetadataPath(this.layersDir, name), TOML.stringify(document));

    return { name, path: dir, types: layerTypes(content.types), metadata: { ...content.metadata } };
  }
}
