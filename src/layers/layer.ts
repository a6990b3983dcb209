export type LayerMetadataValue = string | number | boolean;

export type LayerMetadata = Readonly<Record<string, LayerMetadataValue>>;

/**
 * Which phases see a layer: `launch` exposes it to the running app, `build`
 * to later buildpacks, `cache` keeps it for the next build.
 */
export type LayerTypes = Readonly<{
  launch: boolean;
  build: boolean;
  cache: boolean;
}>;

export interface Layer {
  readonly name: string;
  readonly path: string;
  readonly types: LayerTypes;
  readonly metadata: LayerMetadata;
}

export interface LayerContent {
  types: LayerTypes;
  metadata: LayerMetadata;
}

export interface LayerStore {
  /** Looks the layer up, creating its directory when it does not exist yet. */
  getLayer(name: string): Promise<Layer>;
  readMetadata(name: string): Promise<LayerContent>;
  writeMetadata(name: string, content: LayerContent): Promise<Layer>;
}

export const NO_LAYER_TYPES: LayerTypes = Object.freeze({ launch: false, build: false, cache: false });

export function layerTypes(types: { launch: boolean; build: boolean; cache: boolean }): LayerTypes {
  return Object.freeze({ launch: types.launch, build: types.build, cache: types.cache });
}

export function metadataString(metadata: LayerMetadata, key: string): string {
  const value = metadata[key];
  return typeof value === "string" ? value : "";
}
