import { FetchError, errorMessage } from "../errors/buildErrors";
import { writeBinary } from "../utils/fs";

export type FetchImpl = (url: string) => Promise<Response>;

export interface FetchedArtifact {
  path: string;
  bytes: number;
  finalUrl: string;
}

export async function fetchArtifact(
  url: string,
  destinationPath: string,
  fetchImpl: FetchImpl = fetch
): Promise<FetchedArtifact> {
  let response: Response;
  try {
    response = await fetchImpl(url);
  } catch (error) {
    throw new FetchError(url, errorMessage(error), { cause: error });
  }

  if (!response.ok) {
    throw new FetchError(url, `HTTP ${response.status} ${response.statusText}`.trim());
  }

  let buffer: Buffer;
  try {
    buffer = Buffer.from(await response.arrayBuffer());
  } catch (error) {
    throw new FetchError(url, `reading response body failed: ${errorMessage(error)}`, { cause: error });
  }

  try {
    await writeBinary(destinationPath, buffer);
  } catch (error) {
    throw new FetchError(url, `writing ${destinationPath} failed: ${errorMessage(error)}`, { cause: error });
  }

  return { path: destinationPath, bytes: buffer.length, finalUrl: response.url || url };
}
