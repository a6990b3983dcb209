import { createHash } from "crypto";

export function sha256(content: string | Buffer | Uint8Array): string {
  return createHash("sha256").update(content).digest("hex");
}
