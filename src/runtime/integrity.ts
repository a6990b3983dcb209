import { sha256 } from "../utils/hash";

export interface FingerprintCheck {
  matches: boolean;
  actual: string;
}

export function fingerprint(bytes: Uint8Array): string {
  return sha256(bytes);
}

export function normalizeFingerprint(value: string): string {
  return value.trim().toLowerCase();
}

export function checkFingerprint(bytes: Uint8Array, expected: string): FingerprintCheck {
  const actual = fingerprint(bytes);
  return { matches: actual === normalizeFingerprint(expected), actual };
}
