/**
 * Report fingerprint: SHA-256 over RFC 8785 canonical JSON, so two
 * identical reports hash identically regardless of key order.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";

export function reportFingerprint(report: unknown): string {
  return createHash("sha256").update(canonicalize(report)).digest("hex");
}
