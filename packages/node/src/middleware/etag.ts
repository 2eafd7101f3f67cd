/**
 * ETag support for report responses.
 *
 * The tag is derived from the canonical JSON fingerprint of the report,
 * so the same books and parameters always produce the same tag and a
 * client holding it gets 304 Not Modified.
 */

import type { Context } from "hono";
import { reportFingerprint } from "@ledgerview/reports";
import type { AppEnv, DataEnvelope } from "../types/api-contract.js";

/**
 * Compute a strong ETag for a report.
 */
export function computeETag(report: unknown): string {
  return `"${reportFingerprint(report).slice(0, 16)}"`;
}

/**
 * Whether an If-None-Match header matches the current tag.
 * Weak comparison: a `W/` prefix on the client's tag is ignored.
 */
export function matchesIfNoneMatch(header: string | undefined, etag: string): boolean {
  if (header === undefined) {
    return false;
  }
  return header
    .split(",")
    .map((tag) => tag.trim().replace(/^W\//, ""))
    .some((tag) => tag === "*" || tag === etag);
}

/**
 * Send a report as `{ data }` with its ETag, or 304 when the client's
 * copy is current.
 */
export function respondWithReport(c: Context<AppEnv>, report: object): Response {
  const etag = computeETag(report);
  c.header("ETag", etag);

  if (matchesIfNoneMatch(c.req.header("If-None-Match"), etag)) {
    return c.body(null, 304);
  }

  const body: DataEnvelope<object> = { data: report };
  return c.json(body);
}
