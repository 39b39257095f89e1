import { createHash } from "node:crypto";

/**
 * Collects every scalar leaf of a nested structure, depth first, ignoring
 * the keys and nesting that held them.
 */
export function extractParams(params: unknown): unknown[] {
  if (Array.isArray(params)) {
    return params.flatMap((value) => extractParams(value));
  }
  if (typeof params === "object" && params !== null) {
    return Object.values(params).flatMap((value) => extractParams(value));
  }
  return [params];
}

/** The shared secret followed by the sorted leaf values, unhashed. */
export function getSignatureString(params: unknown, secret: string): string {
  const values = extractParams(params).map((value) => String(value));
  // Plain string ordering: "10" sorts before "9"
  values.sort();
  return secret + values.join("");
}

export function getSignatureHash(params: unknown, secret: string): string {
  return createHash("md5")
    .update(getSignatureString(params, secret), "utf8")
    .digest("hex");
}
