import { timingSafeEqual } from "node:crypto";
import type { RequestHandler } from "express";
import { makeGatewayError } from "../errors.js";

export const API_KEY_HEADER = "x-api-key";

function sameKey(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function isAcceptedKey(given: string | undefined, keys: readonly string[]): boolean {
  if (!given) {
    return false;
  }
  // Compare against every key so the match position does not show in timing.
  let accepted = false;
  for (const key of keys) {
    accepted = sameKey(given, key) || accepted;
  }
  return accepted;
}

/**
 * Rejects requests whose `x-api-key` header is missing or not configured.
 */
export function requireApiKey(keys: readonly string[]): RequestHandler {
  return (req, _res, next) => {
    if (isAcceptedKey(req.header(API_KEY_HEADER), keys)) {
      next();
      return;
    }
    next(makeGatewayError("unauthorized", `Missing or invalid ${API_KEY_HEADER} header`));
  };
}
