// Scam Honeypot - API Key Authentication
// Checks the `x-api-key` header on HTTP routes and at WebSocket upgrade.

import { createHash, timingSafeEqual } from "node:crypto";
import type { IncomingMessage } from "node:http";
import type { RequestHandler } from "express";

export const API_KEY_HEADER = "x-api-key";

/** Constant-time comparison. Both sides are hashed first so length differences do not leak. */
export function apiKeyMatches(expected: string, provided: string | null | undefined): boolean {
  if (typeof provided !== "string" || provided.length === 0) return false;
  const a = createHash("sha256").update(expected).digest();
  const b = createHash("sha256").update(provided).digest();
  return timingSafeEqual(a, b);
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export type ApiKeyCheck = { ok: true } | { ok: false; message: string };

export function checkApiKey(expected: string, provided: string | undefined): ApiKeyCheck {
  if (provided === undefined) return { ok: false, message: `Missing API key. Provide the '${API_KEY_HEADER}' header.` };
  if (!apiKeyMatches(expected, provided)) return { ok: false, message: "Invalid API key." };
  return { ok: true };
}

/** Express middleware answering 401 unless the request carries the expected key. */
export function requireApiKey(expected: string): RequestHandler {
  return (req, res, next) => {
    const check = checkApiKey(expected, headerValue(req.headers[API_KEY_HEADER]));
    if (!check.ok) {
      res.status(401).json({ status: "error", message: check.message });
      return;
    }
    next();
  };
}

/** Key for a WebSocket upgrade, taken from the header or the `apiKey` query parameter. */
export function upgradeApiKey(req: Pick<IncomingMessage, "url" | "headers">): string | null {
  const header = headerValue(req.headers[API_KEY_HEADER]);
  if (header) return header;
  const url = new URL(req.url ?? "/", "http://localhost");
  return url.searchParams.get("apiKey");
}
