// backend/services/catalog/src/handlers/oauth/issueToken.ts
/**
 * Purpose:
 * - Client-credentials grant against a fixed client registry. Tokens are
 *   opaque and not stored; this endpoint exists to exercise form + Basic
 *   credential binding.
 */

import { randomBytes, timingSafeEqual } from "node:crypto";
import { HttpError } from "@reqbind/shared/http/errors";
import type { TokenRequest } from "../../requests/token.request";

export const TOKEN_TTL_SECONDS = 3600;

export type TokenResponse = {
  access_token: string;
  token_type: "Bearer";
  expires_in: number;
  scope?: string;
};

export type ClientRegistry = ReadonlyMap<string, string>;

function secretMatches(expected: string, given: string): boolean {
  const a = Buffer.from(expected, "utf8");
  const b = Buffer.from(given, "utf8");
  return a.length === b.length && timingSafeEqual(a, b);
}

export function makeIssueToken(clients: ClientRegistry) {
  return (req: TokenRequest): TokenResponse => {
    const expected = clients.get(req.clientId);
    if (expected === undefined || !secretMatches(expected, req.clientSecret)) {
      throw HttpError.unauthorized("invalid client credentials");
    }
    const res: TokenResponse = {
      access_token: randomBytes(24).toString("base64url"),
      token_type: "Bearer",
      expires_in: TOKEN_TTL_SECONDS,
    };
    if (req.scope) res.scope = req.scope;
    return res;
  };
}
