import { z } from "zod";

const claimsSchema = z
  .object({
    exp: z.number().optional(),
    iat: z.number().optional(),
    sub: z.string().optional(),
    user_id: z.string().optional(),
  })
  .passthrough();

export type JwtClaims = z.infer<typeof claimsSchema>;

/**
 * Decode the payload segment of a JWT without verifying its signature
 */
export function decodeJwtClaims(token: string): JwtClaims | undefined {
  const segments = token.split(".");
  if (segments.length !== 3 || !segments[1]) {
    return undefined;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(Buffer.from(segments[1], "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }

  const result = claimsSchema.safeParse(payload);
  return result.success ? result.data : undefined;
}

/**
 * Expiry and issue time (epoch ms) taken from the token's own claims
 */
export function readTokenLifetime(token: string): { expiresAt: number; issuedAt?: number } | undefined {
  const claims = decodeJwtClaims(token);
  if (claims?.exp === undefined) {
    return undefined;
  }

  return {
    expiresAt: claims.exp * 1000,
    issuedAt: claims.iat === undefined ? undefined : claims.iat * 1000,
  };
}
