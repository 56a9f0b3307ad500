/** JWT helpers: access tokens are issued by the identity service; here we verify them (and mint dev ones). */
import { randomUUID } from "crypto";

import jwt, { type SignOptions } from "jsonwebtoken";
import { z } from "zod";

import { env } from "../../config/env.js";
import { ROLES, type Role } from "../../domain/enums.js";

const AccessClaimsSchema = z.object({
  sub: z.string().min(1), // user id
  role: z.enum(ROLES),
  type: z.literal("access"),
  jti: z.string().min(1),
});

export type AccessClaims = z.infer<typeof AccessClaimsSchema>;

export class InvalidTokenError extends Error {
  readonly code = "INVALID_TOKEN";

  constructor(message: string) {
    super(message);
    this.name = "InvalidTokenError";
  }
}

export function newJti(): string {
  return randomUUID();
}

export function signAccessToken(input: { sub: string; role: Role; jti?: string }): string {
  const opts: SignOptions = {
    algorithm: "HS256",
    expiresIn: env.JWT_ACCESS_TTL, // seconds
    issuer: env.JWT_ISS,
    audience: env.JWT_AUD,
    jwtid: input.jti ?? newJti(),
  };
  return jwt.sign({ sub: input.sub, role: input.role, type: "access" }, env.JWT_SECRET, opts);
}

/** Enforces alg/iss/aud/exp, then the claim shape. */
export function verifyAccess(token: string): AccessClaims {
  const decoded = jwt.verify(token, env.JWT_SECRET, {
    algorithms: ["HS256"],
    issuer: env.JWT_ISS,
    audience: env.JWT_AUD,
  });
  const claims = AccessClaimsSchema.safeParse(decoded);
  if (!claims.success) throw new InvalidTokenError("Invalid token claims");
  return claims.data;
}
