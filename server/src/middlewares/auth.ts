import type { Request, Response, NextFunction } from "express";

import type { Role } from "../domain/enums.js";
import { verifyAccess } from "../modules/auth/tokens.js";
import { errorMessage } from "../utils/http.js";

export type AuthContext = { userId: string; role: Role; jti: string };

type Denied = { status: 401; code: "UNAUTHORIZED"; message: string };

/** Reads a Bearer header into an auth context, or says why not. */
export function authenticate(header: string | undefined): AuthContext | Denied {
  if (!header || !header.startsWith("Bearer ")) {
    return { status: 401, code: "UNAUTHORIZED", message: "Missing Bearer token" };
  }
  try {
    // verifyAccess enforces iss/aud/alg/exp and the claim shape
    const claims = verifyAccess(header.slice("Bearer ".length).trim());
    return { userId: claims.sub, role: claims.role, jti: claims.jti };
  } catch (err) {
    return { status: 401, code: "UNAUTHORIZED", message: errorMessage(err) || "Invalid token" };
  }
}

export function requireAuth(req: Request, res: Response, next: NextFunction) {
  const outcome = authenticate(req.get("authorization"));
  if ("status" in outcome) {
    return res.status(outcome.status).json({ error: { code: outcome.code, message: outcome.message } });
  }
  // res.locals keeps us from extending Request types
  res.locals.auth = outcome;
  next();
}

export function requireRole(...roles: Role[]) {
  return (_req: Request, res: Response, next: NextFunction) => {
    const auth = getAuth(res);
    if (!roles.includes(auth.role)) {
      return res.status(403).json({ error: { code: "FORBIDDEN", message: "Insufficient role" } });
    }
    next();
  };
}

function isAuthContext(v: unknown): v is AuthContext {
  return (
    typeof v === "object" &&
    v !== null &&
    "userId" in v &&
    typeof v.userId === "string" &&
    "role" in v &&
    (v.role === "client" || v.role === "seller")
  );
}

export function getAuth(res: Response): AuthContext {
  const ctx: unknown = res.locals.auth;
  if (!isAuthContext(ctx)) throw new Error("Auth context missing (requireAuth not applied)");
  return ctx;
}
