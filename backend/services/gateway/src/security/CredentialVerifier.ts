// backend/services/gateway/src/security/CredentialVerifier.ts
/**
 * Local bearer verification over a fixed HMAC key.
 *
 * - HS256/HS384/HS512 only; the key is the decoded JWT_SECRET.
 * - The identity claim (default `sub`) must be a non-blank string.
 * - No caching and no side effects: every call re-verifies.
 *
 * Callers collapse every failure kind into one "unauthorized" outcome; the
 * kind exists for diagnostics only.
 */

import jwt, {
  type Algorithm,
  type JwtPayload,
  JsonWebTokenError,
  NotBeforeError,
  TokenExpiredError,
} from "jsonwebtoken";

export type VerificationError = "Expired" | "Malformed" | "EmptyIdentity";

export type VerifyResult =
  | { ok: true; identity: string; claims: JwtPayload }
  | { ok: false; error: VerificationError; message: string };

export type CredentialVerifierOptions = {
  key: Buffer;
  identityClaim?: string;
  issuer?: string;
  audience?: string;
  clockToleranceSec?: number;
};

export interface ICredentialVerifier {
  verify(token: string): VerifyResult;
}

const ALGORITHMS: Algorithm[] = ["HS256", "HS384", "HS512"];

export class CredentialVerifier implements ICredentialVerifier {
  private readonly identityClaim: string;

  constructor(private readonly opts: CredentialVerifierOptions) {
    this.identityClaim = opts.identityClaim || "sub";
  }

  public verify(token: string): VerifyResult {
    if (!token || !token.trim()) {
      return { ok: false, error: "Malformed", message: "empty credential" };
    }

    let payload: JwtPayload | string;
    try {
      payload = jwt.verify(token, this.opts.key, {
        algorithms: ALGORITHMS,
        issuer: this.opts.issuer,
        audience: this.opts.audience,
        clockTolerance: this.opts.clockToleranceSec ?? 0,
      });
    } catch (err) {
      // TokenExpiredError extends JsonWebTokenError: check it first.
      if (err instanceof TokenExpiredError) {
        return { ok: false, error: "Expired", message: err.message };
      }
      if (err instanceof NotBeforeError || err instanceof JsonWebTokenError) {
        return { ok: false, error: "Malformed", message: err.message };
      }
      return {
        ok: false,
        error: "Malformed",
        message: err instanceof Error ? err.message : String(err),
      };
    }

    if (typeof payload === "string") {
      return { ok: false, error: "EmptyIdentity", message: "string payload" };
    }

    const claim: unknown = payload[this.identityClaim];
    if (typeof claim !== "string" || !claim.trim()) {
      return {
        ok: false,
        error: "EmptyIdentity",
        message: `claim "${this.identityClaim}" missing or blank`,
      };
    }

    return { ok: true, identity: claim.trim(), claims: payload };
  }
}
