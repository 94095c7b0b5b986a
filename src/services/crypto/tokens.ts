// =============================================================================
// WARDEN — Token Signing
//
// Signs and decodes JWTs with a membership secret. Expiry is stamped from
// the injected clock and is NOT enforced by tryDecode: callers compare
// validTo against their own clock, so a token with a valid signature but an
// elapsed lifetime can be reported as expired rather than invalid.
// =============================================================================

import jwt from 'jsonwebtoken';
import { config } from '../../config';

export type TokenClaims = Record<string, string | number>;

export interface DecodedToken {
  claims: TokenClaims;
  validTo: Date;
}

export interface TokenServiceOptions {
  clock?: () => Date;
  algorithm?: jwt.Algorithm;
}

export class TokenService {
  private readonly clock: () => Date;
  private readonly algorithm: jwt.Algorithm;

  constructor(options: TokenServiceOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.algorithm = options.algorithm ?? config.tokens.algorithm;
  }

  generate(claims: TokenClaims, secret: string, lifetimeSeconds: number): string {
    const iat = Math.floor(this.clock().getTime() / 1000);
    return jwt.sign({ ...claims, iat, exp: iat + lifetimeSeconds }, secret, { algorithm: this.algorithm });
  }

  /** Verified claims and expiry, or false when the token can not be decoded */
  tryDecode(token: string, secret: string): DecodedToken | false {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, secret, { algorithms: [this.algorithm], ignoreExpiration: true });
    } catch {
      return false;
    }

    if (typeof payload === 'string' || typeof payload.exp !== 'number') {
      return false;
    }

    const claims: TokenClaims = {};
    for (const [key, value] of Object.entries(payload)) {
      if (typeof value === 'string' || typeof value === 'number') claims[key] = value;
    }
    return { claims, validTo: new Date(payload.exp * 1000) };
  }
}
