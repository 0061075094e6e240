export interface IssuedToken {
  token: string;
  /** Lifetime in seconds */
  expiresIn: number;
}

export interface TokenClaims {
  sub: string;
  exp?: number;
}
