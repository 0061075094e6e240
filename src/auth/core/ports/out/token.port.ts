import { IssuedToken, TokenClaims } from "@auth/core/domain";

export abstract class TokenPort {
  abstract issue(subject: string): IssuedToken;

  /**
   * Claims of a well-signed, unexpired token; null otherwise.
   */
  abstract verify(token: string): TokenClaims | null;
}
