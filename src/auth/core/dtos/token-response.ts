import { IssuedToken } from "@auth/core/domain";

export interface TokenResponse {
  access_token: string;
  token_type: "bearer";
  expires_in: number;
}

export function toTokenResponse(issued: IssuedToken): TokenResponse {
  return {
    access_token: issued.token,
    token_type: "bearer",
    expires_in: issued.expiresIn,
  };
}
