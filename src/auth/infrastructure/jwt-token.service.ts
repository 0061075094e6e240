import { Inject, Injectable } from "@nestjs/common";
import { JsonWebTokenError, JwtPayload, sign, verify } from "jsonwebtoken";
import { authConfig, AuthConfig } from "@config/auth.config";
import { IssuedToken, TokenClaims } from "@auth/core/domain";
import { TokenPort } from "@auth/core/ports/out/token.port";

@Injectable()
export class JwtTokenService extends TokenPort {
  constructor(@Inject(authConfig.KEY) private readonly config: AuthConfig) {
    super();
  }

  issue(subject: string): IssuedToken {
    const expiresIn = this.config.accessTokenExpireMinutes * 60;
    const token = sign({ sub: subject }, this.config.jwtSecret, {
      algorithm: this.config.jwtAlgorithm,
      expiresIn,
    });
    return { token, expiresIn };
  }

  verify(token: string): TokenClaims | null {
    let payload: string | JwtPayload;
    try {
      payload = verify(token, this.config.jwtSecret, {
        algorithms: [this.config.jwtAlgorithm],
      });
    } catch (error) {
      // covers expiry and bad signatures
      if (error instanceof JsonWebTokenError) return null;
      throw error;
    }

    if (typeof payload === "string" || typeof payload.sub !== "string") {
      return null;
    }
    return { sub: payload.sub, exp: payload.exp };
  }
}
