import { ConfigType, registerAs } from "@nestjs/config";
import { readInteger, readString } from "./env.parsers";
import { JWT_ALGORITHMS, JwtAlgorithm } from "./env.validation";

function readAlgorithm(): JwtAlgorithm {
  const value = readString("JWT_ALGORITHM", "HS256");
  return JWT_ALGORITHMS.find((algorithm) => algorithm === value) ?? "HS256";
}

/**
 * Token and password hashing settings. The secret fallback only applies in
 * development and test, where env validation lets JWT_SECRET be omitted.
 */
export const authConfig = registerAs("auth", () => ({
  jwtSecret: readString("JWT_SECRET", "development-only-secret"),
  jwtAlgorithm: readAlgorithm(),
  accessTokenExpireMinutes: readInteger("ACCESS_TOKEN_EXPIRE_MINUTES", 30),
  bcryptRounds: readInteger("BCRYPT_ROUNDS", 12),
}));

export type AuthConfig = ConfigType<typeof authConfig>;
