import { Inject, Injectable } from "@nestjs/common";
import { compare, hash } from "bcrypt";
import { authConfig, AuthConfig } from "@config/auth.config";
import { PasswordHasherPort } from "@auth/core/ports/out/password-hasher.port";

@Injectable()
export class BcryptPasswordHasher extends PasswordHasherPort {
  constructor(@Inject(authConfig.KEY) private readonly config: AuthConfig) {
    super();
  }

  hash(plain: string): Promise<string> {
    return hash(plain, this.config.bcryptRounds);
  }

  verify(plain: string, hashed: string): Promise<boolean> {
    return compare(plain, hashed);
  }
}
