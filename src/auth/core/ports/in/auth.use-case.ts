import { RequestOrigin } from "@audit/core/domain";
import { IssuedToken } from "@auth/core/domain";
import { LoginDto, RegisterDto } from "@auth/core/dtos";
import { User } from "@users/core/domain";

export abstract class AuthUseCase {
  /**
   * Create an account. Rejects with 400 when the email or username is taken.
   */
  abstract register(input: RegisterDto, origin: RequestOrigin): Promise<User>;

  /**
   * Exchange credentials for an access token. Rejects with 401 for an
   * unknown or inactive account and for a wrong password alike.
   */
  abstract login(input: LoginDto, origin: RequestOrigin): Promise<IssuedToken>;
}
