import { Module } from "@nestjs/common";
import { AuditModule } from "@audit/audit.module";
import { AuthUseCase } from "@auth/core/ports/in/auth.use-case";
import { PasswordHasherPort } from "@auth/core/ports/out/password-hasher.port";
import { TokenPort } from "@auth/core/ports/out/token.port";
import { BcryptPasswordHasher } from "@auth/infrastructure/bcrypt-password.hasher";
import { JwtTokenService } from "@auth/infrastructure/jwt-token.service";
import { AuthController } from "@auth/presentation/auth.controller";
import { JwtAuthGuard } from "@auth/presentation/jwt-auth.guard";
import { AuthService } from "@auth/service/auth.service";
import { UsersModule } from "@users/users.module";

/**
 * Registration, login and bearer-token authentication.
 * Exports the guard with what it needs, so other feature modules can
 * protect their routes.
 */
@Module({
  imports: [UsersModule, AuditModule],
  controllers: [AuthController],
  providers: [
    { provide: AuthUseCase, useClass: AuthService },
    { provide: PasswordHasherPort, useClass: BcryptPasswordHasher },
    { provide: TokenPort, useClass: JwtTokenService },
    JwtAuthGuard,
  ],
  exports: [TokenPort, JwtAuthGuard, UsersModule],
})
export class AuthModule {}
