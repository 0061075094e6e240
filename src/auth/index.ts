export { AuthModule } from "./auth.module";
export * from "./core/domain";
export * from "./core/dtos";
export { AuthUseCase } from "./core/ports/in/auth.use-case";
export { PasswordHasherPort } from "./core/ports/out/password-hasher.port";
export { TokenPort } from "./core/ports/out/token.port";
export { JwtAuthGuard } from "./presentation/jwt-auth.guard";
export { CurrentUser } from "./presentation/current-user.decorator";
