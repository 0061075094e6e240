import {
  BadRequestException,
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  UnauthorizedException,
} from "@nestjs/common";
import { UserRole } from "@logging/core/value-objects";
import { LoggingService } from "@logging/service/logging.service";
import { AuthenticatedRequest } from "@auth/core/domain";
import { TokenPort } from "@auth/core/ports/out/token.port";
import { UsersRepositoryPort } from "@users/core/ports/out/users.repository.port";

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

/**
 * Accepts `Authorization: Bearer <jwt>` for an existing, active user and
 * attaches that user to the request and to its log context.
 *
 * - no bearer credentials: 403
 * - bad or expired token, unknown user: 401
 * - inactive user: 400
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(
    private readonly tokens: TokenPort,
    private readonly users: UsersRepositoryPort,
    private readonly loggingService: LoggingService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const match = BEARER_PATTERN.exec(request.headers.authorization ?? "");
    if (!match) {
      throw new ForbiddenException("Not authenticated");
    }

    const claims = this.tokens.verify(match[1]);
    const userId = claims ? Number(claims.sub) : Number.NaN;
    if (!Number.isSafeInteger(userId)) {
      throw new UnauthorizedException("Invalid authentication credentials");
    }

    const user = await this.users.findById(userId);
    if (!user) {
      throw new UnauthorizedException("User not found");
    }
    if (!user.isActive) {
      throw new BadRequestException("Inactive user");
    }

    request.authUser = user;
    this.loggingService.addUserContext({
      id: String(user.id),
      role: user.isSuperuser ? UserRole.SUPERUSER : UserRole.USER,
    });
    return true;
  }
}
