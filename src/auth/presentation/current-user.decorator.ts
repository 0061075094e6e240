import {
  createParamDecorator,
  ExecutionContext,
  ForbiddenException,
} from "@nestjs/common";
import { AuthenticatedRequest } from "@auth/core/domain";
import { User } from "@users/core/domain";

/**
 * The user JwtAuthGuard attached. Only valid on guarded handlers.
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, context: ExecutionContext): User => {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.authUser) {
      throw new ForbiddenException("Not authenticated");
    }
    return request.authUser;
  },
);
