import { createParamDecorator, ExecutionContext } from "@nestjs/common";
import type { Request } from "express";
import { RequestOrigin } from "@audit/core/domain";

export const Origin = createParamDecorator(
  (_data: unknown, context: ExecutionContext): RequestOrigin => {
    const request = context.switchToHttp().getRequest<Request>();
    return {
      ipAddress: request.ip ?? request.socket.remoteAddress,
      userAgent: request.headers["user-agent"],
    };
  },
);
