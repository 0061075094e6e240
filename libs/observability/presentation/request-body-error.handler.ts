import { Inject, Injectable } from "@nestjs/common";
import { NextFunction, Request, Response } from "express";
import { serviceConfig } from "@config/index";
import type { ServiceConfig } from "@config/index";
import { ContextService } from "@logging/service/context.service";
import { ErrorClassifier } from "./normalizers/error.classifier";

/**
 * RequestBodyErrorHandler - answers requests the body parsers rejected.
 *
 * Parsing runs ahead of the router, so these errors never reach the Nest
 * exception filter. The failure is recorded on the request context the same
 * way, and the reply keeps the filter's JSON shape.
 */
@Injectable()
export class RequestBodyErrorHandler {
  constructor(
    private readonly contextService: ContextService,
    @Inject(serviceConfig.KEY) private readonly service: ServiceConfig,
  ) {}

  handle(error: unknown, req: Request, res: Response, next: NextFunction): void {
    if (res.headersSent) {
      next(error);
      return;
    }

    const failure = ErrorClassifier.classify(error, this.service.isDevelopment);
    this.contextService.getContext(req)?.recordFailure(failure, error);

    res.status(failure.status).json({
      statusCode: failure.status,
      message: failure.message,
      error: failure.code,
    });
  }
}
