import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Inject,
} from "@nestjs/common";
import { HttpAdapterHost } from "@nestjs/core";
import { Request, Response } from "express";
import { serviceConfig } from "@config/index";
import type { ServiceConfig } from "@config/index";
import { FailureCategory, RequestFailure } from "@logging/core/domain";
import { ContextService } from "@logging/service/context.service";
import { ErrorClassifier } from "./normalizers/error.classifier";

/**
 * ObservabilityExceptionFilter - the single place failures become responses.
 *
 * Records the classified failure on the request context, where the request
 * middleware picks it up when the response finishes. Infrastructure and
 * unexpected failures reply with a fixed body; their messages stay in logs.
 */
@Catch()
export class ObservabilityExceptionFilter implements ExceptionFilter {
  constructor(
    private readonly httpAdapterHost: HttpAdapterHost,
    private readonly contextService: ContextService,
    @Inject(serviceConfig.KEY) private readonly service: ServiceConfig,
  ) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    const failure = ErrorClassifier.classify(
      exception,
      this.service.isDevelopment,
    );
    this.contextService.getContext(request)?.recordFailure(failure, exception);

    if (response.headersSent) return;

    this.httpAdapterHost.httpAdapter.reply(
      response,
      this.responseBody(exception, failure),
      failure.status,
    );
  }

  private responseBody(exception: unknown, failure: RequestFailure): object {
    if (exception instanceof HttpException) {
      const body = exception.getResponse();
      return typeof body === "string"
        ? { statusCode: failure.status, message: body }
        : body;
    }

    if (failure.category === FailureCategory.INFRASTRUCTURE) {
      return {
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        message: "Service temporarily unavailable",
        error: "Service Unavailable",
      };
    }

    if (failure.status === HttpStatus.CONFLICT) {
      return {
        statusCode: HttpStatus.CONFLICT,
        message: "Resource already exists",
        error: "Conflict",
      };
    }

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: "Internal server error",
    };
  }
}
