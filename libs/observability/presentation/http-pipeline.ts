import { INestApplication } from "@nestjs/common";
import { ErrorRequestHandler, json, RequestHandler, urlencoded } from "express";
import { RequestBodyErrorHandler } from "./request-body-error.handler";
import {
  REQUEST_ID_HEADER,
  RequestObservabilityMiddleware,
} from "./request-observability.middleware";

/**
 * Mounts the Express middleware that runs ahead of the router, in order:
 *
 * 1. request observability, so preflights and rejected bodies are reported
 * 2. CORS
 * 3. JSON and form body parsers, with their errors answered as failures
 * 4. re-entry into the request's context scope for the handlers
 *
 * The application must be created with `bodyParser: false`.
 */
export function configureHttpPipeline(app: INestApplication): void {
  const observability = app.get(RequestObservabilityMiddleware);
  const bodyErrors = app.get(RequestBodyErrorHandler);

  const observe: RequestHandler = (req, res, next) =>
    observability.use(req, res, next);
  const answerBodyError: ErrorRequestHandler = (error, req, res, next) =>
    bodyErrors.handle(error, req, res, next);
  const resumeScope: RequestHandler = (req, res, next) =>
    observability.resume(req, res, next);

  app.use(observe);
  app.enableCors({
    origin: "*",
    methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", REQUEST_ID_HEADER],
    exposedHeaders: [REQUEST_ID_HEADER],
  });
  app.use(json());
  app.use(urlencoded({ extended: true }));
  app.use(answerBodyError);
  app.use(resumeScope);
}
