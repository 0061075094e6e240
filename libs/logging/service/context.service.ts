import { Injectable } from "@nestjs/common";
import { AsyncLocalStorage } from "async_hooks";
import {
  RequestContext,
  RequestUser,
} from "@logging/core/domain";

/**
 * ContextService - Manages request-scoped context using AsyncLocalStorage.
 * The store follows the request through every await without leaking into
 * concurrent requests.
 *
 * The context is also bound to the request object itself, so code that holds
 * the request (exception filters, guards) can find it explicitly.
 */
@Injectable()
export class ContextService {
  private readonly asyncLocalStorage = new AsyncLocalStorage<RequestContext>();
  private readonly byRequest = new WeakMap<object, RequestContext>();

  /**
   * Run a function within a request context.
   * Called once per request by the request middleware.
   */
  run<T>(context: RequestContext, fn: () => T): T {
    return this.asyncLocalStorage.run(context, fn);
  }

  attach(request: object, context: RequestContext): void {
    this.byRequest.set(request, context);
  }

  /**
   * Get the current request context.
   * Returns undefined outside of a request.
   */
  getContext(request?: object): RequestContext | undefined {
    const bound = request ? this.byRequest.get(request) : undefined;
    return bound ?? this.asyncLocalStorage.getStore();
  }

  addUserContext(user: RequestUser): void {
    this.getContext()?.enrich({ user });
  }

  addMetadata(metadata: Record<string, unknown>): void {
    this.getContext()?.enrich({ metadata });
  }
}
