import { Request } from "express";

/** Endpoint label for requests no route matched */
export const UNMATCHED_ROUTE = "unmatched";

/**
 * RouteNormalizer - Creates bounded endpoint identifiers for metric labels
 * and log events.
 *
 * Metric label values must come from a fixed set, so raw paths with embedded
 * ids ("/api/v1/tasks/42") are never used. The Express route template
 * ("/api/v1/tasks/:id") is used when a route matched; everything else
 * collapses into UNMATCHED_ROUTE.
 *
 * @example
 * RouteNormalizer.endpoint(request) // "/api/v1/tasks/:id"
 * RouteNormalizer.endpoint(request) // "unmatched" (404 on unknown path)
 */
export class RouteNormalizer {
  static endpoint(request: Request): string {
    const templatePath = this.getTemplatePath(request);
    return templatePath ? this.ensureLeadingSlash(templatePath) : UNMATCHED_ROUTE;
  }

  /**
   * Express stores the matched route on request.route once routing resolved it.
   */
  private static getTemplatePath(request: Request): string | null {
    const route: unknown = request.route;
    if (typeof route !== "object" || route === null || !("path" in route)) {
      return null;
    }

    const routePath: unknown = route.path;

    // Route arrays are rare but possible
    if (Array.isArray(routePath)) {
      const first: unknown = routePath[0];
      return typeof first === "string" && first.length > 0 ? first : null;
    }

    return typeof routePath === "string" && routePath.length > 0
      ? routePath
      : null;
  }

  static stripQueryString(path: string): string {
    const queryIndex = path.indexOf("?");
    return queryIndex === -1 ? path : path.substring(0, queryIndex);
  }

  private static ensureLeadingSlash(path: string): string {
    return path.startsWith("/") ? path : `/${path}`;
  }
}
