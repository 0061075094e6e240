import type { Request } from "express";
import { User } from "@users/core/domain";

/**
 * Express request after JwtAuthGuard accepted it.
 */
export interface AuthenticatedRequest extends Request {
  authUser?: User;
}
