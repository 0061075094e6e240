import type { DatabaseSession } from "@database/core/ports/out/database.port";
import { NewUser, User } from "@users/core/domain";

/**
 * UsersRepositoryPort - Outbound port for user persistence.
 * Writes accept the session of an open transaction.
 */
export abstract class UsersRepositoryPort {
  abstract findById(id: number): Promise<User | null>;

  abstract findByEmail(email: string): Promise<User | null>;

  abstract existsByEmailOrUsername(
    email: string,
    username: string,
  ): Promise<boolean>;

  /**
   * Rejects with DuplicateResourceError when email or username is taken.
   */
  abstract create(user: NewUser, session?: DatabaseSession): Promise<User>;

  abstract updateLastLogin(
    id: number,
    at: Date,
    session?: DatabaseSession,
  ): Promise<void>;
}
