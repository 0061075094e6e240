import { User } from "@users/core/domain";

/**
 * Public representation of a user. Never carries the password hash.
 */
export interface UserResponse {
  id: number;
  email: string;
  username: string;
  full_name: string | null;
  is_active: boolean;
  created_at: string;
}

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    full_name: user.fullName,
    is_active: user.isActive,
    created_at: user.createdAt.toISOString(),
  };
}
