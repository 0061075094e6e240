/**
 * Role reported in the `user` field of request events.
 */
export enum UserRole {
  USER = "user",
  SUPERUSER = "superuser",
}
