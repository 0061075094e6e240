export abstract class PasswordHasherPort {
  abstract hash(plain: string): Promise<string>;

  abstract verify(plain: string, hashed: string): Promise<boolean>;
}
