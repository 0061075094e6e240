import { Injectable } from "@nestjs/common";
import {
  DatabasePort,
  DatabaseSession,
} from "@database/core/ports/out/database.port";
import { NewUser, User } from "@users/core/domain";
import { UsersRepositoryPort } from "@users/core/ports/out/users.repository.port";

type UserRow = {
  id: number;
  email: string;
  username: string;
  hashed_password: string;
  full_name: string | null;
  is_active: boolean;
  is_superuser: boolean;
  created_at: Date;
  updated_at: Date;
  last_login: Date | null;
};

const USER_COLUMNS = `id, email, username, hashed_password, full_name, is_active,
  is_superuser, created_at, updated_at, last_login`;

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    username: row.username,
    hashedPassword: row.hashed_password,
    fullName: row.full_name,
    isActive: row.is_active,
    isSuperuser: row.is_superuser,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    lastLogin: row.last_login,
  };
}

@Injectable()
export class PgUsersRepository extends UsersRepositoryPort {
  constructor(private readonly database: DatabasePort) {
    super();
  }

  async findById(id: number): Promise<User | null> {
    const { rows } = await this.database.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id],
    );
    return rows[0] ? toUser(rows[0]) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const { rows } = await this.database.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [email],
    );
    return rows[0] ? toUser(rows[0]) : null;
  }

  async existsByEmailOrUsername(
    email: string,
    username: string,
  ): Promise<boolean> {
    const { rowCount } = await this.database.query(
      "SELECT 1 FROM users WHERE email = $1 OR username = $2 LIMIT 1",
      [email, username],
    );
    return rowCount > 0;
  }

  async create(user: NewUser, session?: DatabaseSession): Promise<User> {
    const { rows } = await (session ?? this.database).query<UserRow>(
      `INSERT INTO users (email, username, hashed_password, full_name)
       VALUES ($1, $2, $3, $4)
       RETURNING ${USER_COLUMNS}`,
      [user.email, user.username, user.hashedPassword, user.fullName ?? null],
    );
    return toUser(rows[0]);
  }

  async updateLastLogin(
    id: number,
    at: Date,
    session?: DatabaseSession,
  ): Promise<void> {
    await (session ?? this.database).query(
      "UPDATE users SET last_login = $2, updated_at = NOW() WHERE id = $1",
      [id, at],
    );
  }
}
