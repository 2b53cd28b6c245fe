// src/modules/users/users.repository.ts
import { Inject, Injectable } from '@nestjs/common';
import { Pool } from 'pg';
import { DATABASE_POOL } from '@/modules/infra/database/database.module';
import { wrapStore } from '@/common/errors/store.error';
import { UserStore } from './user.store';
import { NewUser, UserRow, UserSchema } from './user.zod';

const USER_COLUMNS = `id, email, username, password_hash, first_name, last_name,
       is_active, is_admin, last_login_at, created_at, updated_at`;

@Injectable()
export class UsersRepository extends UserStore {
  constructor(@Inject(DATABASE_POOL) private readonly pool: Pool) {
    super();
  }

  async create(user: NewUser): Promise<UserRow> {
    const sql = `
      INSERT INTO users (email, username, password_hash, first_name, last_name, is_active, is_admin)
      VALUES ($1, $2, $3, $4, $5, $6, $7)
      RETURNING ${USER_COLUMNS}
    `;
    return wrapStore('create user', async () => {
      const result = await this.pool.query(sql, [
        user.email,
        user.username,
        user.password_hash,
        user.first_name,
        user.last_name,
        user.is_active,
        user.is_admin,
      ]);
      return UserSchema.parse(result.rows[0]);
    });
  }

  findById(id: number): Promise<UserRow | null> {
    return this.findOne('get user by ID', 'id', id);
  }

  findByEmail(email: string): Promise<UserRow | null> {
    return this.findOne('get user by email', 'email', email);
  }

  findByUsername(username: string): Promise<UserRow | null> {
    return this.findOne('get user by username', 'username', username);
  }

  existsByEmail(email: string): Promise<boolean> {
    return this.exists('check email existence', 'email', email);
  }

  existsByUsername(username: string): Promise<boolean> {
    return this.exists('check username existence', 'username', username);
  }

  async updateLastLogin(id: number, at: Date): Promise<void> {
    await wrapStore('update last login', () =>
      this.pool.query('UPDATE users SET last_login_at = $1 WHERE id = $2', [at, id]),
    );
  }

  private findOne(
    operation: string,
    column: 'id' | 'email' | 'username',
    value: number | string,
  ): Promise<UserRow | null> {
    const sql = `SELECT ${USER_COLUMNS} FROM users WHERE ${column} = $1 LIMIT 1`;
    return wrapStore(operation, async () => {
      const result = await this.pool.query(sql, [value]);
      return result.rows.length > 0 ? UserSchema.parse(result.rows[0]) : null;
    });
  }

  private exists(operation: string, column: 'email' | 'username', value: string): Promise<boolean> {
    const sql = `SELECT EXISTS(SELECT 1 FROM users WHERE ${column} = $1) AS exists`;
    return wrapStore(operation, async () => {
      const result = await this.pool.query<{ exists: boolean }>(sql, [value]);
      return result.rows[0]?.exists === true;
    });
  }
}
