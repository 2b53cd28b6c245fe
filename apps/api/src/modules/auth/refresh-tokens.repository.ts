// src/modules/auth/refresh-tokens.repository.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { Pool } from 'pg';
import { z } from 'zod';
import { DATABASE_POOL } from '@/modules/infra/database/database.module';
import { wrapStore } from '@/common/errors/store.error';
import { RefreshTokenRecord, SessionStore } from './session.store';

const RefreshTokenRowZ = z.object({
  id: z.number().int(),
  user_id: z.number().int(),
  token: z.string(),
  expires_at: z.date(),
  created_at: z.date(),
});

const toRecord = (row: z.infer<typeof RefreshTokenRowZ>): RefreshTokenRecord => ({
  id: row.id,
  userId: row.user_id,
  token: row.token,
  expiresAt: row.expires_at,
  createdAt: row.created_at,
});

/** SessionStore backed by the `refresh_tokens` table. */
@Injectable()
export class RefreshTokensRepository extends SessionStore {
  private readonly logger = new Logger(RefreshTokensRepository.name);

  constructor(@Inject(DATABASE_POOL) private readonly pool: Pool) {
    super();
  }

  async save(userId: number, token: string, expiresAt: Date): Promise<void> {
    const sql = `
      INSERT INTO refresh_tokens (user_id, token, expires_at, created_at)
      VALUES ($1, $2, $3, $4)
    `;
    await wrapStore('save refresh token', () =>
      this.pool.query(sql, [userId, token, expiresAt, new Date(Date.now())]),
    );
  }

  async findValid(token: string, now: Date = new Date(Date.now())): Promise<RefreshTokenRecord | null> {
    const sql = `
      SELECT id, user_id, token, expires_at, created_at
      FROM refresh_tokens
      WHERE token = $1 AND expires_at > $2
      LIMIT 1
    `;
    return wrapStore('get refresh token', async () => {
      const result = await this.pool.query(sql, [token, now]);
      return result.rows.length > 0 ? toRecord(RefreshTokenRowZ.parse(result.rows[0])) : null;
    });
  }

  async delete(token: string): Promise<void> {
    await wrapStore('delete refresh token', () =>
      this.pool.query('DELETE FROM refresh_tokens WHERE token = $1', [token]),
    );
  }

  async deleteAllForUser(userId: number): Promise<number> {
    const result = await wrapStore('delete user refresh tokens', () =>
      this.pool.query('DELETE FROM refresh_tokens WHERE user_id = $1', [userId]),
    );
    return result.rowCount ?? 0;
  }

  async sweepExpired(now: Date = new Date(Date.now())): Promise<number> {
    const result = await wrapStore('delete expired refresh tokens', () =>
      this.pool.query('DELETE FROM refresh_tokens WHERE expires_at < $1', [now]),
    );
    return result.rowCount ?? 0;
  }

  /**
   * DELETE ... RETURNING and INSERT in one transaction. A concurrent rotation
   * of the same token blocks on the row lock, then deletes nothing and
   * returns false.
   */
  async rotate(oldToken: string, userId: number, newToken: string, expiresAt: Date): Promise<boolean> {
    return wrapStore('rotate refresh token', async () => {
      const client = await this.pool.connect();
      let broken: Error | boolean | undefined;
      try {
        await client.query('BEGIN');
        const removed = await client.query(
          'DELETE FROM refresh_tokens WHERE token = $1 AND user_id = $2 RETURNING id',
          [oldToken, userId],
        );
        if ((removed.rowCount ?? 0) === 0) {
          await client.query('ROLLBACK');
          return false;
        }
        await client.query(
          `INSERT INTO refresh_tokens (user_id, token, expires_at, created_at)
           VALUES ($1, $2, $3, $4)`,
          [userId, newToken, expiresAt, new Date(Date.now())],
        );
        await client.query('COMMIT');
        return true;
      } catch (err: unknown) {
        await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
          const reason = rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr);
          this.logger.warn(`rollback failed: ${reason}`);
        });
        // a truthy argument makes pg destroy the connection instead of pooling it
        broken = err instanceof Error ? err : true;
        throw err;
      } finally {
        client.release(broken);
      }
    });
  }
}
