// src/modules/infra/database/database.module.ts
import { Global, Inject, Logger, Module, OnModuleDestroy } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { Pool } from 'pg';
import type { Env } from '@/config/env.zod';

/**
 * Neutral DI token so callers don't care about the underlying driver.
 */
export const DATABASE_POOL = Symbol('DATABASE_POOL');

/** Mask the password segment of a connection string before logging it. */
export const maskConnectionString = (connStr: string): string =>
  connStr.replace(/(\/\/[^:/@]+):[^@]*@/, '$1:****@');

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: DATABASE_POOL,
      inject: [ConfigService],
      useFactory: (cfg: ConfigService<Env, true>): Pool => {
        const connStr = cfg.get('DATABASE_URL', { infer: true });

        const logger = new Logger('DB');
        logger.debug(maskConnectionString(connStr));

        const pool: Pool = new Pool({ connectionString: connStr });

        pool.on('error', (err: Error) => {
          logger.error('Pool error', err.stack);
        });

        return pool;
      },
    },
  ],
  exports: [DATABASE_POOL],
})
export class DatabaseModule implements OnModuleDestroy {
  constructor(@Inject(DATABASE_POOL) private readonly pool: Pool) {}
  async onModuleDestroy() {
    await this.pool.end();
  }
}
