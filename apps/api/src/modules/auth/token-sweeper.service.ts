// src/modules/auth/token-sweeper.service.ts
import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { AUTH_OPTIONS } from './auth.options';
import type { AuthOptions } from './auth.options';
import { AuthService } from './auth.service';

/**
 * Background cycle that deletes expired refresh tokens.
 * Runs independently of request handling; a failed sweep is logged and the
 * next tick tries again. Ticks never overlap.
 */
@Injectable()
export class TokenSweeper implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(TokenSweeper.name);
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;

  constructor(
    private readonly auth: AuthService,
    @Inject(AUTH_OPTIONS) private readonly opts: AuthOptions,
  ) {}

  onModuleInit(): void {
    if (this.opts.sweepIntervalMs <= 0) {
      this.logger.warn('token sweep disabled (interval <= 0)');
      return;
    }
    this.timer = setInterval(() => void this.sweep(), this.opts.sweepIntervalMs);
    // keep the process from staying alive just for the sweep
    this.timer.unref();
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * One sweep pass. Never rejects.
   * @returns rows removed, or null when skipped or failed
   */
  async sweep(): Promise<number | null> {
    if (this.running) return null;
    this.running = true;
    try {
      const removed = await this.auth.cleanupExpiredTokens();
      this.logger.debug(`swept ${removed} expired refresh token(s)`);
      return removed;
    } catch (err: unknown) {
      this.logger.error(
        'expired token sweep failed',
        err instanceof Error ? err.stack : String(err),
      );
      return null;
    } finally {
      this.running = false;
    }
  }
}
