// src/modules/health/health.controller.ts
import { Controller, Get, UseGuards } from '@nestjs/common';
import { OptionalJwtAuthGuard } from '@/modules/auth/optional-jwt.guard';
import { CurrentUser } from '@/modules/auth/current-user.decorator';
import type { AuthenticatedIdentity } from '@/modules/auth/types/jwt-payload';

export type HealthView = { status: 'healthy'; user_id?: number };

@Controller('health')
export class HealthController {
  /** Liveness probe; echoes the caller's id when a valid token came along. */
  @Get()
  @UseGuards(OptionalJwtAuthGuard)
  check(@CurrentUser() user: AuthenticatedIdentity | null): HealthView {
    return user ? { status: 'healthy', user_id: user.id } : { status: 'healthy' };
  }
}
