// src/modules/auth/auth.module.ts
import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { PassportModule } from '@nestjs/passport';
import { UsersModule } from '@/modules/users/users.module';
import type { Env } from '@/config/env.zod';
import { AUTH_OPTIONS, authOptionsFactory, jwtModuleOptions } from './auth.options';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { PasswordService } from './password.service';
import { TokenService } from './token.service';
import { SessionStore } from './session.store';
import { RefreshTokensRepository } from './refresh-tokens.repository';
import { JwtStrategy } from './jwt.strategy';
import { JwtAuthGuard } from './jwt.guard';
import { OptionalJwtAuthGuard } from './optional-jwt.guard';
import { AdminGuard } from './admin.guard';
import { TokenSweeper } from './token-sweeper.service';

@Module({
  imports: [
    ConfigModule,
    PassportModule,
    UsersModule,
    JwtModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (cfg: ConfigService<Env, true>) =>
        jwtModuleOptions(cfg.get('JWT_SECRET_KEY', { infer: true })),
    }),
  ],
  providers: [
    {
      provide: AUTH_OPTIONS,
      inject: [ConfigService],
      useFactory: authOptionsFactory,
    },
    { provide: SessionStore, useClass: RefreshTokensRepository },
    PasswordService,
    TokenService,
    AuthService,
    JwtStrategy,
    JwtAuthGuard,
    OptionalJwtAuthGuard,
    AdminGuard,
    TokenSweeper,
  ],
  controllers: [AuthController],
  exports: [AuthService, TokenService, JwtAuthGuard, OptionalJwtAuthGuard, AdminGuard],
})
export class AuthModule {}
