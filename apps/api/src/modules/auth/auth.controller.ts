// src/modules/auth/auth.controller.ts
import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ZodValidationPipe } from 'nestjs-zod';
import { MessageViewZ } from '@todo/types-zod';
import type { MessageViewZod, PublicUserViewZod, TokenPairViewZod } from '@todo/types-zod';
import { AuthService } from './auth.service';
import { JwtAuthGuard } from './jwt.guard';
import { AdminGuard } from './admin.guard';
import { CurrentUser } from './current-user.decorator';
import type { AuthenticatedIdentity } from './types/jwt-payload';
import {
  LoginDto,
  LoginSchema,
  RefreshTokenDto,
  RefreshTokenSchema,
  RegisterDto,
  RegisterSchema,
} from './dto/auth.zod';

/**
 * AuthController handles registration, login, token refresh, logout and
 * identity lookups. All routes are prefixed with /auth.
 */
@Controller('auth')
export class AuthController {
  constructor(private readonly auth: AuthService) {}

  /** POST /auth/register -> 201 public user | 409 | 400 */
  @Post('register')
  @HttpCode(201)
  register(@Body(new ZodValidationPipe(RegisterSchema)) dto: RegisterDto): Promise<PublicUserViewZod> {
    return this.auth.register({
      email: dto.email,
      username: dto.username,
      password: dto.password,
      firstName: dto.first_name,
      lastName: dto.last_name,
    });
  }

  /**
   * POST /auth/login
   * `username` may hold either the username or the email address.
   */
  @Post('login')
  @HttpCode(200)
  login(@Body(new ZodValidationPipe(LoginSchema)) dto: LoginDto): Promise<TokenPairViewZod> {
    return this.auth.login(dto.username, dto.password);
  }

  /** POST /auth/refresh -> new token pair; the presented refresh token is consumed. */
  @Post('refresh')
  @HttpCode(200)
  refresh(
    @Body(new ZodValidationPipe(RefreshTokenSchema)) dto: RefreshTokenDto,
  ): Promise<TokenPairViewZod> {
    return this.auth.refresh(dto.refresh_token);
  }

  @Post('logout')
  @HttpCode(200)
  @UseGuards(JwtAuthGuard)
  async logout(
    @Body(new ZodValidationPipe(RefreshTokenSchema)) dto: RefreshTokenDto,
  ): Promise<MessageViewZod> {
    await this.auth.logout(dto.refresh_token);
    return MessageViewZ.parse({ message: 'Logout successful' });
  }

  @Post('logout-all')
  @HttpCode(200)
  @UseGuards(JwtAuthGuard)
  async logoutAll(@CurrentUser() user: AuthenticatedIdentity): Promise<MessageViewZod> {
    await this.auth.logoutAll(user.id);
    return MessageViewZ.parse({ message: 'Logged out from all devices' });
  }

  @Get('me')
  @UseGuards(JwtAuthGuard)
  me(@CurrentUser() user: AuthenticatedIdentity): Promise<PublicUserViewZod> {
    return this.auth.getCurrentUser(user.id);
  }

  /** GET /auth/health: confirms that the presented access token is accepted. */
  @Get('health')
  @UseGuards(JwtAuthGuard)
  health(@CurrentUser() user: AuthenticatedIdentity) {
    return { status: 'healthy', user_id: user.id, message: 'Authentication is working' };
  }

  /** GET /auth/users/:id (admin only) */
  @Get('users/:id')
  @UseGuards(JwtAuthGuard, AdminGuard)
  userById(@Param('id', ParseIntPipe) id: number): Promise<PublicUserViewZod> {
    return this.auth.getCurrentUser(id);
  }
}
