// src/modules/auth/dto/auth.zod.ts
import { z } from 'zod';
import { createZodDto } from 'nestjs-zod';

export const RegisterSchema = z.object({
  email: z.string().trim().email('email must be a valid address'),
  username: z.string().trim().min(3).max(50),
  password: z.string().min(8).max(100),
  first_name: z.string().max(100).optional().default(''),
  last_name: z.string().max(100).optional().default(''),
});

export const LoginSchema = z.object({
  username: z.string().trim().min(1, 'username is required'),
  password: z.string().min(1, 'password is required'),
});

export const RefreshTokenSchema = z.object({
  refresh_token: z.string().min(1, 'refresh_token is required'),
});

export class RegisterDto extends createZodDto(RegisterSchema) {}
export class LoginDto extends createZodDto(LoginSchema) {}
export class RefreshTokenDto extends createZodDto(RefreshTokenSchema) {}
