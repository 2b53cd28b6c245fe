import {z} from 'zod';

/**
 * Token pair returned by login and refresh
 */
export const TokenPairViewZ = z.object({
    access_token: z.string().min(10),
    refresh_token: z.string().min(10),
    token_type: z.literal('Bearer'),
    expires_in: z.number().int().nonnegative(),
});

/**
 * Public user projection (password hash never included)
 */
export const PublicUserViewZ = z.object({
    id: z.number().int(),
    email: z.string(),
    username: z.string(),
    first_name: z.string(),
    last_name: z.string(),
    is_active: z.boolean(),
    is_admin: z.boolean(),
    last_login_at: z.string().datetime().optional(),
    created_at: z.string().datetime(),
    updated_at: z.string().datetime(),
});

export const MessageViewZ = z.object({
    message: z.string(),
});

export type TokenPairViewZod = z.infer<typeof TokenPairViewZ>;
export type PublicUserViewZod = z.infer<typeof PublicUserViewZ>;
export type MessageViewZod = z.infer<typeof MessageViewZ>;
