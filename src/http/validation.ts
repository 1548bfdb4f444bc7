/**
 * Request schemas
 *
 * Bodies and query strings are parsed with zod before they reach a
 * service; failures become INVALID_REQUEST with the offending fields.
 */

import { z, type ZodTypeDef, type ZodType } from 'zod';
import { CommonErrors } from '../utils/errors.js';

/** bcrypt reads at most this many bytes of a password */
export const MAX_PASSWORD_BYTES = 72;

const PasswordSchema = z
  .string()
  .min(1)
  .refine((password) => Buffer.byteLength(password, 'utf8') <= MAX_PASSWORD_BYTES, {
    message: `Password must be at most ${MAX_PASSWORD_BYTES} bytes`,
  });

export const LoginBodySchema = z.object({
  username: z.string().min(1).max(20),
  password: PasswordSchema,
});

export const RegisterBodySchema = z.object({
  email: z.string().email().max(40),
  username: z
    .string()
    .min(1)
    .max(20)
    .regex(/^[A-Za-z0-9_.-]+$/, 'Username may contain letters, digits, "_", "." and "-"'),
  password: PasswordSchema,
});

export const VerificationQuerySchema = z.object({
  token: z.string().min(1),
});

export const ResendVerificationSchema = z.object({
  email: z.string().email().max(40),
});

export const OAuthCallbackQuerySchema = z.object({
  code: z.string().optional(),
  state: z.string().optional(),
});

export const AccountIdParamsSchema = z.object({
  id: z.string().uuid(),
});

export const EditProfileBodySchema = z.object({
  username: z
    .string()
    .max(20)
    .regex(/^[A-Za-z0-9_.-]*$/, 'Username may contain letters, digits, "_", "." and "-"')
    .optional(),
  description: z.string().max(100).optional(),
});

export const SubscribeBodySchema = z.object({
  subscriber_id: z.string().uuid().optional(),
  subscribe_to_id: z.string().uuid(),
});

export const PublishVideoBodySchema = z.object({
  title: z.string().trim().min(1).max(50),
  duration: z.number().int().min(0).default(0),
  description: z.string().max(500).optional(),
});

export const VideoIdParamsSchema = z.object({
  id: z.string().uuid(),
});

/**
 * Parse a request part.
 *
 * @throws {ApiError} INVALID_REQUEST listing each failing field
 */
export function parseRequest<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown, part: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => ({
      field: issue.path.join('.') || part,
      message: issue.message,
    }));
    throw CommonErrors.INVALID_REQUEST(`Invalid request ${part}`, { fields });
  }
  return result.data;
}
