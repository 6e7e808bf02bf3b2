/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Permitted parameters for the Auth endpoints.
 *
 * RULES:
 * - Use Zod for runtime validation; unknown keys are stripped.
 * - Email normalized to lowercase in the store, not here.
 */

import { z } from 'zod';

export const loginSchema = z.object({
  email: z.string().email('Invalid email address'),
  password: z.string().min(1, 'Password is required'),
});

export type LoginInput = z.infer<typeof loginSchema>;
