import { z } from 'zod';

// POST /auth/login. The email is compared case-insensitively; the flow
// lowercases it before any lookup, audit or rate-limit key.
export const loginSchema = z.object({
  email: z.string().trim().email('Invalid email address'),
  password: z.string().min(1, 'Password is required'),
});

export type LoginInput = z.infer<typeof loginSchema>;
