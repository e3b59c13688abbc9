import { z } from 'zod';
import { MIN_PASSWORD_LENGTH } from '../utils/constants';
import { isEntirelyNumeric } from '../utils/helpers';

export const email = z.string().trim().toLowerCase().email('Enter a valid email address.');

export const password = z
  .string()
  .min(
    MIN_PASSWORD_LENGTH,
    `This password is too short. It must contain at least ${MIN_PASSWORD_LENGTH} characters.`
  )
  .refine((value) => !isEntirelyNumeric(value), 'This password is entirely numeric.');

export const name = z.string().trim().min(1, 'This field may not be blank.').max(100);

export const registerSchema = z.object({
  body: z
    .object({
      email,
      password,
      password2: z.string(),
      firstName: name,
      lastName: name,
      role: z.enum(['student', 'staff'], {
        errorMap: () => ({ message: 'Role must be student or staff; admin accounts cannot self-register.' }),
      }),
    })
    .refine((body) => body.password === body.password2, {
      message: "Password fields didn't match.",
      path: ['password'],
    })
    .transform(({ password2: _confirmation, ...rest }) => rest),
});

export const loginSchema = z.object({
  body: z.object({
    email: z.string().trim().toLowerCase().min(1, 'Email is required.'),
    password: z.string().min(1, 'Password is required.'),
  }),
});

export const refreshSchema = z.object({
  body: z.object({
    refresh: z.string().min(1, 'Refresh token is required.'),
  }),
});
