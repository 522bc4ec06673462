import { z } from 'zod';

export const EmailSchema = z
  .string()
  .trim()
  .toLowerCase()
  .email('Invalid email format')
  .max(254, 'Email cannot exceed 254 characters');

// 8-64 characters, one uppercase letter, one of !@#$%^&*
export const PASSWORD_POLICY = /^(?=.*[A-Z])(?=.*[!@#$%^&*]).{8,64}$/;

export const PasswordSchema = z
  .string()
  .min(8, 'Password must be at least 8 characters long')
  .max(64, 'Password cannot exceed 64 characters')
  .regex(
    PASSWORD_POLICY,
    'Password must contain at least one uppercase letter and one of !@#$%^&*',
  );

export const NameSchema = z
  .string()
  .trim()
  .min(1, 'Name is required')
  .max(255, 'Name cannot exceed 255 characters');

export const RoleNameSchema = z.string().trim().toLowerCase().min(1, 'Role is required').max(50);

export const JwtTokenSchema = z
  .string()
  .regex(/^[A-Za-z0-9-_]+\.[A-Za-z0-9-_]+\.[A-Za-z0-9-_]+$/, 'Invalid JWT token format');

const VerificationTokenSchema = z
  .string()
  .trim()
  .min(1, 'Token is required')
  .max(128, 'Token cannot exceed 128 characters');

const VerificationCodeValueSchema = z.string().regex(/^\d{6}$/, 'Code must be exactly 6 digits');

export const SignUpRequestSchema = z.object({
  email: EmailSchema,
  password: PasswordSchema,
  name: NameSchema,
  roles: z
    .array(RoleNameSchema)
    .min(1, 'At least one role is required')
    .max(5, 'Too many roles requested'),
});

// Complexity is not checked on sign-in
export const SignInRequestSchema = z.object({
  email: EmailSchema,
  password: z.string().min(1, 'Password is required').max(256),
});

export const RefreshTokenRequestSchema = z.object({
  refreshToken: JwtTokenSchema,
});

export const EmailVerificationSchema = z.object({
  token: VerificationTokenSchema,
  code: VerificationCodeValueSchema.optional(),
});

export const ResendVerificationSchema = z.object({
  email: EmailSchema,
});

export const ForgotPasswordSchema = z.object({
  email: EmailSchema,
});

export const ResetPasswordSchema = z.object({
  token: VerificationTokenSchema,
  password: PasswordSchema,
  code: VerificationCodeValueSchema.optional(),
});

export const TokenQuerySchema = z.object({
  token: VerificationTokenSchema,
});

export const OAuthInitiateQuerySchema = z.object({
  role: RoleNameSchema.optional(),
});

export const OAuthCallbackQuerySchema = z.object({
  code: z.string().min(1, 'Authorization code is required').max(2048),
  state: z.string().min(1, 'State is required').max(512),
});

export type SignUpRequest = z.infer<typeof SignUpRequestSchema>;
export type SignInRequest = z.infer<typeof SignInRequestSchema>;
export type RefreshTokenRequest = z.infer<typeof RefreshTokenRequestSchema>;
export type EmailVerification = z.infer<typeof EmailVerificationSchema>;
export type ResendVerification = z.infer<typeof ResendVerificationSchema>;
export type ForgotPassword = z.infer<typeof ForgotPasswordSchema>;
export type ResetPassword = z.infer<typeof ResetPasswordSchema>;
export type TokenQuery = z.infer<typeof TokenQuerySchema>;
export type OAuthInitiateQuery = z.infer<typeof OAuthInitiateQuerySchema>;
export type OAuthCallbackQuery = z.infer<typeof OAuthCallbackQuerySchema>;

export function sanitizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
