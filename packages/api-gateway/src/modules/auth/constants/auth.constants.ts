// Injection tokens
export const UNIT_OF_WORK = 'UNIT_OF_WORK';
export const STATE_CACHE = 'STATE_CACHE';
export const EMAIL_SENDER = 'EMAIL_SENDER';
export const OAUTH_PROVIDERS = 'OAUTH_PROVIDERS';

// The password method is stored as an Account with this provider and a fixed account id
export const CREDENTIALS_PROVIDER_ID = 'credentials';
export const CREDENTIALS_ACCOUNT_ID = 'credentials';

export const ROLE_NAMES = ['admin', 'careseeker', 'caregiver'] as const;
export type RoleName = (typeof ROLE_NAMES)[number];

// Role granted on first OAuth sign-in when the initiate request names none
export const DEFAULT_OAUTH_ROLE: RoleName = 'careseeker';

export const OAUTH_STATE_KEY_PREFIX = 'oauth_state:';

export const VERIFICATION_CODE_LENGTH = 6;

export const VERIFICATION_INTENTS = ['verify_email', 'forgot_password'] as const;
export type VerificationIntent = (typeof VERIFICATION_INTENTS)[number];
