import { SetMetadata } from '@nestjs/common';

// Routes marked public skip SessionAuthGuard
export const IS_PUBLIC_KEY = 'isPublic';
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
