import { FastifyRequest } from 'fastify';

/**
 * Caller identity attached to the request by SessionAuthGuard
 */
export interface AuthenticatedPrincipal {
  userId: string;
  sessionId: string;
  roles: string[];
}

export type AuthenticatedRequest = FastifyRequest & {
  principal?: AuthenticatedPrincipal;
  cookies?: { [cookieName: string]: string | undefined };
};
