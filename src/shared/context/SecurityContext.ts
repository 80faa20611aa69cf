/**
 * SecurityContext - read the authenticated principal of the current request
 *
 * Backed by RequestContext, so it works anywhere in the request's call stack.
 * Every accessor returns undefined outside an authenticated request.
 */
import logger from '../../infra/logger/logger.js';
import { RequestContext } from './RequestContext.js';

export const SecurityContext = {
  /**
   * Subject (`sub` claim) of the current token
   */
  getCurrentUserId(): string | undefined {
    const subject = RequestContext.getPrincipal()?.subject;
    return subject ? subject : undefined;
  },

  getCurrentUserEmail(): string | undefined {
    const email = RequestContext.getPrincipal()?.claims.email;
    return typeof email === 'string' ? email : undefined;
  },

  getAllClaims(): Record<string, unknown> | undefined {
    const principal = RequestContext.getPrincipal();
    return principal ? { ...principal.claims } : undefined;
  },

  getAuthorities(): string[] | undefined {
    const principal = RequestContext.getPrincipal();
    return principal ? [...principal.authorities] : undefined;
  },

  /**
   * Debug-log the current principal
   */
  logAuthenticationContext(): void {
    const principal = RequestContext.getPrincipal();

    if (!principal) {
      logger.debug('No authentication in security context');
      return;
    }

    logger.debug(
      {
        subject: principal.subject,
        authorities: principal.authorities,
        claims: principal.claims,
      },
      'Authentication context'
    );
  },
};

export default SecurityContext;
