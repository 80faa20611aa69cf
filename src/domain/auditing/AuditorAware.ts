import { RequestContext } from '../../shared/context/RequestContext.js';

/**
 * Name recorded for unauthenticated callers by some identity providers
 */
export const ANONYMOUS_USER = 'anonymousUser';

/**
 * Supplies the user recorded in createdBy/updatedBy/deletedBy
 */
export interface AuditorAware {
  getCurrentAuditor(): string | undefined;
}

/**
 * Auditor taken from the authenticated principal of the current request
 */
export const securityContextAuditor: AuditorAware = {
  getCurrentAuditor(): string | undefined {
    const subject = RequestContext.getPrincipal()?.subject;

    if (!subject || subject === ANONYMOUS_USER) {
      return undefined;
    }
    return subject;
  },
};
