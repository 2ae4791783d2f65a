import type { Request } from 'express';
import type { CodeChallengeMethod } from './types.js';

export interface ConsentRequest {
    clientId: string;
    clientName?: string;
    redirectUri: string;
    scopes: string[];
    state?: string;
    codeChallengeMethod: CodeChallengeMethod;
}

export type ConsentDecision = { subject: string } | { denied: true; reason?: string };

/**
 * Establishes who is granting access between receipt of an authorization request and code
 * issuance. A real identity provider plugs in here; code and token mechanics are unaffected.
 */
export interface ConsentProvider {
    obtainConsent(request: ConsentRequest, req: Request): Promise<ConsentDecision> | ConsentDecision;
}

/**
 * Grants every request on behalf of a fixed subject, without asking anyone.
 * Only suitable for single-user or demo deployments.
 */
export function autoApproveConsent(subject: string = 'demo_user'): ConsentProvider {
    return {
        obtainConsent: () => ({ subject }),
    };
}

export function isDenied(decision: ConsentDecision): decision is { denied: true; reason?: string } {
    return 'denied' in decision;
}
