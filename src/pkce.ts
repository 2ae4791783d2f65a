import { InvalidGrantError } from '@modelcontextprotocol/sdk/server/auth/errors.js';
import crypto from 'node:crypto';
import type { CodeChallengeMethod } from './types.js';

export function isCodeChallengeMethod(value: unknown): value is CodeChallengeMethod {
    return value === 'S256' || value === 'plain';
}

/**
 * S256: BASE64URL(SHA256(code_verifier)), without padding. plain: the verifier itself.
 *
 * @see https://www.rfc-editor.org/rfc/rfc7636#section-4.2
 */
export function computeChallenge(codeVerifier: string, method: CodeChallengeMethod): string {
    if (method === 'plain') {
        return codeVerifier;
    }
    return crypto.createHash('sha256').update(codeVerifier).digest('base64url');
}

export function validateChallenge(codeChallenge: string, method: CodeChallengeMethod, codeVerifier: string) {
    const computedChallenge = computeChallenge(codeVerifier, method);
    if (computedChallenge !== codeChallenge) {
        throw new InvalidGrantError('code_verifier does not match the challenge');
    }
}
