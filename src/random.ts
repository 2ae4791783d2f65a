import crypto from 'node:crypto';

/** 256 bits of randomness, URL-safe. */
export function generateToken(): string {
    return crypto.randomBytes(32).toString('base64url');
}
