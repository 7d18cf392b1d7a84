import { SignJWT, jwtVerify, errors as joseErrors, type JWTPayload } from 'jose';
import { v4 as uuidv4 } from 'uuid';
import { getServerConfig } from '../config';
import { AuthenticationError } from '../errors';
import type { Db } from '../database';
import type { User, UserType } from '../types';

export const INVALID_TOKEN_MESSAGE = 'Given token not valid for any token type';
export const EXPIRED_TOKEN_MESSAGE = 'Token is invalid or expired';
export const REVOKED_TOKEN_MESSAGE = 'Token is blacklisted';

export type TokenType = 'access' | 'refresh';

export interface TokenClaims {
    sub: string;
    jti: string;
    token_type: TokenType;
    email: string;
    user_type: UserType;
    exp: number;
}

export interface TokenPair {
    access: string;
    refresh: string;
}

function secretKey() {
    return new TextEncoder().encode(getServerConfig().jwtSecret);
}

async function signToken(user: User, tokenType: TokenType, lifetimeSeconds: number, now: Date) {
    const issuedAt = Math.floor(now.getTime() / 1000);
    return new SignJWT({ token_type: tokenType, email: user.email, user_type: user.user_type })
        .setProtectedHeader({ alg: 'HS256' })
        .setSubject(user.id)
        .setJti(uuidv4())
        .setIssuedAt(issuedAt)
        .setExpirationTime(issuedAt + lifetimeSeconds)
        .sign(secretKey());
}

export function issueAccessToken(user: User, now = new Date()) {
    return signToken(user, 'access', getServerConfig().accessTokenLifetimeMinutes * 60, now);
}

export function issueRefreshToken(user: User, now = new Date()) {
    return signToken(user, 'refresh', getServerConfig().refreshTokenLifetimeDays * 24 * 60 * 60, now);
}

export async function issueTokenPair(user: User, now = new Date()): Promise<TokenPair> {
    return {
        access: await issueAccessToken(user, now),
        refresh: await issueRefreshToken(user, now),
    };
}

function isUserType(value: unknown): value is UserType {
    return value === 'admin' || value === 'lawyer' || value === 'paralegal';
}

function toClaims(payload: JWTPayload): TokenClaims | null {
    const { sub, jti, exp, token_type, email, user_type } = payload;
    if (typeof sub !== 'string' || typeof jti !== 'string' || typeof exp !== 'number') return null;
    if (token_type !== 'access' && token_type !== 'refresh') return null;
    if (typeof email !== 'string' || !isUserType(user_type)) return null;
    return { sub, jti, exp, token_type, email, user_type };
}

/**
 * Verifies signature, expiry and token type (`any` accepts both). Any failure is reported as a 401 with `message`.
 */
export async function verifyToken(token: string, expected: TokenType | 'any', message = INVALID_TOKEN_MESSAGE): Promise<TokenClaims> {
    let payload: JWTPayload;
    try {
        ({ payload } = await jwtVerify(token, secretKey(), { algorithms: ['HS256'] }));
    } catch (error) {
        if (error instanceof joseErrors.JOSEError) {
            throw new AuthenticationError(message);
        }
        throw error;
    }

    const claims = toClaims(payload);
    if (!claims || (expected !== 'any' && claims.token_type !== expected)) {
        throw new AuthenticationError(message);
    }
    return claims;
}

export function isRevoked(db: Db, jti: string) {
    return db.data.revoked_tokens.some((t) => t.jti === jti);
}

/** Verifies a refresh token and rejects it once its jti has been revoked by logout. */
export async function verifyRefreshToken(db: Db, token: string): Promise<TokenClaims> {
    const claims = await verifyToken(token, 'refresh', EXPIRED_TOKEN_MESSAGE);
    if (isRevoked(db, claims.jti)) {
        throw new AuthenticationError(REVOKED_TOKEN_MESSAGE);
    }
    return claims;
}

/** Revokes `token` for its owner; another user's token is rejected as invalid. */
export async function revokeRefreshToken(db: Db, token: string, owner: User, now = new Date()) {
    const claims = await verifyRefreshToken(db, token);
    if (claims.sub !== owner.id) {
        console.warn(`[auth] User ${owner.id} tried to revoke a refresh token of user ${claims.sub}`);
        throw new AuthenticationError(INVALID_TOKEN_MESSAGE);
    }

    // Drop entries whose token would have expired anyway
    db.data.revoked_tokens = db.data.revoked_tokens.filter((t) => new Date(t.expires_at) > now);
    db.data.revoked_tokens.push({
        jti: claims.jti,
        expires_at: new Date(claims.exp * 1000).toISOString(),
    });
    await db.write();
    console.info(`[auth] Revoked refresh token for user ${claims.sub}`);
}
