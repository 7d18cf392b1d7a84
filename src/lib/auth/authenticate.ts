import { AuthenticationError } from '../errors';
import type { Db } from '../database';
import type { User } from '../types';
import { INVALID_TOKEN_MESSAGE, verifyToken } from './tokens';

/**
 * Resolves the bearer access token in an Authorization header to an active user.
 * A header without the Bearer scheme counts as no credentials.
 */
export async function authenticate(authorization: string | undefined, db: Db): Promise<User> {
    const [scheme, token, ...rest] = (authorization ?? '').trim().split(/\s+/);
    if (scheme !== 'Bearer' || !token || rest.length > 0) {
        throw new AuthenticationError();
    }

    const claims = await verifyToken(token, 'access');
    const user = db.data.users.find((u) => u.id === claims.sub);
    if (!user || !user.is_active) {
        throw new AuthenticationError(INVALID_TOKEN_MESSAGE);
    }
    return user;
}
