import type { AuthContext, MethodHandlers } from './handler';
import { ok, parseBody } from './http';
import { profileSchema } from '../validation/auth';
import { updateProfile } from '../services/users';
import { serializeProfile } from '../serializers';

async function update({ req, db, user }: AuthContext) {
    const input = parseBody(profileSchema, req.body);
    return ok(serializeProfile(await updateProfile(db, user, input)));
}

/** The caller's own profile; mounted under both /api/auth/profile/ and /api/dashboard/profile/. */
export const profileHandlers: MethodHandlers<AuthContext> = {
    GET: ({ user }) => ok(serializeProfile(user)),
    PATCH: update,
    PUT: update,
};
