import { authRoute } from '../../../../src/lib/api/handler';
import { created, ok, parseBody } from '../../../../src/lib/api/http';
import { paginate } from '../../../../src/lib/pagination';
import { userCreateSchema } from '../../../../src/lib/validation/auth';
import { createUser, listUsers, requireAdmin } from '../../../../src/lib/services/users';
import { serializeUser } from '../../../../src/lib/serializers';

export default authRoute({
    GET: ({ req, db, user }) => {
        requireAdmin(user);
        return ok(paginate(req, listUsers(db).map(serializeUser)));
    },

    POST: async ({ req, db, user }) => {
        requireAdmin(user);
        const input = parseBody(userCreateSchema, req.body);
        return created(serializeUser(await createUser(db, input)));
    },
});
