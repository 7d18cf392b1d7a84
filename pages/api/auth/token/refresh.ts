import { publicRoute } from '../../../../src/lib/api/handler';
import { ok, parseBody } from '../../../../src/lib/api/http';
import { refreshSchema } from '../../../../src/lib/validation/auth';
import { EXPIRED_TOKEN_MESSAGE, issueAccessToken, verifyRefreshToken } from '../../../../src/lib/auth/tokens';
import { AuthenticationError } from '../../../../src/lib/errors';

export default publicRoute({
    POST: async ({ req, db }) => {
        const { refresh } = parseBody(refreshSchema, req.body);
        const claims = await verifyRefreshToken(db, refresh);

        // The account may have been disabled or removed since the token was issued.
        const user = db.data.users.find((u) => u.id === claims.sub);
        if (!user || !user.is_active) {
            throw new AuthenticationError(EXPIRED_TOKEN_MESSAGE);
        }

        return ok({ access: await issueAccessToken(user) });
    },
});
