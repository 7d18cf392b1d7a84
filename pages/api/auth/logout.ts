import { authRoute } from '../../../src/lib/api/handler';
import { parseBody, resetContent } from '../../../src/lib/api/http';
import { refreshSchema } from '../../../src/lib/validation/auth';
import { revokeRefreshToken } from '../../../src/lib/auth/tokens';

export default authRoute({
    POST: async ({ req, db, user }) => {
        const { refresh } = parseBody(refreshSchema, req.body);
        await revokeRefreshToken(db, refresh, user);
        return resetContent();
    },
});
