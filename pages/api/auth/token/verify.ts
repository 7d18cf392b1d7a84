import { publicRoute } from '../../../../src/lib/api/handler';
import { ok, parseBody } from '../../../../src/lib/api/http';
import { verifySchema } from '../../../../src/lib/validation/auth';
import { EXPIRED_TOKEN_MESSAGE, verifyToken } from '../../../../src/lib/auth/tokens';

export default publicRoute({
    POST: async ({ req }) => {
        const { token } = parseBody(verifySchema, req.body);
        await verifyToken(token, 'any', EXPIRED_TOKEN_MESSAGE);
        return ok({});
    },
});
