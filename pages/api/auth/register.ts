import { publicRoute } from '../../../src/lib/api/handler';
import { created, parseBody } from '../../../src/lib/api/http';
import { registerSchema } from '../../../src/lib/validation/auth';
import { register } from '../../../src/lib/services/users';
import { serializeUser } from '../../../src/lib/serializers';

export default publicRoute({
    POST: async ({ req, db }) => {
        const input = parseBody(registerSchema, req.body);
        const user = await register(db, input);
        return created(serializeUser(user));
    },
});
