import { publicRoute } from '../../../src/lib/api/handler';
import { ok, parseBody } from '../../../src/lib/api/http';
import { loginSchema } from '../../../src/lib/validation/auth';
import { login } from '../../../src/lib/services/users';
import { serializeUser } from '../../../src/lib/serializers';
import type { LoginResponseDto } from '../../../src/lib/api-types';

export default publicRoute({
    POST: async ({ req, db }) => {
        const { email, password } = parseBody(loginSchema, req.body);
        const { user, tokens } = await login(db, email, password);

        return ok({ ...tokens, user: serializeUser(user) } satisfies LoginResponseDto);
    },
});
