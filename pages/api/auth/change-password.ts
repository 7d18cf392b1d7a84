import { authRoute } from '../../../src/lib/api/handler';
import { ok, parseBody } from '../../../src/lib/api/http';
import { changePasswordSchema } from '../../../src/lib/validation/auth';
import { changePassword } from '../../../src/lib/services/users';

export default authRoute({
    PUT: async ({ req, db, user }) => {
        const { old_password, new_password } = parseBody(changePasswordSchema, req.body);
        await changePassword(db, user, old_password, new_password);
        return ok({ message: 'Password updated successfully' });
    },
});
