import { authRoute } from '../../../src/lib/api/handler';
import { ok } from '../../../src/lib/api/http';
import { clientStats } from '../../../src/lib/services/clients';

export default authRoute({
    GET: ({ db, user }) => ok(clientStats(db, user)),
});
