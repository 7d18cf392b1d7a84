import { authRoute } from '../../../src/lib/api/handler';
import { ok } from '../../../src/lib/api/http';
import { dashboardOverview } from '../../../src/lib/services/dashboard';

export default authRoute({
    GET: ({ db, user }) => ok(dashboardOverview(db, user)),
});
