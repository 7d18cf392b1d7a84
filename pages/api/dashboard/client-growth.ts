import { authRoute } from '../../../src/lib/api/handler';
import { ok, parseIntParam } from '../../../src/lib/api/http';
import { DEFAULT_CHART_DAYS, clientGrowth } from '../../../src/lib/services/dashboard';

export default authRoute({
    GET: ({ req, db, user }) => ok(clientGrowth(db, user, parseIntParam(req, 'days', DEFAULT_CHART_DAYS, 365))),
});
