import { authRoute } from '../../../src/lib/api/handler';
import { ok, parseIntParam } from '../../../src/lib/api/http';
import { DEFAULT_CHART_DAYS, activityChart } from '../../../src/lib/services/dashboard';

export default authRoute({
    GET: ({ req, db, user }) => ok(activityChart(db, user, parseIntParam(req, 'days', DEFAULT_CHART_DAYS, 365))),
});
