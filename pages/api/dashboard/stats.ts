import { authRoute } from '../../../src/lib/api/handler';
import { ok } from '../../../src/lib/api/http';
import { statsHistory } from '../../../src/lib/services/dashboard';
import { serializeDashboardStats } from '../../../src/lib/serializers';

export default authRoute({
    GET: ({ db, user }) => ok(statsHistory(db, user).map(serializeDashboardStats)),
});
