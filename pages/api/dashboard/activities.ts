import { authRoute } from '../../../src/lib/api/handler';
import { created, ok, parseBody } from '../../../src/lib/api/http';
import { activitySchema } from '../../../src/lib/validation/dashboard';
import { logActivity, recentActivities } from '../../../src/lib/services/dashboard';
import { serializeActivity } from '../../../src/lib/serializers';

export default authRoute({
    GET: ({ db, user }) => ok(recentActivities(db, user, 50).map(serializeActivity)),

    POST: async ({ req, db, user }) => {
        const input = parseBody(activitySchema, req.body);
        const activity = await logActivity(db, user, input.action_type, input.description, input.related_object_id || null);
        return created(serializeActivity(activity));
    },
});
