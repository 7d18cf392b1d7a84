import { authRoute } from '../../../src/lib/api/handler';
import { ok } from '../../../src/lib/api/http';
import { appointmentStats } from '../../../src/lib/services/appointments';

export default authRoute({
    GET: ({ db, user }) => ok(appointmentStats(db, user)),
});
