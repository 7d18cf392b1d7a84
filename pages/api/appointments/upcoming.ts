import { authRoute } from '../../../src/lib/api/handler';
import { ok } from '../../../src/lib/api/http';
import { upcomingAppointments } from '../../../src/lib/services/appointments';
import { serializeAppointment } from '../../../src/lib/serializers';

export default authRoute({
    GET: ({ db, user }) => ok(upcomingAppointments(db, user).map((a) => serializeAppointment(db, a))),
});
