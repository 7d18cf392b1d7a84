import { authRoute } from '../../../src/lib/api/handler';
import { ok } from '../../../src/lib/api/http';
import { todayAppointments } from '../../../src/lib/services/appointments';
import { serializeAppointment } from '../../../src/lib/serializers';

export default authRoute({
    GET: ({ db, user }) => ok(todayAppointments(db, user).map((a) => serializeAppointment(db, a))),
});
