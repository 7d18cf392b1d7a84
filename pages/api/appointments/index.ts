import { authRoute } from '../../../src/lib/api/handler';
import { created, dateParam, ok, parseBody, queryParam } from '../../../src/lib/api/http';
import { paginate } from '../../../src/lib/pagination';
import { appointmentSchema } from '../../../src/lib/validation/appointments';
import { createAppointment, listAppointments } from '../../../src/lib/services/appointments';
import { serializeAppointment } from '../../../src/lib/serializers';

export default authRoute({
    GET: ({ req, db, user }) => {
        const appointments = listAppointments(db, user, {
            status: queryParam(req, 'status'),
            start_date: dateParam(req, 'start_date'),
            end_date: dateParam(req, 'end_date'),
            client: queryParam(req, 'client'),
        });
        return ok(paginate(req, appointments.map((a) => serializeAppointment(db, a))));
    },

    POST: async ({ req, db, user }) => {
        const input = parseBody(appointmentSchema, req.body);
        return created(serializeAppointment(db, await createAppointment(db, user, input)));
    },
});
