import { authRoute } from '../../../src/lib/api/handler';
import { dateParam, ok } from '../../../src/lib/api/http';
import { calendarEntries } from '../../../src/lib/services/appointments';
import { HttpError } from '../../../src/lib/errors';

export default authRoute({
    GET: ({ req, db, user }) => {
        const start = dateParam(req, 'start');
        const end = dateParam(req, 'end');
        if (!start || !end) {
            throw new HttpError(400, 'Both start and end date parameters are required');
        }
        return ok(calendarEntries(db, user, start, end));
    },
});
