import type { AppointmentStatus } from '../types';
import type { AuthContext, MethodHandlers } from './handler';
import { ok, pathParam } from './http';
import { getAppointment, setAppointmentStatus } from '../services/appointments';

const ACTION_MESSAGES: Record<Exclude<AppointmentStatus, 'scheduled'>, string> = {
    confirmed: 'appointment confirmed',
    cancelled: 'appointment cancelled',
    completed: 'appointment completed',
};

/** POST handler for the confirm / cancel / complete actions. */
export function appointmentStatusAction(status: keyof typeof ACTION_MESSAGES): MethodHandlers<AuthContext> {
    return {
        POST: async ({ req, db, user }) => {
            const appointment = getAppointment(db, user, pathParam(req, 'id'));
            await setAppointmentStatus(db, user, appointment, status);
            return ok({ status: ACTION_MESSAGES[status] });
        },
    };
}
