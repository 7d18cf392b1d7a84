import { addDays, endOfDay, startOfDay } from 'date-fns';
import { v4 as uuidv4 } from 'uuid';
import type { Db } from '../database';
import type { Appointment, AppointmentStatus, User } from '../types';
import { NotFoundError, ValidationError } from '../errors';
import { fullName } from '../labels';
import type { AppointmentCreateInput, AppointmentInput } from '../validation/appointments';
import type { AppointmentStatsDto, CalendarEntryDto } from '../api-types';
import { isUpcoming, paidRevenue, recordActivity } from './activity';

export interface AppointmentFilters {
    status?: string;
    start_date?: Date;
    end_date?: Date;
    client?: string;
}

export const TIME_ORDER_MESSAGE = 'End time must be after start time.';

const STATUS_ACTIVITY = {
    scheduled: 'appointment_updated',
    confirmed: 'appointment_confirmed',
    cancelled: 'appointment_cancelled',
    completed: 'appointment_completed',
} as const;

const byStartDesc = (a: Appointment, b: Appointment) => b.start_time.localeCompare(a.start_time);
const byStartAsc = (a: Appointment, b: Appointment) => a.start_time.localeCompare(b.start_time);

function ownedAppointments(db: Db, user: User) {
    return db.data.appointments.filter((a) => a.user_id === user.id);
}

export function listAppointments(db: Db, user: User, filters: AppointmentFilters = {}): Appointment[] {
    let appointments = ownedAppointments(db, user);

    if (filters.status) {
        appointments = appointments.filter((a) => a.status === filters.status);
    }
    const { start_date, end_date } = filters;
    if (start_date) {
        appointments = appointments.filter((a) => new Date(a.start_time) >= start_date);
    }
    if (end_date) {
        appointments = appointments.filter((a) => new Date(a.start_time) <= end_date);
    }
    if (filters.client) {
        appointments = appointments.filter((a) => a.client_id === filters.client);
    }

    return appointments.sort(byStartDesc);
}

export function getAppointment(db: Db, user: User, id: string): Appointment {
    const appointment = db.data.appointments.find((a) => a.id === id && a.user_id === user.id);
    if (!appointment) throw new NotFoundError();
    return appointment;
}

/** Rejects ranges where start is not strictly before end. Overlaps with other appointments are allowed. */
export function assertTimeOrder(startTime: string, endTime: string) {
    if (new Date(startTime).getTime() >= new Date(endTime).getTime()) {
        throw ValidationError.field('end_time', TIME_ORDER_MESSAGE);
    }
}

function resolveClient(db: Db, user: User, clientId: string | null | undefined) {
    if (!clientId) return null;
    const owned = db.data.clients.some((c) => c.id === clientId && c.created_by === user.id);
    if (!owned) throw ValidationError.field('client', `Invalid pk "${clientId}" - object does not exist.`);
    return clientId;
}

function resolveCase(db: Db, user: User, caseId: string | null | undefined) {
    if (!caseId) return null;
    const visible = db.data.cases.some((c) =>
        c.id === caseId && (c.created_by === user.id || c.assigned_to.includes(user.id)));
    if (!visible) throw ValidationError.field('case', `Invalid pk "${caseId}" - object does not exist.`);
    return caseId;
}

export async function createAppointment(db: Db, user: User, input: AppointmentCreateInput, now = new Date()): Promise<Appointment> {
    assertTimeOrder(input.start_time, input.end_time);

    const timestamp = now.toISOString();
    const appointment: Appointment = {
        id: uuidv4(),
        user_id: user.id,
        client_id: resolveClient(db, user, input.client),
        case_id: resolveCase(db, user, input.case),
        title: input.title,
        description: input.description ?? '',
        start_time: input.start_time,
        end_time: input.end_time,
        status: input.status ?? 'scheduled',
        location: input.location ?? '',
        notes: input.notes ?? '',
        created_at: timestamp,
        updated_at: timestamp,
    };
    db.data.appointments.push(appointment);
    recordActivity(db, user.id, 'appointment_created', `Scheduled "${appointment.title}"`, appointment.id, now);
    await db.write();
    return appointment;
}

export async function updateAppointment(db: Db, user: User, appointment: Appointment, input: AppointmentInput, now = new Date()): Promise<Appointment> {
    // Partial updates are checked against the merged range.
    assertTimeOrder(input.start_time ?? appointment.start_time, input.end_time ?? appointment.end_time);
    const clientId = input.client !== undefined ? resolveClient(db, user, input.client) : undefined;
    const caseId = input.case !== undefined ? resolveCase(db, user, input.case) : undefined;

    if (input.title !== undefined) appointment.title = input.title;
    if (input.description !== undefined) appointment.description = input.description;
    if (input.start_time !== undefined) appointment.start_time = input.start_time;
    if (input.end_time !== undefined) appointment.end_time = input.end_time;
    if (input.status !== undefined) appointment.status = input.status;
    if (input.location !== undefined) appointment.location = input.location;
    if (input.notes !== undefined) appointment.notes = input.notes;
    if (clientId !== undefined) appointment.client_id = clientId;
    if (caseId !== undefined) appointment.case_id = caseId;
    appointment.updated_at = now.toISOString();

    recordActivity(db, user.id, 'appointment_updated', `Updated "${appointment.title}"`, appointment.id, now);
    await db.write();
    return appointment;
}

/** confirm / cancel / complete: sets the status and nothing else. */
export async function setAppointmentStatus(db: Db, user: User, appointment: Appointment, status: AppointmentStatus, now = new Date()) {
    appointment.status = status;
    appointment.updated_at = now.toISOString();
    recordActivity(db, user.id, STATUS_ACTIVITY[status], `Marked "${appointment.title}" as ${status}`, appointment.id, now);
    await db.write();
    return appointment;
}

export async function deleteAppointment(db: Db, user: User, appointment: Appointment) {
    db.data.appointments = db.data.appointments.filter((a) => a.id !== appointment.id);
    recordActivity(db, user.id, 'appointment_deleted', `Deleted "${appointment.title}"`, appointment.id);
    await db.write();
}

export function upcomingAppointments(db: Db, user: User, now = new Date()) {
    return ownedAppointments(db, user).filter((a) => isUpcoming(a, now)).sort(byStartAsc);
}

export function todayAppointments(db: Db, user: User, now = new Date()) {
    const from = startOfDay(now);
    const to = endOfDay(now);
    return ownedAppointments(db, user)
        .filter((a) => {
            const start = new Date(a.start_time);
            return start >= from && start <= to;
        })
        .sort(byStartAsc);
}

export function calendarEntries(db: Db, user: User, start: Date, end: Date): CalendarEntryDto[] {
    return listAppointments(db, user, { start_date: start, end_date: end })
        .sort(byStartAsc)
        .map((a) => {
            const client = a.client_id ? db.data.clients.find((c) => c.id === a.client_id) : undefined;
            return {
                id: a.id,
                title: a.title,
                start: a.start_time,
                end: a.end_time,
                status: a.status,
                client_name: client ? fullName(client) : 'No Client',
                location: a.location,
                description: a.description,
            };
        });
}

export function appointmentStats(db: Db, user: User, now = new Date()): AppointmentStatsDto {
    const appointments = ownedAppointments(db, user);
    const todayStart = startOfDay(now);
    const tomorrow = addDays(todayStart, 1);
    const nextWeek = addDays(now, 7);

    const startOf = (a: Appointment) => new Date(a.start_time);
    const clientIds = new Set(appointments.map((a) => a.client_id).filter((id): id is string => id !== null));

    return {
        total: appointments.length,
        today: appointments.filter((a) => startOf(a) >= todayStart && startOf(a) < tomorrow).length,
        upcoming: appointments.filter((a) => startOf(a) >= now && startOf(a) <= nextWeek).length,
        completed: appointments.filter((a) => a.status === 'completed').length,
        active_clients: clientIds.size,
        total_revenue: paidRevenue(db, user.id),
    };
}
