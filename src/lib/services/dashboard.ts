import { format, subDays } from 'date-fns';
import type { Db } from '../database';
import type { ActivityType, User } from '../types';
import type { ActivityChartPointDto, ClientGrowthPointDto, DashboardDto } from '../api-types';
import {
    serializeActivity, serializeAppointmentSummary, serializeClientSummary, serializeProfile,
} from '../serializers';
import { computeStatCounts, isUpcoming, recordActivity } from './activity';

export const DEFAULT_CHART_DAYS = 30;

export function recentActivities(db: Db, user: User, limit: number) {
    return db.data.recent_activities
        .filter((a) => a.user_id === user.id)
        .sort((a, b) => b.created_at.localeCompare(a.created_at))
        .slice(0, limit);
}

export function dashboardOverview(db: Db, user: User, now = new Date()): DashboardDto {
    const counts = computeStatCounts(db, user.id, now);

    const recentClients = db.data.clients
        .filter((c) => c.created_by === user.id)
        .sort((a, b) => b.created_at.localeCompare(a.created_at))
        .slice(0, 5);

    const upcoming = db.data.appointments
        .filter((a) => a.user_id === user.id && isUpcoming(a, now))
        .sort((a, b) => a.start_time.localeCompare(b.start_time))
        .slice(0, 5);

    return {
        total_clients: counts.total_clients,
        total_appointments: counts.total_appointments,
        upcoming_appointments: counts.upcoming_appointments,
        completed_appointments: counts.completed_appointments,
        cancelled_appointments: counts.cancelled_appointments,
        new_clients_this_month: counts.new_clients_this_month,
        recent_clients: recentClients.map(serializeClientSummary),
        upcoming_appointments_list: upcoming.map((a) => serializeAppointmentSummary(db, a)),
        recent_activities: recentActivities(db, user, 10).map(serializeActivity),
        user_info: serializeProfile(user),
    };
}

/** Daily snapshots, newest first. */
export function statsHistory(db: Db, user: User, limit = 30) {
    return db.data.dashboard_stats
        .filter((s) => s.user_id === user.id)
        .sort((a, b) => b.stat_date.localeCompare(a.stat_date))
        .slice(0, limit);
}

const dayOf = (iso: string) => format(new Date(iso), 'yyyy-MM-dd');

/** Appointments starting in the last `days` days, grouped by local calendar day (days without any are omitted). */
export function activityChart(db: Db, user: User, days = DEFAULT_CHART_DAYS, now = new Date()): ActivityChartPointDto[] {
    const since = subDays(now, days);
    const byDay = new Map<string, ActivityChartPointDto>();

    for (const appointment of db.data.appointments) {
        if (appointment.user_id !== user.id || new Date(appointment.start_time) < since) continue;
        const day = dayOf(appointment.start_time);
        const point = byDay.get(day) ?? { day, total: 0, completed: 0, cancelled: 0 };
        point.total += 1;
        if (appointment.status === 'completed') point.completed += 1;
        if (appointment.status === 'cancelled') point.cancelled += 1;
        byDay.set(day, point);
    }

    return [...byDay.values()].sort((a, b) => a.day.localeCompare(b.day));
}

export function clientGrowth(db: Db, user: User, days = DEFAULT_CHART_DAYS, now = new Date()): ClientGrowthPointDto[] {
    const since = subDays(now, days);
    const byDay = new Map<string, number>();

    for (const client of db.data.clients) {
        if (client.created_by !== user.id || new Date(client.created_at) < since) continue;
        const day = dayOf(client.created_at);
        byDay.set(day, (byDay.get(day) ?? 0) + 1);
    }

    return [...byDay.entries()]
        .map(([day, newClients]) => ({ day, new_clients: newClients }))
        .sort((a, b) => a.day.localeCompare(b.day));
}

export async function logActivity(db: Db, user: User, actionType: ActivityType, description: string, relatedObjectId: string | null) {
    const activity = recordActivity(db, user.id, actionType, description, relatedObjectId);
    await db.write();
    return activity;
}
