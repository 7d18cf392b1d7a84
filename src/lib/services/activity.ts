import { format, isSameMonth, startOfMonth } from 'date-fns';
import { v4 as uuidv4 } from 'uuid';
import type { Db } from '../database';
import type { ActivityType, DashboardStats, RecentActivity } from '../types';
import { round2 } from '../money';

export const ACTIVE_APPOINTMENT_STATUSES = ['scheduled', 'confirmed'] as const;

export function isUpcoming(appointment: { start_time: string; status: string }, now: Date) {
    return new Date(appointment.start_time) > now
        && ACTIVE_APPOINTMENT_STATUSES.some((s) => s === appointment.status);
}

/** Sum of the user's paid invoice totals, optionally limited to payments in `month`. */
export function paidRevenue(db: Db, userId: string, month?: Date) {
    const paid = db.data.invoices.filter((i) =>
        i.created_by === userId
        && i.status === 'paid'
        && (month === undefined || (i.paid_at !== null && isSameMonth(new Date(i.paid_at), month))));
    return round2(paid.reduce((sum, i) => sum + i.total, 0));
}

type StatCounts = Omit<DashboardStats, 'id' | 'user_id' | 'stat_date'>;

export function computeStatCounts(db: Db, userId: string, now = new Date()): StatCounts {
    const clients = db.data.clients.filter((c) => c.created_by === userId);
    const appointments = db.data.appointments.filter((a) => a.user_id === userId);
    const monthStart = startOfMonth(now);

    return {
        total_clients: clients.length,
        total_appointments: appointments.length,
        upcoming_appointments: appointments.filter((a) => isUpcoming(a, now)).length,
        completed_appointments: appointments.filter((a) => a.status === 'completed').length,
        cancelled_appointments: appointments.filter((a) => a.status === 'cancelled').length,
        new_clients_this_month: clients.filter((c) => new Date(c.created_at) >= monthStart).length,
        revenue_this_month: paidRevenue(db, userId, now),
    };
}

/** Upserts the (user, today) snapshot row from live data. */
export function refreshDailyStats(db: Db, userId: string, now = new Date()): DashboardStats {
    const statDate = format(now, 'yyyy-MM-dd');
    const counts = computeStatCounts(db, userId, now);

    const existing = db.data.dashboard_stats.find((s) => s.user_id === userId && s.stat_date === statDate);
    if (existing) {
        Object.assign(existing, counts);
        return existing;
    }

    const row: DashboardStats = { id: uuidv4(), user_id: userId, stat_date: statDate, ...counts };
    db.data.dashboard_stats.push(row);
    return row;
}

/**
 * Logs an activity for the user and refreshes their snapshot for today.
 * Does not write; the calling service persists it together with its own change.
 */
export function recordActivity(
    db: Db,
    userId: string,
    actionType: ActivityType,
    description: string,
    relatedObjectId: string | null = null,
    now = new Date(),
): RecentActivity {
    const activity: RecentActivity = {
        id: uuidv4(),
        user_id: userId,
        action_type: actionType,
        description,
        related_object_id: relatedObjectId,
        created_at: now.toISOString(),
    };
    db.data.recent_activities.push(activity);
    refreshDailyStats(db, userId, now);
    console.info(`[activity] ${actionType} user=${userId}${relatedObjectId ? ` object=${relatedObjectId}` : ''}`);
    return activity;
}
