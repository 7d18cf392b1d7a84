"use client";

import { useCallback, useEffect, useState } from "react";
import Link from "next/link";
import { CalendarCheck, CalendarClock, CalendarX, Loader2, UserPlus, Users } from "lucide-react";
import { toast } from "sonner";
import { Card, CardHeader, CardTitle, CardContent, CardDescription } from "@/components/ui/card";
import { Button } from "@/components/ui/button";
import { StatCard } from "@/components/StatCard";
import { StatusBadge } from "@/components/StatusBadge";
import { useApi } from "@/components/ApiProvider";
import type { ActivityChartPointDto, DashboardDto } from "@/lib/api-types";
import { fullName } from "@/lib/labels";
import {
    appointmentStatusView, describeError, formatDate, formatDateTime, formatTime, relativeDayLabel,
} from "@/lib/view-models";

const CHART_DAYS = 14;

function ActivityChart({ points }: { points: ActivityChartPointDto[] }) {
    if (points.length === 0) {
        return <p className="text-sm text-muted-foreground">No appointments in this period.</p>;
    }

    const peak = Math.max(1, ...points.map((p) => p.total));
    return (
        <div className="flex h-40 items-end gap-1">
            {points.map((point) => (
                <div key={point.day} className="flex flex-1 flex-col items-center gap-1" title={`${formatDate(point.day)}: ${point.total}`}>
                    <div className="flex w-full flex-col-reverse overflow-hidden rounded-sm bg-muted" style={{ height: "8rem" }}>
                        <div className="bg-green-500" style={{ height: `${(point.completed / peak) * 100}%` }} />
                        <div className="bg-red-400" style={{ height: `${(point.cancelled / peak) * 100}%` }} />
                        <div
                            className="bg-blue-500"
                            style={{ height: `${((point.total - point.completed - point.cancelled) / peak) * 100}%` }}
                        />
                    </div>
                    <span className="text-[10px] text-muted-foreground">{point.day.slice(8)}</span>
                </div>
            ))}
        </div>
    );
}

export default function DashboardPage() {
    const api = useApi();
    const [overview, setOverview] = useState<DashboardDto | null>(null);
    const [chart, setChart] = useState<ActivityChartPointDto[]>([]);
    const [loading, setLoading] = useState(true);

    const fetchDashboard = useCallback(async () => {
        try {
            const [data, points] = await Promise.all([api.dashboard.overview(), api.dashboard.activityChart(CHART_DAYS)]);
            setOverview(data);
            setChart(points);
        } catch (error) {
            toast.error(describeError(error));
        } finally {
            setLoading(false);
        }
    }, [api]);

    useEffect(() => {
        void fetchDashboard();
    }, [fetchDashboard]);

    if (loading) {
        return (
            <div className="flex justify-center p-12">
                <Loader2 className="h-8 w-8 animate-spin text-muted-foreground" />
            </div>
        );
    }

    if (!overview) {
        return (
            <div className="container mx-auto p-8">
                <Button variant="outline" onClick={() => void fetchDashboard()}>Try again</Button>
            </div>
        );
    }

    return (
        <div className="container mx-auto p-4 md:p-8 space-y-8">
            <div className="space-y-1">
                <h1 className="text-3xl font-bold tracking-tight">Welcome back, {overview.user_info.first_name}</h1>
                <p className="text-muted-foreground">Here is what is happening in your practice.</p>
            </div>

            <div className="grid grid-cols-2 gap-4 lg:grid-cols-4">
                <StatCard title="Clients" value={overview.total_clients} icon={Users} />
                <StatCard title="New this month" value={overview.new_clients_this_month} icon={UserPlus} />
                <StatCard
                    title="Upcoming"
                    value={overview.upcoming_appointments}
                    icon={CalendarClock}
                    hint={`${overview.total_appointments} appointments in total`}
                />
                <StatCard
                    title="Completed"
                    value={overview.completed_appointments}
                    icon={CalendarCheck}
                    hint={`${overview.cancelled_appointments} cancelled`}
                />
            </div>

            <div className="grid grid-cols-1 gap-8 lg:grid-cols-3">
                <Card className="lg:col-span-2">
                    <CardHeader>
                        <CardTitle>Appointments</CardTitle>
                        <CardDescription>Last {CHART_DAYS} days: scheduled, completed and cancelled</CardDescription>
                    </CardHeader>
                    <CardContent>
                        <ActivityChart points={chart} />
                    </CardContent>
                </Card>

                <Card>
                    <CardHeader>
                        <CardTitle>Upcoming appointments</CardTitle>
                    </CardHeader>
                    <CardContent className="space-y-4">
                        {overview.upcoming_appointments_list.length === 0 && (
                            <p className="text-sm text-muted-foreground">Nothing scheduled.</p>
                        )}
                        {overview.upcoming_appointments_list.map((appointment) => (
                            <div key={appointment.id} className="flex items-start justify-between gap-2">
                                <div>
                                    <p className="font-medium">{appointment.title}</p>
                                    <p className="text-xs text-muted-foreground">
                                        {relativeDayLabel(appointment.start_time)} at {formatTime(appointment.start_time)}
                                        {appointment.client_name && ` with ${appointment.client_name} ${appointment.client_last_name ?? ""}`}
                                    </p>
                                </div>
                                <StatusBadge view={appointmentStatusView(appointment.status)} />
                            </div>
                        ))}
                        <Link href="/appointments" className="block text-sm text-primary hover:underline">
                            All appointments
                        </Link>
                    </CardContent>
                </Card>

                <Card>
                    <CardHeader>
                        <CardTitle>Recent clients</CardTitle>
                    </CardHeader>
                    <CardContent className="space-y-3">
                        {overview.recent_clients.length === 0 && (
                            <p className="text-sm text-muted-foreground">No clients yet.</p>
                        )}
                        {overview.recent_clients.map((client) => (
                            <Link key={client.id} href={`/clients/${client.id}`} className="block rounded-md p-2 hover:bg-muted">
                                <p className="font-medium">{fullName(client)}</p>
                                <p className="text-xs text-muted-foreground">{client.email ?? client.phone}</p>
                            </Link>
                        ))}
                    </CardContent>
                </Card>

                <Card className="lg:col-span-2">
                    <CardHeader>
                        <CardTitle>Recent activity</CardTitle>
                    </CardHeader>
                    <CardContent>
                        {overview.recent_activities.length === 0 ? (
                            <p className="text-sm text-muted-foreground">No activity yet.</p>
                        ) : (
                            <ul className="space-y-3">
                                {overview.recent_activities.map((activity) => (
                                    <li key={activity.id} className="flex items-center justify-between gap-4 text-sm">
                                        <span className="flex items-center gap-2">
                                            {activity.action_type.endsWith("cancelled") || activity.action_type.endsWith("deleted") ? (
                                                <CalendarX className="h-4 w-4 text-red-500" />
                                            ) : (
                                                <CalendarCheck className="h-4 w-4 text-green-600" />
                                            )}
                                            {activity.description}
                                        </span>
                                        <span className="shrink-0 text-xs text-muted-foreground">
                                            {formatDateTime(activity.created_at)}
                                        </span>
                                    </li>
                                ))}
                            </ul>
                        )}
                    </CardContent>
                </Card>
            </div>
        </div>
    );
}
