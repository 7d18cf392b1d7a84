"use client";

import { useCallback, useEffect, useMemo, useState } from "react";
import { addWeeks, endOfWeek, format, startOfWeek } from "date-fns";
import {
    CalendarCheck, CalendarClock, CalendarDays, Check, ChevronLeft, ChevronRight, DollarSign, Loader2, Pencil,
    Plus, Trash2, Users, X,
} from "lucide-react";
import { toast } from "sonner";
import { Button } from "@/components/ui/button";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import { Select } from "@/components/ui/select";
import { Tabs, TabsContent, TabsList, TabsTrigger } from "@/components/ui/tabs";
import { AppointmentFormDialog } from "@/components/AppointmentFormDialog";
import { StatCard } from "@/components/StatCard";
import { StatusBadge } from "@/components/StatusBadge";
import { useApi } from "@/components/ApiProvider";
import type { AppointmentDto, AppointmentStatsDto, AppointmentStatus, CalendarEntryDto } from "@/lib/api-types";
import { APPOINTMENT_STATUS_LABELS } from "@/lib/labels";
import { APPOINTMENT_STATUSES } from "@/lib/types";
import {
    appointmentStatusView, describeError, formatCurrency, formatTime, formatTimeRange, patchById, relativeDayLabel,
    removeById, upsertById,
} from "@/lib/view-models";

type Transition = "confirm" | "cancel" | "complete";

const TRANSITION_STATUS: Record<Transition, AppointmentStatus> = {
    confirm: "confirmed",
    cancel: "cancelled",
    complete: "completed",
};

interface AppointmentRowProps {
    appointment: AppointmentDto;
    onTransition: (appointment: AppointmentDto, action: Transition) => void;
    onEdit: (appointment: AppointmentDto) => void;
    onDelete: (appointment: AppointmentDto) => void;
}

function AppointmentRow({ appointment, onTransition, onEdit, onDelete }: AppointmentRowProps) {
    const open = appointment.status === "scheduled" || appointment.status === "confirmed";
    return (
        <li className="flex flex-col gap-3 py-4 md:flex-row md:items-center md:justify-between">
            <div className="space-y-1">
                <div className="flex items-center gap-2">
                    <p className="font-medium">{appointment.title}</p>
                    <StatusBadge view={appointmentStatusView(appointment.status)} />
                </div>
                <p className="text-sm text-muted-foreground">
                    {formatTimeRange(appointment.start_time, appointment.end_time)}
                    {appointment.client_name && ` · ${appointment.client_name}`}
                    {appointment.location && ` · ${appointment.location}`}
                </p>
            </div>
            <div className="flex flex-wrap gap-1">
                {appointment.status === "scheduled" && (
                    <Button size="sm" variant="outline" onClick={() => onTransition(appointment, "confirm")}>
                        <Check className="h-4 w-4" /> Confirm
                    </Button>
                )}
                {open && (
                    <>
                        <Button size="sm" variant="outline" onClick={() => onTransition(appointment, "complete")}>
                            <CalendarCheck className="h-4 w-4" /> Complete
                        </Button>
                        <Button size="sm" variant="outline" onClick={() => onTransition(appointment, "cancel")}>
                            <X className="h-4 w-4" /> Cancel
                        </Button>
                    </>
                )}
                <Button size="icon" variant="ghost" aria-label="Edit appointment" onClick={() => onEdit(appointment)}>
                    <Pencil className="h-4 w-4" />
                </Button>
                <Button size="icon" variant="ghost" aria-label="Delete appointment" onClick={() => onDelete(appointment)}>
                    <Trash2 className="h-4 w-4" />
                </Button>
            </div>
        </li>
    );
}

function WeekView({ entries }: { entries: CalendarEntryDto[] }) {
    const byDay = useMemo(() => {
        const groups = new Map<string, CalendarEntryDto[]>();
        for (const entry of entries) {
            const day = format(new Date(entry.start), "yyyy-MM-dd");
            groups.set(day, [...(groups.get(day) ?? []), entry]);
        }
        return [...groups.entries()];
    }, [entries]);

    if (byDay.length === 0) {
        return <p className="py-6 text-sm text-muted-foreground">Nothing on the calendar this week.</p>;
    }

    return (
        <div className="space-y-6">
            {byDay.map(([day, dayEntries]) => (
                <div key={day}>
                    <h3 className="mb-2 text-sm font-semibold">{relativeDayLabel(day)}</h3>
                    <ul className="space-y-2">
                        {dayEntries.map((entry) => (
                            <li key={entry.id} className="flex items-center justify-between rounded-md border p-3 text-sm">
                                <span>
                                    <span className="font-medium">{formatTime(entry.start)}</span> {entry.title}
                                    <span className="text-muted-foreground"> · {entry.client_name}</span>
                                </span>
                                <StatusBadge view={appointmentStatusView(entry.status)} />
                            </li>
                        ))}
                    </ul>
                </div>
            ))}
        </div>
    );
}

export default function AppointmentsPage() {
    const api = useApi();
    const [today, setToday] = useState<AppointmentDto[]>([]);
    const [upcoming, setUpcoming] = useState<AppointmentDto[]>([]);
    const [all, setAll] = useState<AppointmentDto[]>([]);
    const [week, setWeek] = useState<CalendarEntryDto[]>([]);
    const [weekOffset, setWeekOffset] = useState(0);
    const [stats, setStats] = useState<AppointmentStatsDto | null>(null);
    const [statusFilter, setStatusFilter] = useState<AppointmentStatus | "">("");
    const [loading, setLoading] = useState(true);
    const [dialogOpen, setDialogOpen] = useState(false);
    const [editing, setEditing] = useState<AppointmentDto | null>(null);

    const weekStart = useMemo(() => startOfWeek(addWeeks(new Date(), weekOffset)), [weekOffset]);

    const fetchAppointments = useCallback(async () => {
        try {
            const [todayList, upcomingList, page, summary] = await Promise.all([
                api.appointments.today(),
                api.appointments.upcoming(),
                api.appointments.list({ status: statusFilter || undefined, page_size: 100 }),
                api.appointments.stats(),
            ]);
            setToday(todayList);
            setUpcoming(upcomingList);
            setAll(page.results);
            setStats(summary);
        } catch (error) {
            toast.error(describeError(error));
        } finally {
            setLoading(false);
        }
    }, [api, statusFilter]);

    const fetchWeek = useCallback(async () => {
        try {
            setWeek(await api.appointments.calendar(weekStart.toISOString(), endOfWeek(weekStart).toISOString()));
        } catch (error) {
            toast.error(describeError(error));
        }
    }, [api, weekStart]);

    useEffect(() => {
        void fetchAppointments();
    }, [fetchAppointments]);

    useEffect(() => {
        void fetchWeek();
    }, [fetchWeek]);

    const applyLocally = (update: (list: AppointmentDto[]) => AppointmentDto[]) => {
        setToday(update);
        setUpcoming(update);
        setAll(update);
    };

    const handleTransition = async (appointment: AppointmentDto, action: Transition) => {
        try {
            await api.appointments[action](appointment.id);
            const status = TRANSITION_STATUS[action];
            applyLocally((list) => patchById(list, appointment.id, { status, status_display: APPOINTMENT_STATUS_LABELS[status] }));
            toast.success(`Appointment ${status}.`);
            void fetchWeek();
            setStats(await api.appointments.stats());
        } catch (error) {
            toast.error(describeError(error));
        }
    };

    const handleDelete = async (appointment: AppointmentDto) => {
        if (!confirm(`Delete "${appointment.title}"?`)) return;
        try {
            await api.appointments.remove(appointment.id);
            applyLocally((list) => removeById(list, appointment.id));
            void fetchWeek();
        } catch (error) {
            toast.error(describeError(error));
        }
    };

    const handleSaved = (saved: AppointmentDto) => {
        setAll((list) => upsertById(list, saved));
        // Today and upcoming depend on server-side time windows
        void fetchAppointments();
        void fetchWeek();
    };

    const openEditor = (appointment: AppointmentDto | null) => {
        setEditing(appointment);
        setDialogOpen(true);
    };

    const renderList = (list: AppointmentDto[], empty: string) =>
        list.length === 0 ? (
            <p className="py-6 text-sm text-muted-foreground">{empty}</p>
        ) : (
            <ul className="divide-y">
                {list.map((appointment) => (
                    <AppointmentRow
                        key={appointment.id}
                        appointment={appointment}
                        onTransition={(a, action) => void handleTransition(a, action)}
                        onEdit={openEditor}
                        onDelete={(a) => void handleDelete(a)}
                    />
                ))}
            </ul>
        );

    return (
        <div className="container mx-auto p-4 md:p-8 space-y-6">
            <div className="flex flex-col gap-4 md:flex-row md:items-center md:justify-between">
                <h1 className="text-3xl font-bold tracking-tight">Appointments</h1>
                <Button onClick={() => openEditor(null)}>
                    <Plus className="h-4 w-4" /> New appointment
                </Button>
            </div>

            {stats && (
                <div className="grid grid-cols-2 gap-4 lg:grid-cols-5">
                    <StatCard title="Today" value={stats.today} icon={CalendarDays} />
                    <StatCard title="Next 7 days" value={stats.upcoming} icon={CalendarClock} />
                    <StatCard title="Completed" value={stats.completed} icon={CalendarCheck} hint={`${stats.total} in total`} />
                    <StatCard title="Clients seen" value={stats.active_clients} icon={Users} />
                    <StatCard title="Revenue" value={formatCurrency(stats.total_revenue)} icon={DollarSign} />
                </div>
            )}

            {loading ? (
                <div className="flex justify-center p-8">
                    <Loader2 className="h-6 w-6 animate-spin text-muted-foreground" />
                </div>
            ) : (
                <Tabs defaultValue="today">
                    <TabsList>
                        <TabsTrigger value="today">Today ({today.length})</TabsTrigger>
                        <TabsTrigger value="upcoming">Upcoming ({upcoming.length})</TabsTrigger>
                        <TabsTrigger value="week">Week</TabsTrigger>
                        <TabsTrigger value="all">All</TabsTrigger>
                    </TabsList>

                    <TabsContent value="today">
                        <Card>
                            <CardContent className="pt-2">{renderList(today, "No appointments today.")}</CardContent>
                        </Card>
                    </TabsContent>

                    <TabsContent value="upcoming">
                        <Card>
                            <CardContent className="pt-2">{renderList(upcoming, "No upcoming appointments.")}</CardContent>
                        </Card>
                    </TabsContent>

                    <TabsContent value="week">
                        <Card>
                            <CardHeader className="flex flex-row items-center justify-between">
                                <CardTitle className="text-base">
                                    {format(weekStart, "MMM d")} - {format(endOfWeek(weekStart), "MMM d, yyyy")}
                                </CardTitle>
                                <div className="flex gap-1">
                                    <Button size="icon" variant="outline" aria-label="Previous week" onClick={() => setWeekOffset((n) => n - 1)}>
                                        <ChevronLeft className="h-4 w-4" />
                                    </Button>
                                    <Button size="sm" variant="outline" onClick={() => setWeekOffset(0)}>This week</Button>
                                    <Button size="icon" variant="outline" aria-label="Next week" onClick={() => setWeekOffset((n) => n + 1)}>
                                        <ChevronRight className="h-4 w-4" />
                                    </Button>
                                </div>
                            </CardHeader>
                            <CardContent>
                                <WeekView entries={week} />
                            </CardContent>
                        </Card>
                    </TabsContent>

                    <TabsContent value="all">
                        <Card>
                            <CardHeader>
                                <Select
                                    aria-label="Status"
                                    className="sm:w-48"
                                    value={statusFilter}
                                    onChange={(e) => setStatusFilter(APPOINTMENT_STATUSES.find((s) => s === e.target.value) ?? "")}
                                >
                                    <option value="">All statuses</option>
                                    {APPOINTMENT_STATUSES.map((s) => (
                                        <option key={s} value={s}>{APPOINTMENT_STATUS_LABELS[s]}</option>
                                    ))}
                                </Select>
                            </CardHeader>
                            <CardContent>{renderList(all, "No appointments found.")}</CardContent>
                        </Card>
                    </TabsContent>
                </Tabs>
            )}

            <AppointmentFormDialog open={dialogOpen} onOpenChange={setDialogOpen} existing={editing} onSaved={handleSaved} />
        </div>
    );
}
