"use client";

import { useCallback, useEffect, useMemo, useState } from "react";
import Link from "next/link";
import { Eye, Loader2, Plus, Search, UserCheck, UserX, Users } from "lucide-react";
import { toast } from "sonner";
import { Button } from "@/components/ui/button";
import { Input } from "@/components/ui/input";
import { Select } from "@/components/ui/select";
import { Switch } from "@/components/ui/switch";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from "@/components/ui/table";
import { ClientFormDialog } from "@/components/ClientFormDialog";
import { StatCard } from "@/components/StatCard";
import { useApi } from "@/components/ApiProvider";
import type { ClientDto, ClientStatsDto } from "@/lib/api-types";
import { fullName } from "@/lib/labels";
import { describeError, filterByText, formatDate, upsertById } from "@/lib/view-models";

type ActiveFilter = "all" | "active" | "inactive";

const PAGE_SIZE = 100;

export default function ClientsPage() {
    const api = useApi();
    const [clients, setClients] = useState<ClientDto[]>([]);
    const [total, setTotal] = useState(0);
    const [stats, setStats] = useState<ClientStatsDto | null>(null);
    const [loading, setLoading] = useState(true);
    const [query, setQuery] = useState("");
    const [activeFilter, setActiveFilter] = useState<ActiveFilter>("all");
    const [dialogOpen, setDialogOpen] = useState(false);

    const fetchClients = useCallback(async () => {
        setLoading(true);
        try {
            const isActive = activeFilter === "all" ? undefined : activeFilter === "active";
            const [page, summary] = await Promise.all([
                api.clients.list({ is_active: isActive, page_size: PAGE_SIZE }),
                api.clients.stats(),
            ]);
            setClients(page.results);
            setTotal(page.count);
            setStats(summary);
        } catch (error) {
            toast.error(describeError(error));
        } finally {
            setLoading(false);
        }
    }, [api, activeFilter]);

    useEffect(() => {
        void fetchClients();
    }, [fetchClients]);

    const visible = useMemo(
        () => filterByText(clients, query, (c) => [c.first_name, c.last_name, c.email, c.phone, c.city, c.company]),
        [clients, query],
    );

    const toggleActive = async (client: ClientDto) => {
        try {
            const updated = client.is_active ? await api.clients.deactivate(client.id) : await api.clients.activate(client.id);
            setClients((prev) => upsertById(prev, updated));
            toast.success(`${fullName(updated)} is now ${updated.is_active ? "active" : "inactive"}.`);
        } catch (error) {
            toast.error(describeError(error));
        }
    };

    return (
        <div className="container mx-auto p-4 md:p-8 space-y-6">
            <div className="flex flex-col gap-4 md:flex-row md:items-center md:justify-between">
                <div>
                    <h1 className="text-3xl font-bold tracking-tight">Clients</h1>
                    <p className="text-muted-foreground">{total} clients</p>
                </div>
                <Button onClick={() => setDialogOpen(true)}>
                    <Plus className="h-4 w-4" /> New client
                </Button>
            </div>

            {stats && (
                <div className="grid grid-cols-2 gap-4 lg:grid-cols-4">
                    <StatCard title="Total" value={stats.total_clients} icon={Users} />
                    <StatCard title="Active" value={stats.active_clients} icon={UserCheck} />
                    <StatCard title="Inactive" value={stats.inactive_clients} icon={UserX} />
                    <StatCard
                        title="New this month"
                        value={stats.new_clients_this_month}
                        icon={Plus}
                        hint={stats.top_cities.map((c) => `${c.city} (${c.count})`).join(", ") || undefined}
                    />
                </div>
            )}

            <Card>
                <CardHeader className="flex flex-col gap-4 md:flex-row md:items-center md:justify-between">
                    <CardTitle>Client list</CardTitle>
                    <div className="flex flex-col gap-2 sm:flex-row">
                        <div className="relative">
                            <Search className="absolute left-3 top-3 h-4 w-4 text-muted-foreground" />
                            <Input
                                placeholder="Search name, email, phone..."
                                className="pl-9 sm:w-72"
                                value={query}
                                onChange={(e) => setQuery(e.target.value)}
                            />
                        </div>
                        <Select
                            aria-label="Status"
                            className="sm:w-40"
                            value={activeFilter}
                            onChange={(e) => setActiveFilter(e.target.value === "active" || e.target.value === "inactive" ? e.target.value : "all")}
                        >
                            <option value="all">All</option>
                            <option value="active">Active</option>
                            <option value="inactive">Inactive</option>
                        </Select>
                    </div>
                </CardHeader>
                <CardContent>
                    {loading ? (
                        <div className="flex justify-center p-8">
                            <Loader2 className="h-6 w-6 animate-spin text-muted-foreground" />
                        </div>
                    ) : (
                        <Table>
                            <TableHeader>
                                <TableRow>
                                    <TableHead>Name</TableHead>
                                    <TableHead className="hidden md:table-cell">Email</TableHead>
                                    <TableHead className="hidden md:table-cell">Phone</TableHead>
                                    <TableHead className="hidden lg:table-cell">City</TableHead>
                                    <TableHead>Status</TableHead>
                                    <TableHead className="hidden lg:table-cell">Added</TableHead>
                                    <TableHead className="text-right">Actions</TableHead>
                                </TableRow>
                            </TableHeader>
                            <TableBody>
                                {visible.length === 0 && (
                                    <TableRow>
                                        <TableCell colSpan={7} className="text-center text-muted-foreground">
                                            No clients match.
                                        </TableCell>
                                    </TableRow>
                                )}
                                {visible.map((client) => (
                                    <TableRow key={client.id}>
                                        <TableCell className="font-medium">{fullName(client)}</TableCell>
                                        <TableCell className="hidden md:table-cell">{client.email ?? "-"}</TableCell>
                                        <TableCell className="hidden md:table-cell">{client.phone || "-"}</TableCell>
                                        <TableCell className="hidden lg:table-cell">{client.city || "-"}</TableCell>
                                        <TableCell>
                                            <div className="flex items-center gap-2">
                                                <Switch
                                                    checked={client.is_active}
                                                    onCheckedChange={() => void toggleActive(client)}
                                                    aria-label={client.is_active ? `Deactivate ${fullName(client)}` : `Activate ${fullName(client)}`}
                                                />
                                                <span className="text-sm text-muted-foreground">
                                                    {client.is_active ? "Active" : "Inactive"}
                                                </span>
                                            </div>
                                        </TableCell>
                                        <TableCell className="hidden lg:table-cell">{formatDate(client.created_at)}</TableCell>
                                        <TableCell className="text-right">
                                            <Button variant="ghost" size="icon" asChild>
                                                <Link href={`/clients/${client.id}`} aria-label={`Open ${fullName(client)}`}>
                                                    <Eye className="h-4 w-4" />
                                                </Link>
                                            </Button>
                                        </TableCell>
                                    </TableRow>
                                ))}
                            </TableBody>
                        </Table>
                    )}
                </CardContent>
            </Card>

            <ClientFormDialog
                open={dialogOpen}
                onOpenChange={setDialogOpen}
                onSaved={(client) => {
                    setClients((prev) => upsertById(prev, client));
                    setTotal((n) => n + 1);
                }}
            />
        </div>
    );
}
