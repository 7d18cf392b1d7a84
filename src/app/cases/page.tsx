"use client";

import { useCallback, useEffect, useMemo, useState } from "react";
import Link from "next/link";
import { Eye, Loader2, Plus, Search } from "lucide-react";
import { toast } from "sonner";
import { Button } from "@/components/ui/button";
import { Input } from "@/components/ui/input";
import { Select } from "@/components/ui/select";
import { Card, CardContent } from "@/components/ui/card";
import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from "@/components/ui/table";
import { CaseFormDialog } from "@/components/CaseFormDialog";
import { StatusBadge } from "@/components/StatusBadge";
import { useApi } from "@/components/ApiProvider";
import type { CaseDto, CaseStatus } from "@/lib/api-types";
import { CASE_STATUS_LABELS } from "@/lib/labels";
import { CASE_STATUSES } from "@/lib/types";
import { caseStatusView, describeError, filterByText, formatDate, upsertById } from "@/lib/view-models";

export default function CasesPage() {
    const api = useApi();
    const [cases, setCases] = useState<CaseDto[]>([]);
    const [loading, setLoading] = useState(true);
    const [query, setQuery] = useState("");
    const [status, setStatus] = useState<CaseStatus | "">("");
    const [dialogOpen, setDialogOpen] = useState(false);

    const fetchCases = useCallback(async () => {
        setLoading(true);
        try {
            const page = await api.cases.list({ status: status || undefined, page_size: 100 });
            setCases(page.results);
        } catch (error) {
            toast.error(describeError(error));
        } finally {
            setLoading(false);
        }
    }, [api, status]);

    useEffect(() => {
        void fetchCases();
    }, [fetchCases]);

    const visible = useMemo(
        () => filterByText(cases, query, (c) => [c.title, c.description, c.client_name, ...c.assigned_to_names]),
        [cases, query],
    );

    return (
        <div className="container mx-auto p-4 md:p-8 space-y-6">
            <div className="flex flex-col gap-4 md:flex-row md:items-center md:justify-between">
                <div>
                    <h1 className="text-3xl font-bold tracking-tight">Cases</h1>
                    <p className="text-muted-foreground">Cases you opened or are assigned to.</p>
                </div>
                <Button onClick={() => setDialogOpen(true)}>
                    <Plus className="h-4 w-4" /> New case
                </Button>
            </div>

            <div className="flex flex-col gap-2 sm:flex-row">
                <div className="relative flex-1">
                    <Search className="absolute left-3 top-3 h-4 w-4 text-muted-foreground" />
                    <Input
                        placeholder="Search title, client, assignee..."
                        className="pl-9"
                        value={query}
                        onChange={(e) => setQuery(e.target.value)}
                    />
                </div>
                <Select
                    aria-label="Status"
                    className="sm:w-48"
                    value={status}
                    onChange={(e) => setStatus(CASE_STATUSES.find((s) => s === e.target.value) ?? "")}
                >
                    <option value="">All statuses</option>
                    {CASE_STATUSES.map((s) => (
                        <option key={s} value={s}>{CASE_STATUS_LABELS[s]}</option>
                    ))}
                </Select>
            </div>

            <Card>
                <CardContent className="pt-6">
                    {loading ? (
                        <div className="flex justify-center p-8">
                            <Loader2 className="h-6 w-6 animate-spin text-muted-foreground" />
                        </div>
                    ) : (
                        <Table>
                            <TableHeader>
                                <TableRow>
                                    <TableHead>Title</TableHead>
                                    <TableHead>Client</TableHead>
                                    <TableHead>Status</TableHead>
                                    <TableHead className="hidden md:table-cell">Assigned</TableHead>
                                    <TableHead className="hidden md:table-cell">Opened</TableHead>
                                    <TableHead />
                                </TableRow>
                            </TableHeader>
                            <TableBody>
                                {visible.length === 0 && (
                                    <TableRow>
                                        <TableCell colSpan={6} className="text-center text-muted-foreground">
                                            No cases found.
                                        </TableCell>
                                    </TableRow>
                                )}
                                {visible.map((c) => (
                                    <TableRow key={c.id}>
                                        <TableCell className="font-medium">{c.title}</TableCell>
                                        <TableCell>{c.client_name ?? "-"}</TableCell>
                                        <TableCell>
                                            <StatusBadge view={caseStatusView(c.status)} />
                                        </TableCell>
                                        <TableCell className="hidden md:table-cell">{c.assigned_to_names.join(", ") || "-"}</TableCell>
                                        <TableCell className="hidden md:table-cell">{formatDate(c.created_at)}</TableCell>
                                        <TableCell className="text-right">
                                            <Button variant="ghost" size="icon" asChild>
                                                <Link href={`/cases/${c.id}`} aria-label={`Open ${c.title}`}>
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

            <CaseFormDialog
                open={dialogOpen}
                onOpenChange={setDialogOpen}
                onSaved={(saved) => setCases((prev) => upsertById(prev, saved))}
            />
        </div>
    );
}
