"use client";

import { useCallback, useEffect, useMemo, useState } from "react";
import Link from "next/link";
import { format } from "date-fns";
import { AlertTriangle, CircleDollarSign, Eye, FileText, Loader2, Plus, Search } from "lucide-react";
import { toast } from "sonner";
import { Button } from "@/components/ui/button";
import { Input } from "@/components/ui/input";
import { Select } from "@/components/ui/select";
import { Card, CardContent } from "@/components/ui/card";
import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from "@/components/ui/table";
import { InvoiceFormDialog } from "@/components/InvoiceFormDialog";
import { StatCard } from "@/components/StatCard";
import { StatusBadge } from "@/components/StatusBadge";
import { useApi } from "@/components/ApiProvider";
import type { InvoiceDto, InvoiceStatus } from "@/lib/api-types";
import { INVOICE_STATUS_LABELS } from "@/lib/labels";
import { round2 } from "@/lib/money";
import { INVOICE_STATUSES } from "@/lib/types";
import {
    describeError, filterByText, formatCurrency, formatDate, invoiceStatusView, isInvoiceOverdue, upsertById,
} from "@/lib/view-models";

export default function BillingPage() {
    const api = useApi();
    const [invoices, setInvoices] = useState<InvoiceDto[]>([]);
    const [loading, setLoading] = useState(true);
    const [query, setQuery] = useState("");
    const [status, setStatus] = useState<InvoiceStatus | "">("");
    const [dialogOpen, setDialogOpen] = useState(false);

    const fetchInvoices = useCallback(async () => {
        setLoading(true);
        try {
            const page = await api.invoices.list({ status: status || undefined, page_size: 100 });
            setInvoices(page.results);
        } catch (error) {
            toast.error(describeError(error));
        } finally {
            setLoading(false);
        }
    }, [api, status]);

    useEffect(() => {
        void fetchInvoices();
    }, [fetchInvoices]);

    const today = format(new Date(), "yyyy-MM-dd");

    const visible = useMemo(
        () => filterByText(invoices, query, (i) => [i.invoice_number, i.client_name, i.case_title, i.notes]),
        [invoices, query],
    );

    const summary = useMemo(() => {
        const outstanding = invoices.filter((i) => i.status === "sent" || i.status === "overdue");
        return {
            outstanding: round2(outstanding.reduce((sum, i) => sum + i.total, 0)),
            overdue: invoices.filter((i) => isInvoiceOverdue(i, today)).length,
            paid: round2(invoices.filter((i) => i.status === "paid").reduce((sum, i) => sum + i.total, 0)),
            drafts: invoices.filter((i) => i.status === "draft").length,
        };
    }, [invoices, today]);

    return (
        <div className="container mx-auto p-4 md:p-8 space-y-6">
            <div className="flex flex-col gap-4 md:flex-row md:items-center md:justify-between">
                <h1 className="text-3xl font-bold tracking-tight">Billing</h1>
                <Button onClick={() => setDialogOpen(true)}>
                    <Plus className="h-4 w-4" /> New invoice
                </Button>
            </div>

            <div className="grid grid-cols-2 gap-4 lg:grid-cols-4">
                <StatCard title="Outstanding" value={formatCurrency(summary.outstanding)} icon={CircleDollarSign} />
                <StatCard title="Overdue" value={summary.overdue} icon={AlertTriangle} />
                <StatCard title="Paid" value={formatCurrency(summary.paid)} icon={CircleDollarSign} />
                <StatCard title="Drafts" value={summary.drafts} icon={FileText} />
            </div>

            <div className="flex flex-col gap-2 sm:flex-row">
                <div className="relative flex-1">
                    <Search className="absolute left-3 top-3 h-4 w-4 text-muted-foreground" />
                    <Input
                        placeholder="Search number, client, case..."
                        className="pl-9"
                        value={query}
                        onChange={(e) => setQuery(e.target.value)}
                    />
                </div>
                <Select
                    aria-label="Status"
                    className="sm:w-48"
                    value={status}
                    onChange={(e) => setStatus(INVOICE_STATUSES.find((s) => s === e.target.value) ?? "")}
                >
                    <option value="">All statuses</option>
                    {INVOICE_STATUSES.map((s) => (
                        <option key={s} value={s}>{INVOICE_STATUS_LABELS[s]}</option>
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
                                    <TableHead>Number</TableHead>
                                    <TableHead>Client</TableHead>
                                    <TableHead className="hidden md:table-cell">Issued</TableHead>
                                    <TableHead className="hidden md:table-cell">Due</TableHead>
                                    <TableHead>Status</TableHead>
                                    <TableHead className="text-right">Total</TableHead>
                                    <TableHead />
                                </TableRow>
                            </TableHeader>
                            <TableBody>
                                {visible.length === 0 && (
                                    <TableRow>
                                        <TableCell colSpan={7} className="text-center text-muted-foreground">
                                            No invoices found.
                                        </TableCell>
                                    </TableRow>
                                )}
                                {visible.map((invoice) => (
                                    <TableRow key={invoice.id}>
                                        <TableCell className="font-medium">{invoice.invoice_number}</TableCell>
                                        <TableCell>{invoice.client_name ?? "-"}</TableCell>
                                        <TableCell className="hidden md:table-cell">{formatDate(invoice.issue_date)}</TableCell>
                                        <TableCell className="hidden md:table-cell">{formatDate(invoice.due_date)}</TableCell>
                                        <TableCell>
                                            <StatusBadge
                                                view={invoiceStatusView(isInvoiceOverdue(invoice, today) ? "overdue" : invoice.status)}
                                            />
                                        </TableCell>
                                        <TableCell className="text-right">{formatCurrency(invoice.total)}</TableCell>
                                        <TableCell className="text-right">
                                            <Button variant="ghost" size="icon" asChild>
                                                <Link href={`/billing/${invoice.id}`} aria-label={`Open ${invoice.invoice_number}`}>
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

            <InvoiceFormDialog
                open={dialogOpen}
                onOpenChange={setDialogOpen}
                onSaved={(saved) => setInvoices((prev) => upsertById(prev, saved))}
            />
        </div>
    );
}
