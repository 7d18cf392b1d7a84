"use client";

import { useEffect, useMemo, useState } from "react";
import { addDays, format } from "date-fns";
import { v4 as uuidv4 } from "uuid";
import { Loader2, Plus, Trash2 } from "lucide-react";
import { toast } from "sonner";
import { Button } from "@/components/ui/button";
import { Dialog, DialogContent, DialogFooter, DialogHeader, DialogTitle } from "@/components/ui/dialog";
import { Input } from "@/components/ui/input";
import { Select } from "@/components/ui/select";
import { Textarea } from "@/components/ui/textarea";
import { FormField } from "@/components/FormField";
import { useApi } from "@/components/ApiProvider";
import { useClientOptions } from "@/hooks/useClientOptions";
import { ApiError } from "@/lib/api-client";
import type { CaseDto, InvoiceDto } from "@/lib/api-types";
import { fullName } from "@/lib/labels";
import { computeTotals, lineAmount } from "@/lib/money";
import { describeError, formatCurrency } from "@/lib/view-models";

interface ItemDraft {
    key: string;
    description: string;
    quantity: string;
    unit_price: string;
    tax_rate: string;
}

interface FormState {
    client: string;
    case: string;
    invoice_number: string;
    issue_date: string;
    due_date: string;
    notes: string;
    items: ItemDraft[];
}

const DATE_FORMAT = "yyyy-MM-dd";
const PAYMENT_TERM_DAYS = 30;

function blankItem(): ItemDraft {
    return { key: uuidv4(), description: "", quantity: "1", unit_price: "", tax_rate: "0" };
}

function toFormState(existing?: InvoiceDto | null): FormState {
    if (existing) {
        return {
            client: existing.client,
            case: existing.case ?? "",
            invoice_number: existing.invoice_number,
            issue_date: existing.issue_date,
            due_date: existing.due_date,
            notes: existing.notes,
            items: existing.items.map((item) => ({
                key: item.id,
                description: item.description,
                quantity: String(item.quantity),
                unit_price: String(item.unit_price),
                tax_rate: String(item.tax_rate),
            })),
        };
    }
    const today = new Date();
    return {
        client: "",
        case: "",
        invoice_number: "",
        issue_date: format(today, DATE_FORMAT),
        due_date: format(addDays(today, PAYMENT_TERM_DAYS), DATE_FORMAT),
        notes: "",
        items: [blankItem()],
    };
}

function toNumber(value: string) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
}

interface InvoiceFormDialogProps {
    open: boolean;
    onOpenChange: (open: boolean) => void;
    existing?: InvoiceDto | null;
    onSaved: (saved: InvoiceDto) => void;
}

export function InvoiceFormDialog({ open, onOpenChange, existing, onSaved }: InvoiceFormDialogProps) {
    const api = useApi();
    const clients = useClientOptions(open);
    const [cases, setCases] = useState<CaseDto[]>([]);
    const [form, setForm] = useState<FormState>(() => toFormState(existing));
    const [errors, setErrors] = useState<Record<string, string[]>>({});
    const [saving, setSaving] = useState(false);

    useEffect(() => {
        if (open) {
            setForm(toFormState(existing));
            setErrors({});
        }
    }, [open, existing]);

    useEffect(() => {
        if (!open || !form.client) {
            setCases([]);
            return;
        }
        let cancelled = false;
        api.cases
            .list({ client: form.client, page_size: 100 })
            .then((page) => {
                if (!cancelled) setCases(page.results);
            })
            .catch((error: unknown) => toast.error(describeError(error)));
        return () => {
            cancelled = true;
        };
    }, [api, open, form.client]);

    const totals = useMemo(
        () =>
            computeTotals(
                form.items.map((item) => ({
                    amount: lineAmount({ quantity: toNumber(item.quantity), unit_price: toNumber(item.unit_price) }),
                    tax_rate: toNumber(item.tax_rate),
                })),
            ),
        [form.items],
    );

    const setField = (field: Exclude<keyof FormState, "items">, value: string) =>
        setForm((prev) => ({ ...prev, [field]: value }));

    const setItem = (key: string, field: Exclude<keyof ItemDraft, "key">, value: string) =>
        setForm((prev) => ({
            ...prev,
            items: prev.items.map((item) => (item.key === key ? { ...item, [field]: value } : item)),
        }));

    const handleSubmit = async (e: React.FormEvent) => {
        e.preventDefault();
        const payload = {
            client: form.client,
            case: form.case || null,
            invoice_number: form.invoice_number,
            issue_date: form.issue_date,
            due_date: form.due_date,
            notes: form.notes,
            items: form.items.map(({ description, quantity, unit_price, tax_rate }) => ({
                description,
                quantity,
                unit_price,
                tax_rate: tax_rate || "0",
            })),
        };

        setSaving(true);
        try {
            const saved = existing ? await api.invoices.update(existing.id, payload) : await api.invoices.create(payload);
            toast.success(existing ? "Invoice updated." : `Invoice ${saved.invoice_number} created.`);
            onSaved(saved);
            onOpenChange(false);
        } catch (error) {
            if (error instanceof ApiError) setErrors(error.fieldErrors);
            toast.error(describeError(error));
        } finally {
            setSaving(false);
        }
    };

    return (
        <Dialog open={open} onOpenChange={onOpenChange}>
            <DialogContent className="max-w-3xl">
                <DialogHeader>
                    <DialogTitle>{existing ? `Edit ${existing.invoice_number}` : "New invoice"}</DialogTitle>
                </DialogHeader>
                <form onSubmit={handleSubmit} className="space-y-6">
                    <div className="grid grid-cols-1 gap-4 sm:grid-cols-2">
                        <FormField id="invoice-client" label="Client" required errors={errors.client}>
                            <Select
                                id="invoice-client"
                                value={form.client}
                                onChange={(e) => setForm((prev) => ({ ...prev, client: e.target.value, case: "" }))}
                            >
                                <option value="">Select a client</option>
                                {existing && !clients.some((c) => c.id === existing.client) && (
                                    <option value={existing.client}>{existing.client_name ?? "Current client"}</option>
                                )}
                                {clients.map((c) => (
                                    <option key={c.id} value={c.id}>{fullName(c)}</option>
                                ))}
                            </Select>
                        </FormField>
                        <FormField id="invoice-case" label="Case" errors={errors.case}>
                            <Select id="invoice-case" value={form.case} onChange={(e) => setField("case", e.target.value)}>
                                <option value="">No case</option>
                                {cases.map((c) => (
                                    <option key={c.id} value={c.id}>{c.title}</option>
                                ))}
                            </Select>
                        </FormField>
                        <FormField id="invoice-number" label="Invoice number" errors={errors.invoice_number}>
                            <Input
                                id="invoice-number"
                                placeholder="Assigned automatically"
                                value={form.invoice_number}
                                onChange={(e) => setField("invoice_number", e.target.value)}
                            />
                        </FormField>
                        <div className="grid grid-cols-2 gap-4">
                            <FormField id="invoice-issue" label="Issued" errors={errors.issue_date}>
                                <Input id="invoice-issue" type="date" value={form.issue_date} onChange={(e) => setField("issue_date", e.target.value)} />
                            </FormField>
                            <FormField id="invoice-due" label="Due" required errors={errors.due_date}>
                                <Input id="invoice-due" type="date" value={form.due_date} onChange={(e) => setField("due_date", e.target.value)} />
                            </FormField>
                        </div>
                    </div>

                    <div className="space-y-2">
                        <div className="flex items-center justify-between">
                            <h4 className="text-sm font-semibold">Line items</h4>
                            <Button
                                type="button"
                                size="sm"
                                variant="outline"
                                onClick={() => setForm((prev) => ({ ...prev, items: [...prev.items, blankItem()] }))}
                            >
                                <Plus className="h-4 w-4" /> Add item
                            </Button>
                        </div>
                        {form.items.map((item, index) => (
                            <div key={item.key} className="grid grid-cols-12 items-start gap-2">
                                <Input
                                    aria-label={`Item ${index + 1} description`}
                                    className="col-span-12 sm:col-span-5"
                                    placeholder="Description"
                                    value={item.description}
                                    onChange={(e) => setItem(item.key, "description", e.target.value)}
                                />
                                <Input
                                    aria-label={`Item ${index + 1} quantity`}
                                    className="col-span-3 sm:col-span-2"
                                    inputMode="decimal"
                                    value={item.quantity}
                                    onChange={(e) => setItem(item.key, "quantity", e.target.value)}
                                />
                                <Input
                                    aria-label={`Item ${index + 1} unit price`}
                                    className="col-span-4 sm:col-span-2"
                                    inputMode="decimal"
                                    placeholder="Price"
                                    value={item.unit_price}
                                    onChange={(e) => setItem(item.key, "unit_price", e.target.value)}
                                />
                                <Input
                                    aria-label={`Item ${index + 1} tax rate`}
                                    className="col-span-3 sm:col-span-2"
                                    inputMode="decimal"
                                    placeholder="Tax %"
                                    value={item.tax_rate}
                                    onChange={(e) => setItem(item.key, "tax_rate", e.target.value)}
                                />
                                <Button
                                    type="button"
                                    variant="ghost"
                                    size="icon"
                                    className="col-span-2 sm:col-span-1"
                                    aria-label={`Remove item ${index + 1}`}
                                    onClick={() => setForm((prev) => ({ ...prev, items: prev.items.filter((i) => i.key !== item.key) }))}
                                >
                                    <Trash2 className="h-4 w-4" />
                                </Button>
                                {Object.entries(errors)
                                    .filter(([field]) => field.startsWith(`items.${index}.`))
                                    .map(([field, messages]) => (
                                        <p key={field} role="alert" className="col-span-12 text-xs text-destructive">
                                            {field.slice(`items.${index}.`.length).replace("_", " ")}: {messages.join(" ")}
                                        </p>
                                    ))}
                            </div>
                        ))}
                        <dl className="ml-auto w-full max-w-xs space-y-1 pt-2 text-sm">
                            <div className="flex justify-between">
                                <dt className="text-muted-foreground">Subtotal</dt>
                                <dd>{formatCurrency(totals.subtotal)}</dd>
                            </div>
                            <div className="flex justify-between">
                                <dt className="text-muted-foreground">Tax</dt>
                                <dd>{formatCurrency(totals.tax_amount)}</dd>
                            </div>
                            <div className="flex justify-between font-semibold">
                                <dt>Total</dt>
                                <dd>{formatCurrency(totals.total)}</dd>
                            </div>
                        </dl>
                    </div>

                    <FormField id="invoice-notes" label="Notes" errors={errors.notes}>
                        <Textarea id="invoice-notes" value={form.notes} onChange={(e) => setField("notes", e.target.value)} />
                    </FormField>

                    <DialogFooter>
                        <Button type="button" variant="outline" onClick={() => onOpenChange(false)}>
                            Cancel
                        </Button>
                        <Button type="submit" disabled={saving}>
                            {saving && <Loader2 className="h-4 w-4 animate-spin" />}
                            Save
                        </Button>
                    </DialogFooter>
                </form>
            </DialogContent>
        </Dialog>
    );
}
