"use client";

import { useEffect, useState } from "react";
import { Loader2 } from "lucide-react";
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
import type { CaseDto, CaseStatus } from "@/lib/api-types";
import { CASE_STATUS_LABELS, fullName } from "@/lib/labels";
import { CASE_STATUSES } from "@/lib/types";
import { describeError } from "@/lib/view-models";

interface FormState {
    title: string;
    description: string;
    client: string;
    status: CaseStatus;
}

function toFormState(existing?: CaseDto | null, clientId = ""): FormState {
    return {
        title: existing?.title ?? "",
        description: existing?.description ?? "",
        client: existing?.client ?? clientId,
        status: existing?.status ?? "open",
    };
}

function parseStatus(value: string): CaseStatus {
    return CASE_STATUSES.find((s) => s === value) ?? "open";
}

interface CaseFormDialogProps {
    open: boolean;
    onOpenChange: (open: boolean) => void;
    existing?: CaseDto | null;
    onSaved: (saved: CaseDto) => void;
}

export function CaseFormDialog({ open, onOpenChange, existing, onSaved }: CaseFormDialogProps) {
    const api = useApi();
    const clients = useClientOptions(open);
    const [form, setForm] = useState<FormState>(() => toFormState(existing));
    const [errors, setErrors] = useState<Record<string, string[]>>({});
    const [saving, setSaving] = useState(false);

    useEffect(() => {
        if (open) {
            setForm(toFormState(existing));
            setErrors({});
        }
    }, [open, existing]);

    const handleSubmit = async (e: React.FormEvent) => {
        e.preventDefault();
        setSaving(true);
        try {
            const saved = existing ? await api.cases.update(existing.id, form) : await api.cases.create(form);
            toast.success(existing ? "Case updated." : "Case opened.");
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
            <DialogContent>
                <DialogHeader>
                    <DialogTitle>{existing ? "Edit case" : "New case"}</DialogTitle>
                </DialogHeader>
                <form onSubmit={handleSubmit} className="space-y-4">
                    <FormField id="case-title" label="Title" required errors={errors.title}>
                        <Input
                            id="case-title"
                            value={form.title}
                            onChange={(e) => setForm((prev) => ({ ...prev, title: e.target.value }))}
                        />
                    </FormField>
                    <FormField id="case-client" label="Client" required errors={errors.client}>
                        <Select
                            id="case-client"
                            value={form.client}
                            onChange={(e) => setForm((prev) => ({ ...prev, client: e.target.value }))}
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
                    <FormField id="case-status" label="Status" errors={errors.status}>
                        <Select
                            id="case-status"
                            value={form.status}
                            onChange={(e) => setForm((prev) => ({ ...prev, status: parseStatus(e.target.value) }))}
                        >
                            {CASE_STATUSES.map((status) => (
                                <option key={status} value={status}>{CASE_STATUS_LABELS[status]}</option>
                            ))}
                        </Select>
                    </FormField>
                    <FormField id="case-description" label="Description" errors={errors.description}>
                        <Textarea
                            id="case-description"
                            value={form.description}
                            onChange={(e) => setForm((prev) => ({ ...prev, description: e.target.value }))}
                        />
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
