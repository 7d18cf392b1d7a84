"use client";

import { useEffect, useState } from "react";
import { addHours, format, startOfHour } from "date-fns";
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
import type { AppointmentDto } from "@/lib/api-types";
import { fullName } from "@/lib/labels";
import { describeError, fromDateTimeInput, toDateTimeInput } from "@/lib/view-models";

interface FormState {
    title: string;
    client: string;
    start: string;
    end: string;
    location: string;
    description: string;
    notes: string;
}

const INPUT_FORMAT = "yyyy-MM-dd'T'HH:mm";

function toFormState(existing?: AppointmentDto | null): FormState {
    if (existing) {
        return {
            title: existing.title,
            client: existing.client ?? "",
            start: toDateTimeInput(existing.start_time),
            end: toDateTimeInput(existing.end_time),
            location: existing.location,
            description: existing.description,
            notes: existing.notes,
        };
    }
    // Next full hour, one hour long
    const start = addHours(startOfHour(new Date()), 1);
    return {
        title: "",
        client: "",
        start: format(start, INPUT_FORMAT),
        end: format(addHours(start, 1), INPUT_FORMAT),
        location: "",
        description: "",
        notes: "",
    };
}

interface AppointmentFormDialogProps {
    open: boolean;
    onOpenChange: (open: boolean) => void;
    existing?: AppointmentDto | null;
    onSaved: (saved: AppointmentDto) => void;
}

export function AppointmentFormDialog({ open, onOpenChange, existing, onSaved }: AppointmentFormDialogProps) {
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

    const update = (field: keyof FormState) => (e: React.ChangeEvent<HTMLInputElement | HTMLTextAreaElement | HTMLSelectElement>) =>
        setForm((prev) => ({ ...prev, [field]: e.target.value }));

    const handleSubmit = async (e: React.FormEvent) => {
        e.preventDefault();
        const payload = {
            title: form.title,
            client: form.client || null,
            start_time: fromDateTimeInput(form.start),
            end_time: fromDateTimeInput(form.end),
            location: form.location,
            description: form.description,
            notes: form.notes,
        };

        setSaving(true);
        try {
            const saved = existing
                ? await api.appointments.update(existing.id, payload)
                : await api.appointments.create(payload);
            toast.success(existing ? "Appointment updated." : "Appointment scheduled.");
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
                    <DialogTitle>{existing ? "Edit appointment" : "New appointment"}</DialogTitle>
                </DialogHeader>
                <form onSubmit={handleSubmit} className="space-y-4">
                    <FormField id="appointment-title" label="Title" required errors={errors.title}>
                        <Input id="appointment-title" value={form.title} onChange={update("title")} />
                    </FormField>
                    <FormField id="appointment-client" label="Client" errors={errors.client}>
                        <Select id="appointment-client" value={form.client} onChange={update("client")}>
                            <option value="">No client</option>
                            {existing?.client && !clients.some((c) => c.id === existing.client) && (
                                <option value={existing.client}>{existing.client_name ?? "Current client"}</option>
                            )}
                            {clients.map((c) => (
                                <option key={c.id} value={c.id}>{fullName(c)}</option>
                            ))}
                        </Select>
                    </FormField>
                    <div className="grid grid-cols-1 gap-4 sm:grid-cols-2">
                        <FormField id="appointment-start" label="Starts" required errors={errors.start_time}>
                            <Input id="appointment-start" type="datetime-local" value={form.start} onChange={update("start")} />
                        </FormField>
                        <FormField id="appointment-end" label="Ends" required errors={errors.end_time}>
                            <Input id="appointment-end" type="datetime-local" value={form.end} onChange={update("end")} />
                        </FormField>
                    </div>
                    <FormField id="appointment-location" label="Location" errors={errors.location}>
                        <Input id="appointment-location" value={form.location} onChange={update("location")} />
                    </FormField>
                    <FormField id="appointment-description" label="Description" errors={errors.description}>
                        <Textarea id="appointment-description" value={form.description} onChange={update("description")} />
                    </FormField>
                    <FormField id="appointment-notes" label="Notes" errors={errors.notes}>
                        <Textarea id="appointment-notes" value={form.notes} onChange={update("notes")} />
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
