"use client";

import { useEffect, useState } from "react";
import { Loader2 } from "lucide-react";
import { toast } from "sonner";
import { Button } from "@/components/ui/button";
import { Dialog, DialogContent, DialogFooter, DialogHeader, DialogTitle } from "@/components/ui/dialog";
import { Input } from "@/components/ui/input";
import { FormField } from "@/components/FormField";
import { useApi } from "@/components/ApiProvider";
import { ApiError } from "@/lib/api-client";
import type { ClientDto } from "@/lib/api-types";
import { describeError } from "@/lib/view-models";

const FIELDS = [
    { name: "first_name", label: "First name", required: true },
    { name: "last_name", label: "Last name", required: true },
    { name: "email", label: "Email", type: "email" },
    { name: "phone", label: "Phone", type: "tel" },
    { name: "address", label: "Address", wide: true },
    { name: "city", label: "City" },
    { name: "state", label: "State" },
    { name: "postal_code", label: "Postal code" },
    { name: "country", label: "Country" },
    { name: "date_of_birth", label: "Date of birth", type: "date" },
    { name: "occupation", label: "Occupation" },
    { name: "company", label: "Company" },
] as const;

type FieldName = (typeof FIELDS)[number]["name"];
type FormState = Record<FieldName, string>;

function toFormState(client?: ClientDto | null): FormState {
    return {
        first_name: client?.first_name ?? "",
        last_name: client?.last_name ?? "",
        email: client?.email ?? "",
        phone: client?.phone ?? "",
        address: client?.address ?? "",
        city: client?.city ?? "",
        state: client?.state ?? "",
        postal_code: client?.postal_code ?? "",
        country: client?.country ?? "",
        date_of_birth: client?.date_of_birth ?? "",
        occupation: client?.occupation ?? "",
        company: client?.company ?? "",
    };
}

interface ClientFormDialogProps {
    open: boolean;
    onOpenChange: (open: boolean) => void;
    /** Edits this client when given, creates one otherwise. */
    client?: ClientDto | null;
    onSaved: (client: ClientDto) => void;
}

export function ClientFormDialog({ open, onOpenChange, client, onSaved }: ClientFormDialogProps) {
    const api = useApi();
    const [form, setForm] = useState<FormState>(() => toFormState(client));
    const [errors, setErrors] = useState<Record<string, string[]>>({});
    const [saving, setSaving] = useState(false);

    useEffect(() => {
        if (open) {
            setForm(toFormState(client));
            setErrors({});
        }
    }, [open, client]);

    const handleSubmit = async (e: React.FormEvent) => {
        e.preventDefault();
        setSaving(true);
        try {
            const saved = client ? await api.clients.update(client.id, form) : await api.clients.create(form);
            toast.success(client ? "Client updated." : "Client created.");
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
            <DialogContent className="max-w-2xl">
                <DialogHeader>
                    <DialogTitle>{client ? "Edit client" : "New client"}</DialogTitle>
                </DialogHeader>
                <form onSubmit={handleSubmit} className="space-y-6">
                    <div className="grid grid-cols-1 gap-4 sm:grid-cols-2">
                        {FIELDS.map((field) => (
                            <FormField
                                key={field.name}
                                id={`client-${field.name}`}
                                label={field.label}
                                required={"required" in field}
                                errors={errors[field.name]}
                                className={"wide" in field ? "sm:col-span-2" : undefined}
                            >
                                <Input
                                    id={`client-${field.name}`}
                                    type={"type" in field ? field.type : "text"}
                                    value={form[field.name]}
                                    onChange={(e) => setForm((prev) => ({ ...prev, [field.name]: e.target.value }))}
                                />
                            </FormField>
                        ))}
                    </div>
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
