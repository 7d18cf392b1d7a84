"use client";

import { useEffect, useState } from "react";
import { KeyRound, Loader2, Save } from "lucide-react";
import { toast } from "sonner";
import { Button } from "@/components/ui/button";
import { Input } from "@/components/ui/input";
import { Textarea } from "@/components/ui/textarea";
import { Badge } from "@/components/ui/badge";
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from "@/components/ui/card";
import { FormField } from "@/components/FormField";
import { useSession } from "@/components/ApiProvider";
import { ApiError } from "@/lib/api-client";
import type { ProfileDto } from "@/lib/api-types";
import { USER_TYPE_LABELS } from "@/lib/labels";
import { describeError } from "@/lib/view-models";

interface ProfileForm {
    first_name: string;
    last_name: string;
    phone: string;
    address: string;
    date_of_birth: string;
}

function toProfileForm(user: ProfileDto | null): ProfileForm {
    return {
        first_name: user?.first_name ?? "",
        last_name: user?.last_name ?? "",
        phone: user?.phone ?? "",
        address: user?.address ?? "",
        date_of_birth: user?.date_of_birth ?? "",
    };
}

const EMPTY_PASSWORDS = { old_password: "", new_password: "", confirm: "" };

export default function ProfilePage() {
    const { api, user, setUser } = useSession();
    const [form, setForm] = useState<ProfileForm>(() => toProfileForm(user));
    const [errors, setErrors] = useState<Record<string, string[]>>({});
    const [saving, setSaving] = useState(false);
    const [passwords, setPasswords] = useState(EMPTY_PASSWORDS);
    const [passwordErrors, setPasswordErrors] = useState<Record<string, string[]>>({});
    const [changing, setChanging] = useState(false);

    useEffect(() => {
        setForm(toProfileForm(user));
    }, [user]);

    const update = (field: keyof ProfileForm) => (e: React.ChangeEvent<HTMLInputElement | HTMLTextAreaElement>) =>
        setForm((prev) => ({ ...prev, [field]: e.target.value }));

    const handleSave = async (e: React.FormEvent) => {
        e.preventDefault();
        setSaving(true);
        setErrors({});
        try {
            setUser(await api.auth.updateProfile(form));
            toast.success("Profile updated.");
        } catch (error) {
            if (error instanceof ApiError) setErrors(error.fieldErrors);
            toast.error(describeError(error));
        } finally {
            setSaving(false);
        }
    };

    const handleChangePassword = async (e: React.FormEvent) => {
        e.preventDefault();
        if (passwords.new_password !== passwords.confirm) {
            setPasswordErrors({ confirm: ["Passwords do not match."] });
            return;
        }
        setChanging(true);
        setPasswordErrors({});
        try {
            const { message } = await api.auth.changePassword({
                old_password: passwords.old_password,
                new_password: passwords.new_password,
            });
            toast.success(message);
            setPasswords(EMPTY_PASSWORDS);
        } catch (error) {
            if (error instanceof ApiError) setPasswordErrors(error.fieldErrors);
            toast.error(describeError(error));
        } finally {
            setChanging(false);
        }
    };

    if (!user) {
        return (
            <div className="flex justify-center p-12">
                <Loader2 className="h-8 w-8 animate-spin text-muted-foreground" />
            </div>
        );
    }

    return (
        <div className="container mx-auto p-4 md:p-8 space-y-6 max-w-3xl">
            <div>
                <h1 className="text-3xl font-bold tracking-tight">Profile</h1>
                <p className="text-muted-foreground flex items-center gap-2">
                    {user.email}
                    <Badge variant="secondary">{USER_TYPE_LABELS[user.user_type]}</Badge>
                </p>
            </div>

            <Card>
                <CardHeader>
                    <CardTitle>Personal details</CardTitle>
                    <CardDescription>Your email and role are managed by an administrator.</CardDescription>
                </CardHeader>
                <CardContent>
                    <form onSubmit={handleSave} className="grid grid-cols-1 gap-4 md:grid-cols-2">
                        <FormField id="first_name" label="First name" required errors={errors.first_name}>
                            <Input id="first_name" value={form.first_name} onChange={update("first_name")} />
                        </FormField>
                        <FormField id="last_name" label="Last name" required errors={errors.last_name}>
                            <Input id="last_name" value={form.last_name} onChange={update("last_name")} />
                        </FormField>
                        <FormField id="phone" label="Phone" errors={errors.phone}>
                            <Input id="phone" type="tel" value={form.phone} onChange={update("phone")} />
                        </FormField>
                        <FormField id="date_of_birth" label="Date of birth" errors={errors.date_of_birth}>
                            <Input id="date_of_birth" type="date" value={form.date_of_birth} onChange={update("date_of_birth")} />
                        </FormField>
                        <FormField id="address" label="Address" errors={errors.address} className="md:col-span-2">
                            <Textarea id="address" rows={3} value={form.address} onChange={update("address")} />
                        </FormField>
                        <div className="md:col-span-2 flex justify-end">
                            <Button type="submit" disabled={saving}>
                                {saving ? <Loader2 className="h-4 w-4 animate-spin" /> : <Save className="h-4 w-4" />}
                                Save changes
                            </Button>
                        </div>
                    </form>
                </CardContent>
            </Card>

            <Card>
                <CardHeader>
                    <CardTitle>Change password</CardTitle>
                </CardHeader>
                <CardContent>
                    <form onSubmit={handleChangePassword} className="space-y-4">
                        <FormField id="old_password" label="Current password" required errors={passwordErrors.old_password}>
                            <Input
                                id="old_password"
                                type="password"
                                autoComplete="current-password"
                                value={passwords.old_password}
                                onChange={(e) => setPasswords((prev) => ({ ...prev, old_password: e.target.value }))}
                            />
                        </FormField>
                        <FormField id="new_password" label="New password" required errors={passwordErrors.new_password}>
                            <Input
                                id="new_password"
                                type="password"
                                autoComplete="new-password"
                                value={passwords.new_password}
                                onChange={(e) => setPasswords((prev) => ({ ...prev, new_password: e.target.value }))}
                            />
                        </FormField>
                        <FormField id="confirm" label="Confirm new password" required errors={passwordErrors.confirm}>
                            <Input
                                id="confirm"
                                type="password"
                                autoComplete="new-password"
                                value={passwords.confirm}
                                onChange={(e) => setPasswords((prev) => ({ ...prev, confirm: e.target.value }))}
                            />
                        </FormField>
                        <div className="flex justify-end">
                            <Button type="submit" disabled={changing}>
                                {changing ? <Loader2 className="h-4 w-4 animate-spin" /> : <KeyRound className="h-4 w-4" />}
                                Update password
                            </Button>
                        </div>
                    </form>
                </CardContent>
            </Card>
        </div>
    );
}
