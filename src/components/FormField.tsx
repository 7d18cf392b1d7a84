import type { ReactNode } from "react";
import { Label } from "@/components/ui/label";
import { cn } from "@/lib/utils";

interface FormFieldProps {
    id: string;
    label: string;
    required?: boolean;
    /** Messages from a 400 answer for this field. */
    errors?: string[];
    className?: string;
    children: ReactNode;
}

export function FormField({ id, label, required, errors, className, children }: FormFieldProps) {
    return (
        <div className={cn("space-y-2", className)}>
            <Label htmlFor={id}>
                {label}
                {required && <span className="ml-0.5 text-destructive">*</span>}
            </Label>
            {children}
            {errors?.map((message) => (
                <p key={message} id={`${id}-error`} role="alert" className="text-xs text-destructive">
                    {message}
                </p>
            ))}
        </div>
    );
}
