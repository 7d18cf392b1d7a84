import type { Metadata } from "next";
import type { ReactNode } from "react";
import { Toaster } from "sonner";
import { ApiProvider } from "@/components/ApiProvider";
import { AppShell } from "@/components/AppShell";
import "./globals.css";

export const metadata: Metadata = {
    title: "Law Office Manager",
    description: "Clients, cases, appointments and billing for a law office.",
};

export default function RootLayout({ children }: { children: ReactNode }) {
    return (
        <html lang="en">
            <body>
                <ApiProvider>
                    <AppShell>{children}</AppShell>
                </ApiProvider>
                <Toaster richColors position="top-right" />
            </body>
        </html>
    );
}
