"use client";

import { useEffect, useState, type ReactNode } from "react";
import Link from "next/link";
import { usePathname, useRouter } from "next/navigation";
import {
    Briefcase, CalendarDays, LayoutDashboard, Loader2, LogOut, Menu, Receipt, Scale, UserCircle, Users, X,
} from "lucide-react";
import { Button } from "@/components/ui/button";
import { useSession } from "@/components/ApiProvider";
import { USER_TYPE_LABELS, fullName } from "@/lib/labels";
import { cn } from "@/lib/utils";
import { initials } from "@/lib/view-models";

const NAV_ITEMS = [
    { href: "/", label: "Dashboard", icon: LayoutDashboard },
    { href: "/clients", label: "Clients", icon: Users },
    { href: "/cases", label: "Cases", icon: Briefcase },
    { href: "/appointments", label: "Appointments", icon: CalendarDays },
    { href: "/billing", label: "Billing", icon: Receipt },
    { href: "/profile", label: "Profile", icon: UserCircle },
];

const PUBLIC_PATHS = ["/login"];

function isActive(pathname: string, href: string) {
    const path = pathname.replace(/\/+$/, "") || "/";
    return href === "/" ? path === "/" : path === href || path.startsWith(`${href}/`);
}

function NavLinks({ pathname, onNavigate }: { pathname: string; onNavigate?: () => void }) {
    return (
        <nav className="flex flex-col gap-1">
            {NAV_ITEMS.map(({ href, label, icon: Icon }) => (
                <Link
                    key={href}
                    href={href}
                    onClick={onNavigate}
                    className={cn(
                        "flex items-center gap-3 rounded-md px-3 py-2 text-sm font-medium transition-colors",
                        isActive(pathname, href)
                            ? "bg-primary text-primary-foreground"
                            : "text-muted-foreground hover:bg-accent hover:text-accent-foreground",
                    )}
                >
                    <Icon className="h-4 w-4" />
                    {label}
                </Link>
            ))}
        </nav>
    );
}

/** Sidebar layout on desktop, collapsible top bar on narrow screens. Signed-out visitors go to /login. */
export function AppShell({ children }: { children: ReactNode }) {
    const pathname = usePathname() ?? "/";
    const router = useRouter();
    const { user, status, logout } = useSession();
    const [mobileOpen, setMobileOpen] = useState(false);

    const isPublic = PUBLIC_PATHS.some((p) => isActive(pathname, p));

    useEffect(() => {
        if (status === "anonymous" && !isPublic) {
            router.replace("/login");
        }
    }, [status, isPublic, router]);

    if (isPublic) {
        return <>{children}</>;
    }

    if (status !== "authenticated" || !user) {
        return (
            <div className="flex min-h-screen items-center justify-center">
                <Loader2 className="h-8 w-8 animate-spin text-muted-foreground" />
            </div>
        );
    }

    const account = (
        <div className="space-y-3 border-t pt-4">
            <div className="flex items-center gap-3 px-3">
                <span className="flex h-9 w-9 items-center justify-center rounded-full bg-primary text-xs font-semibold text-primary-foreground">
                    {initials(user)}
                </span>
                <div>
                    <p className="text-sm font-medium">{fullName(user)}</p>
                    <p className="text-xs text-muted-foreground">{USER_TYPE_LABELS[user.user_type]}</p>
                </div>
            </div>
            <Button variant="ghost" className="w-full justify-start" onClick={() => void logout()}>
                <LogOut className="h-4 w-4" /> Sign out
            </Button>
        </div>
    );

    return (
        <div className="min-h-screen bg-slate-50 lg:flex">
            <aside className="hidden w-64 shrink-0 flex-col justify-between border-r bg-background p-4 lg:flex">
                <div className="space-y-6">
                    <Link href="/" className="flex items-center gap-2 px-3 text-lg font-bold">
                        <Scale className="h-5 w-5" /> Law Office
                    </Link>
                    <NavLinks pathname={pathname} />
                </div>
                {account}
            </aside>

            <header className="border-b bg-background lg:hidden">
                <div className="flex items-center justify-between p-4">
                    <Link href="/" className="flex items-center gap-2 font-bold">
                        <Scale className="h-5 w-5" /> Law Office
                    </Link>
                    <Button
                        variant="ghost"
                        size="icon"
                        aria-label={mobileOpen ? "Close menu" : "Open menu"}
                        onClick={() => setMobileOpen((open) => !open)}
                    >
                        {mobileOpen ? <X className="h-5 w-5" /> : <Menu className="h-5 w-5" />}
                    </Button>
                </div>
                {mobileOpen && (
                    <div className="space-y-4 px-4 pb-4">
                        <NavLinks pathname={pathname} onNavigate={() => setMobileOpen(false)} />
                        {account}
                    </div>
                )}
            </header>

            <main className="flex-1">{children}</main>
        </div>
    );
}
