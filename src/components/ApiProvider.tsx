"use client";

import { createContext, useCallback, useContext, useEffect, useMemo, useState, type ReactNode } from "react";
import { useRouter } from "next/navigation";
import { toast } from "sonner";
import { ApiClient } from "@/lib/api-client";
import type { ProfileDto } from "@/lib/api-types";

export type SessionStatus = "loading" | "authenticated" | "anonymous";

interface ApiContextValue {
    api: ApiClient;
    user: ProfileDto | null;
    status: SessionStatus;
    login: (email: string, password: string) => Promise<void>;
    logout: () => Promise<void>;
    setUser: (user: ProfileDto) => void;
}

const ApiContext = createContext<ApiContextValue | null>(null);

interface ApiProviderProps {
    children: ReactNode;
    /** Injected in tests; the app builds its own from the NEXT_PUBLIC_* settings. */
    client?: ApiClient;
}

export function ApiProvider({ children, client }: ApiProviderProps) {
    const router = useRouter();
    const [api] = useState(() => client ?? new ApiClient());
    const [user, setUserState] = useState<ProfileDto | null>(null);
    const [status, setStatus] = useState<SessionStatus>("loading");

    useEffect(() => {
        api.setSessionExpiredHandler(() => {
            setUserState(null);
            setStatus("anonymous");
            toast.error("Your session has expired. Please sign in again.");
            router.replace("/login");
        });
        return () => api.setSessionExpiredHandler(undefined);
    }, [api, router]);

    // Restore the session from stored tokens
    useEffect(() => {
        if (!api.isAuthenticated()) {
            setStatus("anonymous");
            return;
        }

        let cancelled = false;
        api.auth
            .profile()
            .then((profile) => {
                if (cancelled) return;
                setUserState(profile);
                setStatus("authenticated");
            })
            .catch((error: unknown) => {
                console.error("[auth] Failed to restore session:", error);
                if (!cancelled) setStatus("anonymous");
            });
        return () => {
            cancelled = true;
        };
    }, [api]);

    const login = useCallback(
        async (email: string, password: string) => {
            const signedIn = await api.auth.login(email, password);
            setUserState(signedIn);
            setStatus("authenticated");
        },
        [api],
    );

    const logout = useCallback(async () => {
        try {
            await api.auth.logout();
        } catch (error) {
            // Local tokens are cleared by the client either way.
            console.warn("[auth] Logout request failed:", error);
        } finally {
            setUserState(null);
            setStatus("anonymous");
            router.replace("/login");
        }
    }, [api, router]);

    const value = useMemo<ApiContextValue>(
        () => ({ api, user, status, login, logout, setUser: setUserState }),
        [api, user, status, login, logout],
    );

    return <ApiContext.Provider value={value}>{children}</ApiContext.Provider>;
}

export function useSession(): ApiContextValue {
    const context = useContext(ApiContext);
    if (!context) {
        throw new Error("useSession must be used inside <ApiProvider>");
    }
    return context;
}

export function useApi(): ApiClient {
    return useSession().api;
}
