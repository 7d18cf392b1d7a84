"use client";

import { useEffect, useState } from "react";
import { toast } from "sonner";
import { useApi } from "@/components/ApiProvider";
import type { ClientDto } from "@/lib/api-types";
import { describeError } from "@/lib/view-models";

/** Active clients for the client pickers of the case, appointment and invoice forms. */
export function useClientOptions(enabled: boolean): ClientDto[] {
    const api = useApi();
    const [clients, setClients] = useState<ClientDto[]>([]);

    useEffect(() => {
        if (!enabled) return;
        let cancelled = false;
        api.clients
            .list({ is_active: true, page_size: 100 })
            .then((page) => {
                if (!cancelled) setClients(page.results);
            })
            .catch((error: unknown) => toast.error(describeError(error)));
        return () => {
            cancelled = true;
        };
    }, [api, enabled]);

    return clients;
}
