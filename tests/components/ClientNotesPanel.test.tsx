import { act } from "react";
import { createRoot, type Root } from "react-dom/client";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ApiClient, MemoryTokenStore } from "@/lib/api-client";
import type { ClientNoteDto } from "@/lib/api-types";

const toastMock = vi.hoisted(() => ({ success: vi.fn(), error: vi.fn() }));

vi.mock("sonner", () => ({ toast: toastMock }));

vi.mock("next/navigation", () => ({
    useRouter: () => ({ replace: vi.fn(), push: vi.fn(), back: vi.fn(), refresh: vi.fn(), prefetch: vi.fn() }),
    usePathname: () => "/clients/client-1",
    useParams: () => ({ id: "client-1" }),
}));

import { ApiProvider } from "@/components/ApiProvider";
import { ClientNotesPanel } from "@/components/ClientNotesPanel";

type FetchInput = string | URL | Request;

const AUTHOR = { id: "user-1", email: "lawyer@example.com", first_name: "Dana", last_name: "Reyes", full_name: "Dana Reyes" };

function note(id: string, title: string, content: string): ClientNoteDto {
    return {
        id,
        client: "client-1",
        title,
        content,
        created_by: AUTHOR,
        created_at: "2030-01-10T09:00:00.000Z",
        updated_at: "2030-01-10T09:00:00.000Z",
    };
}

function jsonResponse(status: number, body: unknown) {
    return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function typeInto(element: HTMLInputElement | HTMLTextAreaElement, value: string) {
    const prototype = element instanceof HTMLTextAreaElement ? HTMLTextAreaElement.prototype : HTMLInputElement.prototype;
    Object.getOwnPropertyDescriptor(prototype, "value")?.set?.call(element, value);
    element.dispatchEvent(new Event("input", { bubbles: true }));
}

describe("ClientNotesPanel", () => {
    let container: HTMLDivElement;
    let root: Root | null = null;

    beforeEach(() => {
        Reflect.set(globalThis, "IS_REACT_ACT_ENVIRONMENT", true);
        container = document.createElement("div");
        document.body.appendChild(container);
        root = createRoot(container);
        toastMock.success.mockReset();
        toastMock.error.mockReset();
    });

    afterEach(() => {
        act(() => {
            root?.unmount();
        });
        root = null;
        container.remove();
    });

    async function renderPanel(fetchImpl: (input: FetchInput, init?: RequestInit) => Promise<Response>) {
        const client = new ApiClient({ baseUrl: "/api", tokenStore: new MemoryTokenStore(), fetchImpl });
        await act(async () => {
            root?.render(
                <ApiProvider client={client}>
                    <ClientNotesPanel clientId="client-1" />
                </ApiProvider>,
            );
        });
        await flush();
    }

    async function flush(iterations = 3) {
        for (let i = 0; i < iterations; i += 1) {
            await act(async () => {
                await new Promise((resolve) => setTimeout(resolve, 0));
            });
        }
    }

    function noteTitles() {
        return Array.from(container.querySelectorAll("li p.font-medium")).map((p) => p.textContent);
    }

    function findButton(label: string) {
        return Array.from(container.querySelectorAll("button")).find((button) => button.textContent?.trim() === label);
    }

    it("lists the client's notes", async () => {
        const fetchImpl = vi.fn(async (_input: FetchInput, _init?: RequestInit) =>
            jsonResponse(200, {
                count: 2,
                next: null,
                previous: null,
                results: [note("n-2", "Follow-up call", "Asked for the lease."), note("n-1", "Intake", "First meeting.")],
            }),
        );

        await renderPanel(fetchImpl);

        expect(fetchImpl.mock.calls[0][0]).toBe("/api/clients/client-1/notes/?page_size=100");
        expect(noteTitles()).toEqual(["Follow-up call", "Intake"]);
        expect(container.textContent).toContain("by Dana Reyes");
    });

    it("shows an empty message when there are no notes", async () => {
        await renderPanel(async () => jsonResponse(200, { count: 0, next: null, previous: null, results: [] }));

        expect(container.textContent).toContain("No notes yet.");
    });

    it("adds a note to the top of the list and clears the form", async () => {
        const fetchImpl = vi.fn(async (_input: FetchInput, init?: RequestInit) => {
            if (init?.method === "POST") {
                return jsonResponse(201, note("n-3", "Court date", "Hearing moved to March."));
            }
            return jsonResponse(200, { count: 1, next: null, previous: null, results: [note("n-1", "Intake", "First meeting.")] });
        });
        await renderPanel(fetchImpl);

        const title = container.querySelector<HTMLInputElement>("input[aria-label='Note title']");
        const content = container.querySelector<HTMLTextAreaElement>("textarea[aria-label='Note content']");
        if (!title || !content) {
            throw new Error("note form not rendered");
        }
        expect(findButton("Add note")?.disabled).toBe(true);

        await act(async () => {
            typeInto(title, "Court date");
            typeInto(content, "Hearing moved to March.");
        });
        expect(findButton("Add note")?.disabled).toBe(false);

        await act(async () => {
            title.form?.dispatchEvent(new Event("submit", { bubbles: true, cancelable: true }));
        });
        await flush();

        const [url, init] = fetchImpl.mock.calls[1];
        expect(url).toBe("/api/clients/client-1/notes/");
        expect(init?.method).toBe("POST");
        expect(JSON.parse(String(init?.body))).toEqual({ title: "Court date", content: "Hearing moved to March." });
        expect(noteTitles()).toEqual(["Court date", "Intake"]);
        expect(title.value).toBe("");
        expect(content.value).toBe("");
        expect(toastMock.success).toHaveBeenCalledWith("Note added.");
    });

    it("reports a failed load through a toast", async () => {
        await renderPanel(async () => jsonResponse(500, { detail: "boom" }));

        expect(toastMock.error).toHaveBeenCalledWith("The server hit an error. Please try again.");
        expect(container.textContent).toContain("No notes yet.");
    });
});
