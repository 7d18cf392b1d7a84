import { afterEach, beforeEach, vi } from "vitest";
import { setDb } from "@/lib/database";
import { setServerConfig } from "@/lib/config";

process.env.JWT_SECRET = "test-secret";

beforeEach(() => {
    // Request logs are asserted explicitly where they matter.
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
    vi.restoreAllMocks();
    setDb(null);
    setServerConfig(null);
});
