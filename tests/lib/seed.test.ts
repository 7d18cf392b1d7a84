import { describe, expect, it } from "vitest";
import { createMemoryDb } from "@/lib/database";
import { verifyPassword } from "@/lib/auth/passwords";
import { seedSampleData } from "@/lib/services/seed";

describe("seedSampleData", () => {
    it("creates the demo data once", async () => {
        const db = createMemoryDb();
        const now = new Date(2030, 0, 15, 8, 0, 0);

        const first = await seedSampleData(db, now);
        const second = await seedSampleData(db, now);

        expect(first).toEqual({ users: 3, clients: 5, appointments: 5 });
        expect(second).toEqual({ users: 0, clients: 0, appointments: 0 });
        expect(db.data.users.map((u) => u.user_type).sort()).toEqual(["admin", "lawyer", "paralegal"]);
        expect(db.data.clients).toHaveLength(5);
        expect(db.data.client_notes.map((n) => n.title)).toEqual(Array(5).fill("Initial Consultation"));
        expect(db.data.appointments).toHaveLength(5);
    });

    it("schedules one-hour slots on the following days", async () => {
        const db = createMemoryDb();
        const now = new Date(2030, 0, 15, 8, 0, 0);

        await seedSampleData(db, now);

        const [first] = db.data.appointments;
        expect(new Date(first.start_time)).toEqual(new Date(2030, 0, 16, 10, 0, 0));
        expect(new Date(first.end_time)).toEqual(new Date(2030, 0, 16, 11, 0, 0));
        expect(first.status).toBe("scheduled");
    });

    it("hashes the sample passwords", async () => {
        const db = createMemoryDb();
        await seedSampleData(db);

        const admin = db.data.users.find((u) => u.email === "admin@lawfirm.com");
        expect(admin?.password_hash).not.toBe("admin123");
        expect(await verifyPassword("admin123", admin?.password_hash ?? "")).toBe(true);
    });
});
