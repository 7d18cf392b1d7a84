import { addDays, addHours, startOfDay, subDays } from "date-fns";
import { beforeEach, describe, expect, it } from "vitest";

import appointmentsRoute from "../../pages/api/appointments/index";
import appointmentDetailRoute from "../../pages/api/appointments/[id]/index";
import confirmRoute from "../../pages/api/appointments/[id]/confirm";
import cancelRoute from "../../pages/api/appointments/[id]/cancel";
import completeRoute from "../../pages/api/appointments/[id]/complete";
import calendarRoute from "../../pages/api/appointments/calendar";
import statsRoute from "../../pages/api/appointments/stats";
import upcomingRoute from "../../pages/api/appointments/upcoming";
import todayRoute from "../../pages/api/appointments/today";

import type { Db } from "@/lib/database";
import type { Appointment, AppointmentStatus, Client, User } from "@/lib/types";
import { createAppointment } from "@/lib/services/appointments";
import { createInvoice } from "@/lib/services/invoices";
import { bodyOf, call, listOf, resultsOf } from "../helpers/http";
import { insertClient, setupMemoryDb, signedInUser } from "../helpers/fixtures";

describe("appointment endpoints", () => {
    let db: Db;
    let user: User;
    let token: string;
    let client: Client;

    beforeEach(async () => {
        db = setupMemoryDb();
        ({ user, token } = await signedInUser(db));
        client = insertClient(db, user, { first_name: "Paula", last_name: "Park" });
    });

    function schedule(title: string, start: Date, hours = 1, status: AppointmentStatus = "scheduled", clientId: string | null = client.id): Promise<Appointment> {
        return createAppointment(db, user, {
            title,
            start_time: start.toISOString(),
            end_time: addHours(start, hours).toISOString(),
            status,
            client: clientId,
        });
    }

    describe("create", () => {
        it("stores normalised timestamps and display fields", async () => {
            const res = await call(appointmentsRoute, {
                method: "POST",
                token,
                body: {
                    title: "Consultation",
                    start_time: "2030-01-10T10:00:00Z",
                    end_time: "2030-01-10T11:00:00+00:00",
                    client: client.id,
                },
            });

            expect(res.statusCode).toBe(201);
            expect(res.body).toMatchObject({
                user: user.id,
                client: client.id,
                client_name: "Paula Park",
                case: null,
                title: "Consultation",
                start_time: "2030-01-10T10:00:00.000Z",
                end_time: "2030-01-10T11:00:00.000Z",
                status: "scheduled",
                status_display: "Scheduled",
            });
        });

        it("rejects an end time that is not after the start", async () => {
            const equal = await call(appointmentsRoute, {
                method: "POST",
                token,
                body: { title: "Zero", start_time: "2030-01-10T10:00:00Z", end_time: "2030-01-10T10:00:00Z" },
            });
            const reversed = await call(appointmentsRoute, {
                method: "POST",
                token,
                body: { title: "Backwards", start_time: "2030-01-10T10:00:00Z", end_time: "2030-01-10T09:00:00Z" },
            });

            expect(equal.statusCode).toBe(400);
            expect(equal.body).toEqual({ end_time: ["End time must be after start time."] });
            expect(reversed.statusCode).toBe(400);
            expect(db.data.appointments).toHaveLength(0);
        });

        it("accepts overlapping appointments", async () => {
            const body = { title: "Slot", start_time: "2030-01-10T10:00:00Z", end_time: "2030-01-10T11:00:00Z" };

            const first = await call(appointmentsRoute, { method: "POST", token, body });
            const second = await call(appointmentsRoute, { method: "POST", token, body });

            expect([first.statusCode, second.statusCode]).toEqual([201, 201]);
        });

        it("rejects a client owned by someone else", async () => {
            const other = await signedInUser(db);
            const foreign = insertClient(db, other.user);

            const res = await call(appointmentsRoute, {
                method: "POST",
                token,
                body: { title: "X", start_time: "2030-01-10T10:00:00Z", end_time: "2030-01-10T11:00:00Z", client: foreign.id },
            });

            expect(res.statusCode).toBe(400);
            expect(res.body).toEqual({ client: [`Invalid pk "${foreign.id}" - object does not exist.`] });
        });

        it("rejects a timestamp that is not ISO 8601", async () => {
            const res = await call(appointmentsRoute, {
                method: "POST",
                token,
                body: { title: "X", start_time: "tomorrow", end_time: "2030-01-10T11:00:00Z" },
            });

            expect(res.statusCode).toBe(400);
            expect(res.body).toEqual({ start_time: ["Datetime has wrong format. Use one of these formats instead: YYYY-MM-DDThh:mm[:ss[.uuuuuu]][+HH:MM|-HH:MM|Z]."] });
        });

        it("reads timestamps without an offset as local time", async () => {
            const res = await call(appointmentsRoute, {
                method: "POST",
                token,
                body: { title: "Walk-in", start_time: "2030-01-15T10:00:00", end_time: "2030-01-15T11:00:00" },
            });

            expect(res.statusCode).toBe(201);
            expect(res.body).toMatchObject({
                start_time: new Date(2030, 0, 15, 10).toISOString(),
                end_time: new Date(2030, 0, 15, 11).toISOString(),
            });
        });
    });

    describe("update", () => {
        it("checks a partial update against the stored start", async () => {
            const appointment = await schedule("Review", new Date("2030-01-10T10:00:00.000Z"));

            const res = await call(appointmentDetailRoute, {
                method: "PATCH",
                token,
                query: { id: appointment.id },
                body: { end_time: "2030-01-10T09:30:00Z" },
            });

            expect(res.statusCode).toBe(400);
            expect(res.body).toEqual({ end_time: ["End time must be after start time."] });
            expect(appointment.end_time).toBe("2030-01-10T11:00:00.000Z");
        });

        it("moves an appointment", async () => {
            const appointment = await schedule("Review", new Date("2030-01-10T10:00:00.000Z"));

            const res = await call(appointmentDetailRoute, {
                method: "PATCH",
                token,
                query: { id: appointment.id },
                body: { start_time: "2030-01-10T12:00:00Z", end_time: "2030-01-10T13:00:00Z", location: "Room 2" },
            });

            expect(res.body).toMatchObject({ start_time: "2030-01-10T12:00:00.000Z", location: "Room 2" });
        });

        it("does not reach other users' appointments", async () => {
            const other = await signedInUser(db);
            const theirs = await createAppointment(db, other.user, {
                title: "Theirs",
                start_time: "2030-01-10T10:00:00.000Z",
                end_time: "2030-01-10T11:00:00.000Z",
            });

            const res = await call(appointmentDetailRoute, { method: "DELETE", token, query: { id: theirs.id } });

            expect(res.statusCode).toBe(404);
            expect(db.data.appointments).toHaveLength(1);
        });
    });

    it.each([
        [confirmRoute, "confirmed", "appointment confirmed", "appointment_confirmed"],
        [cancelRoute, "cancelled", "appointment cancelled", "appointment_cancelled"],
        [completeRoute, "completed", "appointment completed", "appointment_completed"],
    ] as const)("sets status %#", async (route, status, message, activity) => {
        const appointment = await schedule("Meeting", new Date("2030-01-10T10:00:00.000Z"));

        const res = await call(route, { method: "POST", token, query: { id: appointment.id } });

        expect(res.statusCode).toBe(200);
        expect(res.body).toEqual({ status: message });
        expect(appointment.status).toBe(status);
        expect(db.data.recent_activities.at(-1)?.action_type).toBe(activity);
    });

    it("filters the list by status and client", async () => {
        const other = insertClient(db, user);
        await schedule("A", new Date("2030-01-10T10:00:00.000Z"));
        await schedule("B", new Date("2030-01-11T10:00:00.000Z"), 1, "cancelled");
        await schedule("C", new Date("2030-01-12T10:00:00.000Z"), 1, "scheduled", other.id);

        const scheduled = await call(appointmentsRoute, { method: "GET", token, query: { status: "scheduled" } });
        const forClient = await call(appointmentsRoute, { method: "GET", token, query: { client: client.id } });

        expect(resultsOf(scheduled.body).map((a) => a.title)).toEqual(["C", "A"]);
        expect(resultsOf(forClient.body).map((a) => a.title)).toEqual(["B", "A"]);
    });

    describe("calendar", () => {
        it("requires both bounds", async () => {
            const res = await call(calendarRoute, { method: "GET", token, query: { start: "2030-01-01" } });

            expect(res.statusCode).toBe(400);
            expect(res.body).toEqual({ detail: "Both start and end date parameters are required" });
        });

        it("lists appointments in range with a placeholder client name", async () => {
            await schedule("January", new Date("2030-01-10T10:00:00.000Z"), 1, "scheduled", null);
            await schedule("February", new Date("2030-02-10T10:00:00.000Z"));

            const res = await call(calendarRoute, { method: "GET", token, query: { start: "2030-01-01", end: "2030-01-31" } });

            expect(res.statusCode).toBe(200);
            const entries = listOf(res.body);
            expect(entries).toHaveLength(1);
            expect(entries[0]).toMatchObject({
                title: "January",
                start: "2030-01-10T10:00:00.000Z",
                end: "2030-01-10T11:00:00.000Z",
                status: "scheduled",
                client_name: "No Client",
            });
        });
    });

    it("lists upcoming active appointments soonest first", async () => {
        const now = new Date();
        await schedule("Later", addDays(now, 3));
        await schedule("Sooner", addDays(now, 1), 1, "confirmed");
        await schedule("Called off", addDays(now, 2), 1, "cancelled");
        await schedule("Past", subDays(now, 2));

        const res = await call(upcomingRoute, { method: "GET", token });

        expect(listOf(res.body).map((a) => a.title)).toEqual(["Sooner", "Later"]);
    });

    it("lists today's appointments", async () => {
        const today = startOfDay(new Date());
        await schedule("Morning", addHours(today, 9));
        await schedule("Tomorrow", addDays(addHours(today, 9), 1));

        const res = await call(todayRoute, { method: "GET", token });

        expect(listOf(res.body).map((a) => a.title)).toEqual(["Morning"]);
    });

    it("reports stats including paid revenue", async () => {
        const now = new Date();
        await schedule("Today", startOfDay(now), 1, "completed");
        await schedule("This week", addDays(now, 2));
        await schedule("Next month", addDays(now, 30), 1, "scheduled", null);
        await createInvoice(db, user, {
            client: client.id,
            due_date: "2099-12-31",
            status: "paid",
            items: [{ description: "Retainer", quantity: 2, unit_price: 150, tax_rate: 10 }],
        });
        await createInvoice(db, user, {
            client: client.id,
            due_date: "2099-12-31",
            items: [{ description: "Unpaid", quantity: 1, unit_price: 999 }],
        });

        const res = await call(statsRoute, { method: "GET", token });

        expect(bodyOf(res)).toEqual({
            total: 3,
            today: 1,
            upcoming: 1,
            completed: 1,
            active_clients: 1,
            total_revenue: 330,
        });
    });
});
