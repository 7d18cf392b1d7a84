import { beforeEach, describe, expect, it } from "vitest";

import casesRoute from "../../pages/api/cases/index";
import caseDetailRoute from "../../pages/api/cases/[id]/index";
import closeRoute from "../../pages/api/cases/[id]/close";
import assignRoute from "../../pages/api/cases/[id]/assign_to_me";
import addNoteRoute from "../../pages/api/cases/[id]/add_note";

import type { Db } from "@/lib/database";
import type { Client, User } from "@/lib/types";
import { createCase } from "@/lib/services/cases";
import { bodyOf, call, listOf, resultsOf } from "../helpers/http";
import { insertClient, setupMemoryDb, signedInUser } from "../helpers/fixtures";

describe("case endpoints", () => {
    let db: Db;
    let owner: User;
    let token: string;
    let client: Client;

    beforeEach(async () => {
        db = setupMemoryDb();
        ({ user: owner, token } = await signedInUser(db, { first_name: "Olivia", last_name: "Owner" }));
        client = insertClient(db, owner, { first_name: "Carla", last_name: "Client" });
    });

    it("opens a case with display fields", async () => {
        const res = await call(casesRoute, {
            method: "POST",
            token,
            body: { title: "Contract review", client: client.id },
        });

        expect(res.statusCode).toBe(201);
        expect(res.body).toMatchObject({
            title: "Contract review",
            description: "",
            client: client.id,
            client_name: "Carla Client",
            status: "open",
            status_display: "Open",
            created_by: owner.id,
            created_by_name: "Olivia Owner",
            assigned_to: [],
            assigned_to_names: [],
            notes: [],
            closed_at: null,
        });
        expect(db.data.recent_activities.map((a) => a.action_type)).toEqual(["case_created"]);
    });

    it("refuses a client the caller does not own", async () => {
        const other = await signedInUser(db);
        const foreign = insertClient(db, other.user);

        const res = await call(casesRoute, { method: "POST", token, body: { title: "Nope", client: foreign.id } });

        expect(res.statusCode).toBe(400);
        expect(res.body).toEqual({ client: [`Invalid pk "${foreign.id}" - object does not exist.`] });
    });

    it("rejects an unknown status", async () => {
        const res = await call(casesRoute, { method: "POST", token, body: { title: "X", client: client.id, status: "archived" } });

        expect(res.statusCode).toBe(400);
        expect(res.body).toEqual({ status: ['"archived" is not a valid choice.'] });
    });

    it("stamps closed_at when closing", async () => {
        const item = await createCase(db, owner, { title: "Estate", client: client.id });
        const before = Date.now();

        const res = await call(closeRoute, { method: "POST", token, query: { id: item.id } });

        expect(res.statusCode).toBe(200);
        const body = bodyOf(res);
        expect(body.status).toBe("closed");
        expect(new Date(String(body.closed_at)).getTime()).toBeGreaterThanOrEqual(before);
        expect(db.data.recent_activities.at(-1)?.action_type).toBe("case_closed");
    });

    it("clears closed_at when a closed case is reopened", async () => {
        const item = await createCase(db, owner, { title: "Estate", client: client.id, status: "closed" });
        expect(item.closed_at).not.toBeNull();

        const res = await call(caseDetailRoute, { method: "PATCH", token, query: { id: item.id }, body: { status: "in_progress" } });

        expect(res.body).toMatchObject({ status: "in_progress", status_display: "In Progress", closed_at: null });
    });

    it("assigns the caller once however often it is called", async () => {
        const paralegal = await signedInUser(db, { user_type: "paralegal" });
        const item = await createCase(db, owner, { title: "Shared", client: client.id, assigned_to: [paralegal.user.id] });

        const first = await call(assignRoute, { method: "POST", token, query: { id: item.id } });
        const second = await call(assignRoute, { method: "POST", token, query: { id: item.id } });

        expect(first.body).toEqual({ status: "case assigned to you" });
        expect(second.statusCode).toBe(200);
        expect(item.assigned_to).toEqual([paralegal.user.id, owner.id]);
    });

    it("shows assigned cases once even when the caller also created them", async () => {
        const colleague = await signedInUser(db);
        const colleagueClient = insertClient(db, colleague.user);
        await createCase(db, owner, { title: "Mine and assigned", client: client.id, assigned_to: [owner.id] });
        await createCase(db, colleague.user, { title: "Assigned to me", client: colleagueClient.id, assigned_to: [owner.id] });
        await createCase(db, colleague.user, { title: "Not mine", client: colleagueClient.id });

        const res = await call(casesRoute, { method: "GET", token });

        expect(resultsOf(res.body).map((c) => c.title).sort()).toEqual(["Assigned to me", "Mine and assigned"]);
    });

    it("hides cases the caller neither created nor is assigned to", async () => {
        const colleague = await signedInUser(db);
        const item = await createCase(db, colleague.user, { title: "Private", client: insertClient(db, colleague.user).id });

        const res = await call(caseDetailRoute, { method: "GET", token, query: { id: item.id } });

        expect(res.statusCode).toBe(404);
    });

    it("filters by status and title", async () => {
        await createCase(db, owner, { title: "Lease dispute", client: client.id });
        await createCase(db, owner, { title: "Lease renewal", client: client.id, status: "pending" });
        await createCase(db, owner, { title: "Divorce", client: client.id, status: "pending" });

        const pending = await call(casesRoute, { method: "GET", token, query: { status: "pending" } });
        const lease = await call(casesRoute, { method: "GET", token, query: { search: "lease" } });

        expect(resultsOf(pending.body).map((c) => c.title).sort()).toEqual(["Divorce", "Lease renewal"]);
        expect(resultsOf(lease.body).map((c) => c.title).sort()).toEqual(["Lease dispute", "Lease renewal"]);
    });

    it("adds notes that appear on the case", async () => {
        const item = await createCase(db, owner, { title: "Notes", client: client.id });

        const res = await call(addNoteRoute, { method: "POST", token, query: { id: item.id }, body: { content: "Filed motion." } });

        expect(res.statusCode).toBe(201);
        expect(res.body).toMatchObject({ content: "Filed motion.", author: owner.id, author_name: "Olivia Owner" });

        const detail = await call(caseDetailRoute, { method: "GET", token, query: { id: item.id } });
        expect(listOf(bodyOf(detail).notes).map((n) => n.content)).toEqual(["Filed motion."]);
    });

    it("requires note content", async () => {
        const item = await createCase(db, owner, { title: "Notes", client: client.id });

        const res = await call(addNoteRoute, { method: "POST", token, query: { id: item.id }, body: { content: "" } });

        expect(res.statusCode).toBe(400);
        expect(res.body).toEqual({ content: ["This field may not be blank."] });
    });

    it("deletes a case and detaches linked appointments", async () => {
        const item = await createCase(db, owner, { title: "Gone", client: client.id });
        db.data.appointments.push({
            id: "appt-1",
            user_id: owner.id,
            client_id: client.id,
            case_id: item.id,
            title: "Hearing",
            description: "",
            start_time: "2030-05-01T09:00:00.000Z",
            end_time: "2030-05-01T10:00:00.000Z",
            status: "scheduled",
            location: "",
            notes: "",
            created_at: "2026-01-01T00:00:00.000Z",
            updated_at: "2026-01-01T00:00:00.000Z",
        });

        const res = await call(caseDetailRoute, { method: "DELETE", token, query: { id: item.id } });

        expect(res.statusCode).toBe(204);
        expect(db.data.cases).toHaveLength(0);
        expect(db.data.appointments[0].case_id).toBeNull();
    });
});
