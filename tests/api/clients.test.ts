import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { addMinutes, subMonths } from "date-fns";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import clientsRoute from "../../pages/api/clients/index";
import clientStatsRoute from "../../pages/api/clients/stats";
import clientDetailRoute from "../../pages/api/clients/[id]/index";
import activateRoute from "../../pages/api/clients/[id]/activate";
import deactivateRoute from "../../pages/api/clients/[id]/deactivate";
import clientAppointmentsRoute from "../../pages/api/clients/[id]/appointments";
import notesRoute from "../../pages/api/clients/[id]/notes/index";
import noteDetailRoute from "../../pages/api/clients/[id]/notes/[noteId]";
import notesSummaryRoute from "../../pages/api/clients/[id]/notes_summary";
import documentsRoute from "../../pages/api/clients/[id]/documents/index";
import documentDetailRoute from "../../pages/api/clients/[id]/documents/[documentId]/index";
import downloadRoute from "../../pages/api/clients/[id]/documents/[documentId]/download";

import { setServerConfig } from "@/lib/config";
import type { Db } from "@/lib/database";
import type { User } from "@/lib/types";
import { createClientNote } from "@/lib/services/clients";
import { createCase } from "@/lib/services/cases";
import { createInvoice } from "@/lib/services/invoices";
import { createAppointment } from "@/lib/services/appointments";
import { bodyOf, call, listOf, multipartBody, resultsOf } from "../helpers/http";
import { insertClient, setupMemoryDb, signedInUser } from "../helpers/fixtures";

describe("client endpoints", () => {
    let db: Db;
    let user: User;
    let token: string;

    beforeEach(async () => {
        db = setupMemoryDb();
        ({ user, token } = await signedInUser(db));
    });

    describe("create and read", () => {
        it("creates a client owned by the caller", async () => {
            const res = await call(clientsRoute, {
                method: "POST",
                token,
                body: { first_name: "Maria", last_name: "Lopez", email: "Maria@Example.test", city: "Austin" },
            });

            expect(res.statusCode).toBe(201);
            expect(res.body).toMatchObject({
                first_name: "Maria",
                last_name: "Lopez",
                full_name: "Maria Lopez",
                email: "maria@example.test",
                city: "Austin",
                phone: "",
                is_active: true,
            });
            expect(bodyOf(res)).not.toHaveProperty("created_by");
            expect(db.data.clients[0].created_by).toBe(user.id);
        });

        it("requires first and last name", async () => {
            const res = await call(clientsRoute, { method: "POST", token, body: { first_name: "  " } });

            expect(res.statusCode).toBe(400);
            expect(res.body).toEqual({
                first_name: ["This field may not be blank."],
                last_name: ["This field is required."],
            });
        });

        it("rejects a duplicate email regardless of case", async () => {
            insertClient(db, user, { email: "dup@example.test" });

            const res = await call(clientsRoute, {
                method: "POST",
                token,
                body: { first_name: "Other", last_name: "Person", email: "DUP@example.test" },
            });

            expect(res.statusCode).toBe(400);
            expect(res.body).toEqual({ email: ["client with this email already exists."] });
        });

        it("allows the same email for clients of different users", async () => {
            const other = await signedInUser(db);
            insertClient(db, other.user, { email: "shared@example.test" });

            const res = await call(clientsRoute, {
                method: "POST",
                token,
                body: { first_name: "Same", last_name: "Mail", email: "shared@example.test" },
            });

            expect(res.statusCode).toBe(201);
        });

        it("hides clients of other users", async () => {
            const other = await signedInUser(db);
            const theirs = insertClient(db, other.user);
            insertClient(db, user, { last_name: "Mine" });

            const detail = await call(clientDetailRoute, { method: "GET", token, query: { id: theirs.id } });
            const list = await call(clientsRoute, { method: "GET", token });

            expect(detail.statusCode).toBe(404);
            expect(detail.body).toEqual({ detail: "Not found." });
            expect(resultsOf(list.body).map((c) => c.last_name)).toEqual(["Mine"]);
        });
    });

    describe("listing", () => {
        beforeEach(() => {
            insertClient(db, user, { first_name: "Anna", last_name: "Smith", city: "Boston" });
            insertClient(db, user, { first_name: "Bob", last_name: "Adams", city: "Denver", is_active: false });
            insertClient(db, user, { first_name: "Carl", last_name: "Smithers", city: "Boston", phone: "555-0199" });
        });

        it("orders by last name", async () => {
            const res = await call(clientsRoute, { method: "GET", token });

            expect(res.body).toMatchObject({ count: 3, next: null, previous: null });
            expect(resultsOf(res.body).map((c) => c.last_name)).toEqual(["Adams", "Smith", "Smithers"]);
        });

        it("searches names and phone numbers", async () => {
            const byName = await call(clientsRoute, { method: "GET", token, query: { search: "SMITH" } });
            const byPhone = await call(clientsRoute, { method: "GET", token, query: { search: "0199" } });

            expect(resultsOf(byName.body).map((c) => c.last_name)).toEqual(["Smith", "Smithers"]);
            expect(resultsOf(byPhone.body).map((c) => c.first_name)).toEqual(["Carl"]);
        });

        it("filters by active flag and city", async () => {
            const inactive = await call(clientsRoute, { method: "GET", token, query: { is_active: "false" } });
            const boston = await call(clientsRoute, { method: "GET", token, query: { city: "Boston" } });

            expect(resultsOf(inactive.body).map((c) => c.first_name)).toEqual(["Bob"]);
            expect(resultsOf(boston.body).map((c) => c.first_name)).toEqual(["Anna", "Carl"]);
        });

        it("rejects a non-boolean active filter", async () => {
            const res = await call(clientsRoute, { method: "GET", token, query: { is_active: "maybe" } });

            expect(res.statusCode).toBe(400);
            expect(res.body).toEqual({ is_active: ['Must be "true" or "false".'] });
        });
    });

    describe("updates", () => {
        it("patches only the given fields", async () => {
            const client = insertClient(db, user, { first_name: "Old", city: "Austin" });

            const res = await call(clientDetailRoute, { method: "PATCH", token, query: { id: client.id }, body: { first_name: "New" } });

            expect(res.statusCode).toBe(200);
            expect(res.body).toMatchObject({ first_name: "New", city: "Austin" });
        });

        it("deactivates and reactivates", async () => {
            const client = insertClient(db, user);

            const off = await call(deactivateRoute, { method: "POST", token, query: { id: client.id } });
            expect(off.body).toMatchObject({ is_active: false });

            const on = await call(activateRoute, { method: "POST", token, query: { id: client.id } });
            expect(on.body).toMatchObject({ is_active: true });
            expect(db.data.recent_activities.map((a) => a.action_type)).toEqual(["client_updated", "client_updated"]);
        });
    });

    it("computes client stats", async () => {
        const now = new Date();
        const old = subMonths(now, 2).toISOString();
        const cities = ["Boston", "Boston", "Boston", "Boston", "Denver", "Denver", "Denver", "Austin", "Austin", ""];
        cities.forEach((city, i) => {
            insertClient(db, user, {
                city,
                is_active: i < 6,
                created_at: i < 3 ? now.toISOString() : old,
            });
        });
        const other = await signedInUser(db);
        insertClient(db, other.user, { city: "Boston" });

        const res = await call(clientStatsRoute, { method: "GET", token });

        expect(res.statusCode).toBe(200);
        expect(res.body).toEqual({
            total_clients: 10,
            active_clients: 6,
            inactive_clients: 4,
            new_clients_this_month: 3,
            top_cities: [
                { city: "Boston", count: 4 },
                { city: "Denver", count: 3 },
                { city: "Austin", count: 2 },
            ],
        });
    });

    it("lists the caller's appointments for a client", async () => {
        const client = insertClient(db, user);
        const start = new Date("2030-03-01T10:00:00.000Z");
        await createAppointment(db, user, {
            title: "Early",
            start_time: start.toISOString(),
            end_time: addMinutes(start, 30).toISOString(),
            client: client.id,
        });
        await createAppointment(db, user, {
            title: "Late",
            start_time: addMinutes(start, 120).toISOString(),
            end_time: addMinutes(start, 150).toISOString(),
            client: client.id,
        });

        const res = await call(clientAppointmentsRoute, { method: "GET", token, query: { id: client.id } });

        expect(res.statusCode).toBe(200);
        expect(listOf(res.body).map((a) => a.title)).toEqual(["Late", "Early"]);
    });

    describe("notes", () => {
        it("creates, edits and deletes a note", async () => {
            const client = insertClient(db, user);

            const createdRes = await call(notesRoute, {
                method: "POST",
                token,
                query: { id: client.id },
                body: { title: "Call", content: "Discussed the lease." },
            });
            expect(createdRes.statusCode).toBe(201);
            const note = bodyOf(createdRes);
            expect(note).toMatchObject({ client: client.id, title: "Call", created_by: { id: user.id, email: user.email } });

            const noteId = String(note.id);
            const patched = await call(noteDetailRoute, {
                method: "PATCH",
                token,
                query: { id: client.id, noteId },
                body: { content: "Discussed the lease renewal." },
            });
            expect(patched.body).toMatchObject({ title: "Call", content: "Discussed the lease renewal." });

            const removed = await call(noteDetailRoute, { method: "DELETE", token, query: { id: client.id, noteId } });
            expect(removed.statusCode).toBe(204);
            expect(db.data.client_notes).toHaveLength(0);
            expect(db.data.recent_activities.map((a) => a.description)).toEqual([
                'Added note "Call" to Ada Client',
                'Edited note "Call" on Ada Client',
                'Deleted note "Call" from Ada Client',
            ]);
            expect(db.data.recent_activities.every((a) => a.user_id === user.id && a.related_object_id === client.id)).toBe(true);
        });

        it("summarises the three most recent notes", async () => {
            const client = insertClient(db, user, { first_name: "Nora", last_name: "Notes" });
            const base = new Date("2026-01-05T09:00:00.000Z");
            for (let i = 1; i <= 4; i += 1) {
                await createClientNote(db, user, client, { title: `Note ${i}`, content: "..." }, addMinutes(base, i));
            }

            const res = await call(notesSummaryRoute, { method: "GET", token, query: { id: client.id } });

            expect(res.statusCode).toBe(200);
            const body = bodyOf(res);
            expect(body).toMatchObject({
                client: client.id,
                client_name: "Nora Notes",
                total_notes: 4,
                latest_note_at: addMinutes(base, 4).toISOString(),
            });
            expect(listOf(body.recent_notes).map((n) => n.title)).toEqual(["Note 4", "Note 3", "Note 2"]);
        });
    });

    it("deletes a client with its notes, cases and invoices and detaches appointments", async () => {
        const client = insertClient(db, user);
        await createClientNote(db, user, client, { title: "Intake", content: "First meeting." });
        await createCase(db, user, { title: "Lease dispute", client: client.id });
        await createInvoice(db, user, { client: client.id, due_date: "2030-01-31", items: [] });
        const appointment = await createAppointment(db, user, {
            title: "Review",
            start_time: "2030-01-10T10:00:00.000Z",
            end_time: "2030-01-10T11:00:00.000Z",
            client: client.id,
        });

        const res = await call(clientDetailRoute, { method: "DELETE", token, query: { id: client.id } });

        expect(res.statusCode).toBe(204);
        expect(db.data.clients).toHaveLength(0);
        expect(db.data.client_notes).toHaveLength(0);
        expect(db.data.cases).toHaveLength(0);
        expect(db.data.invoices).toHaveLength(0);
        expect(db.data.appointments.find((a) => a.id === appointment.id)?.client_id).toBeNull();
    });

    describe("documents", () => {
        const boundary = "----lawoffice-test-boundary";
        let uploadDir: string;

        beforeEach(() => {
            uploadDir = fs.mkdtempSync(path.join(os.tmpdir(), "lawoffice-uploads-"));
            setServerConfig({ uploadDir });
        });

        afterEach(() => {
            fs.rmSync(uploadDir, { recursive: true, force: true });
        });

        function upload(clientId: string, parts: Parameters<typeof multipartBody>[1]) {
            const rawBody = multipartBody(boundary, parts);
            return call(documentsRoute, {
                method: "POST",
                token,
                query: { id: clientId },
                headers: {
                    "content-type": `multipart/form-data; boundary=${boundary}`,
                    "content-length": String(rawBody.length),
                },
                rawBody,
            });
        }

        it("stores an upload and serves it back", async () => {
            const client = insertClient(db, user);

            const res = await upload(client.id, [
                { name: "title", value: "Engagement letter" },
                { name: "document", value: "hello world", filename: "letter.txt", contentType: "text/plain" },
            ]);

            expect(res.statusCode).toBe(201);
            const doc = bodyOf(res);
            expect(doc).toMatchObject({
                client: client.id,
                title: "Engagement letter",
                file_name: "letter.txt",
                mime_type: "text/plain",
                size: 11,
                document: `/api/clients/${client.id}/documents/${String(doc.id)}/download/`,
            });
            expect(db.data.client_documents[0].path.startsWith(path.join(uploadDir, "clients", client.id))).toBe(true);

            const download = await call(downloadRoute, {
                method: "GET",
                token,
                query: { id: client.id, documentId: String(doc.id) },
            });
            expect(download.statusCode).toBe(200);
            expect(download.headers["content-type"]).toBe("text/plain");
            expect(download.headers["content-disposition"]).toBe("attachment; filename=\"letter.txt\"; filename*=UTF-8''letter.txt");
            expect(download.text).toBe("hello world");
        });

        it("keeps non-ASCII file names intact in the download header", async () => {
            const client = insertClient(db, user);
            const res = await upload(client.id, [
                { name: "document", value: "cv", filename: "cv.txt", contentType: "text/plain" },
            ]);
            db.data.client_documents[0].file_name = "Résumé #1.txt";

            const download = await call(downloadRoute, {
                method: "GET",
                token,
                query: { id: client.id, documentId: String(bodyOf(res).id) },
            });

            expect(download.headers["content-disposition"]).toBe(
                "attachment; filename=\"R_sum_ #1.txt\"; filename*=UTF-8''R%C3%A9sum%C3%A9%20%231.txt",
            );
        });

        it("records activity when a document is edited and deleted", async () => {
            const client = insertClient(db, user);
            const res = await upload(client.id, [
                { name: "document", value: "terms", filename: "terms.txt", contentType: "text/plain" },
            ]);
            const documentId = String(bodyOf(res).id);

            const patched = await call(documentDetailRoute, {
                method: "PATCH",
                token,
                query: { id: client.id, documentId },
                body: { title: "Signed terms" },
            });
            const removed = await call(documentDetailRoute, { method: "DELETE", token, query: { id: client.id, documentId } });

            expect(patched.body).toMatchObject({ title: "Signed terms" });
            expect(removed.statusCode).toBe(204);
            expect(db.data.client_documents).toHaveLength(0);
            expect(db.data.recent_activities.map((a) => a.description)).toEqual([
                "Uploaded terms.txt for Ada Client",
                "Updated document terms.txt for Ada Client",
                "Deleted document terms.txt for Ada Client",
            ]);
        });

        it("requires a file", async () => {
            const client = insertClient(db, user);

            const res = await upload(client.id, [{ name: "title", value: "Nothing attached" }]);

            expect(res.statusCode).toBe(400);
            expect(res.body).toEqual({ document: ["No file was submitted."] });
        });

        it("answers 404 when the stored file is gone", async () => {
            const client = insertClient(db, user);
            const res = await upload(client.id, [
                { name: "document", value: "temporary", filename: "gone.txt", contentType: "text/plain" },
            ]);
            const doc = bodyOf(res);
            fs.rmSync(db.data.client_documents[0].path);

            const download = await call(downloadRoute, {
                method: "GET",
                token,
                query: { id: client.id, documentId: String(doc.id) },
            });

            expect(download.statusCode).toBe(404);
            expect(download.body).toEqual({ detail: "File not found on server." });
        });
    });
});
