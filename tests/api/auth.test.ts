import { subHours } from "date-fns";
import { beforeEach, describe, expect, it } from "vitest";

import loginRoute from "../../pages/api/auth/login";
import refreshRoute from "../../pages/api/auth/token/refresh";
import verifyRoute from "../../pages/api/auth/token/verify";
import logoutRoute from "../../pages/api/auth/logout";
import registerRoute from "../../pages/api/auth/register";
import profileRoute from "../../pages/api/auth/profile";
import changePasswordRoute from "../../pages/api/auth/change-password";
import usersRoute from "../../pages/api/auth/users/index";
import userDetailRoute from "../../pages/api/auth/users/[id]";
import clientsRoute from "../../pages/api/clients/index";

import type { Db } from "@/lib/database";
import { issueAccessToken } from "@/lib/auth/tokens";
import { seedSampleData } from "@/lib/services/seed";
import { bodyOf, call } from "../helpers/http";
import { TEST_PASSWORD, setupMemoryDb, signedInUser } from "../helpers/fixtures";

function login(email: string, password: string) {
    return call(loginRoute, { method: "POST", url: "/api/auth/login/", body: { email, password } });
}

async function tokensFor(email: string, password: string) {
    const body = bodyOf(await login(email, password));
    if (typeof body.access !== "string" || typeof body.refresh !== "string") {
        throw new Error("login did not return tokens");
    }
    return { access: body.access, refresh: body.refresh };
}

describe("auth endpoints", () => {
    let db: Db;

    beforeEach(() => {
        db = setupMemoryDb();
    });

    describe("login", () => {
        it("issues access and refresh tokens for the sample lawyer", async () => {
            await seedSampleData(db);

            const res = await login("john.doe@lawfirm.com", "password123");

            expect(res.statusCode).toBe(200);
            const body = bodyOf(res);
            expect(typeof body.access).toBe("string");
            expect(typeof body.refresh).toBe("string");
            expect(body.user).toMatchObject({ email: "john.doe@lawfirm.com", user_type: "lawyer", full_name: "John Doe" });
            expect(db.data.users.find((u) => u.email === "john.doe@lawfirm.com")?.last_login).not.toBeNull();
        });

        it("treats the email as case-insensitive", async () => {
            await signedInUser(db, { email: "mixed@lawfirm.test" });

            const res = await login("MIXED@LawFirm.test", TEST_PASSWORD);

            expect(res.statusCode).toBe(200);
        });

        it("rejects a wrong password with the generic credentials message", async () => {
            await signedInUser(db, { email: "someone@lawfirm.test" });

            const res = await login("someone@lawfirm.test", "not-the-password");

            expect(res.statusCode).toBe(401);
            expect(res.body).toEqual({ detail: "No active account found with the given credentials" });
        });

        it("rejects inactive accounts", async () => {
            const { user } = await signedInUser(db, { email: "gone@lawfirm.test" });
            user.is_active = false;

            const res = await login("gone@lawfirm.test", TEST_PASSWORD);

            expect(res.statusCode).toBe(401);
        });

        it("reports missing fields", async () => {
            const res = await call(loginRoute, { method: "POST", body: { email: "a@b.test" } });

            expect(res.statusCode).toBe(400);
            expect(res.body).toEqual({ password: ["This field is required."] });
        });

        it("answers other methods with 405 and an Allow header", async () => {
            const res = await call(loginRoute, { method: "GET" });

            expect(res.statusCode).toBe(405);
            expect(res.headers.allow).toBe("POST");
            expect(res.body).toEqual({ detail: 'Method "GET" not allowed.' });
        });
    });

    describe("bearer authentication", () => {
        it("requires an Authorization header", async () => {
            const res = await call(clientsRoute, { method: "GET" });

            expect(res.statusCode).toBe(401);
            expect(res.body).toEqual({ detail: "Authentication credentials were not provided." });
        });

        it("rejects a malformed token", async () => {
            const res = await call(clientsRoute, { method: "GET", token: "not-a-jwt" });

            expect(res.statusCode).toBe(401);
            expect(res.body).toEqual({ detail: "Given token not valid for any token type" });
        });

        it("rejects an expired access token", async () => {
            const { user } = await signedInUser(db);
            const stale = await issueAccessToken(user, subHours(new Date(), 2));

            const res = await call(clientsRoute, { method: "GET", token: stale });

            expect(res.statusCode).toBe(401);
            expect(res.body).toEqual({ detail: "Given token not valid for any token type" });
        });

        it("rejects a refresh token used as an access token", async () => {
            await signedInUser(db, { email: "swap@lawfirm.test" });
            const { refresh } = await tokensFor("swap@lawfirm.test", TEST_PASSWORD);

            const res = await call(clientsRoute, { method: "GET", token: refresh });

            expect(res.statusCode).toBe(401);
        });

        it("rejects tokens of deleted users", async () => {
            const { user, token } = await signedInUser(db);
            db.data.users = db.data.users.filter((u) => u.id !== user.id);

            const res = await call(clientsRoute, { method: "GET", token });

            expect(res.statusCode).toBe(401);
            expect(res.body).toEqual({ detail: "Given token not valid for any token type" });
        });
    });

    describe("token refresh, verify and logout", () => {
        it("exchanges a refresh token for a working access token", async () => {
            await signedInUser(db, { email: "refresh@lawfirm.test" });
            const { refresh } = await tokensFor("refresh@lawfirm.test", TEST_PASSWORD);

            const res = await call(refreshRoute, { method: "POST", body: { refresh } });

            expect(res.statusCode).toBe(200);
            const { access } = bodyOf(res);
            expect(typeof access).toBe("string");
            const listed = await call(clientsRoute, { method: "GET", token: String(access) });
            expect(listed.statusCode).toBe(200);
        });

        it("does not accept an access token as a refresh token", async () => {
            const { token } = await signedInUser(db);

            const res = await call(refreshRoute, { method: "POST", body: { refresh: token } });

            expect(res.statusCode).toBe(401);
            expect(res.body).toEqual({ detail: "Token is invalid or expired" });
        });

        it("verifies tokens", async () => {
            const { token } = await signedInUser(db);

            const valid = await call(verifyRoute, { method: "POST", body: { token } });
            const invalid = await call(verifyRoute, { method: "POST", body: { token: `${token}x` } });

            expect(valid.statusCode).toBe(200);
            expect(valid.body).toEqual({});
            expect(invalid.statusCode).toBe(401);
        });

        it("revokes the refresh token on logout", async () => {
            await signedInUser(db, { email: "bye@lawfirm.test" });
            const { access, refresh } = await tokensFor("bye@lawfirm.test", TEST_PASSWORD);

            const out = await call(logoutRoute, { method: "POST", token: access, body: { refresh } });
            const again = await call(refreshRoute, { method: "POST", body: { refresh } });

            expect(out.statusCode).toBe(205);
            expect(db.data.revoked_tokens).toHaveLength(1);
            expect(again.statusCode).toBe(401);
            expect(again.body).toEqual({ detail: "Token is blacklisted" });
        });

        it("refuses to revoke another user's refresh token", async () => {
            await signedInUser(db, { email: "first@lawfirm.test" });
            await signedInUser(db, { email: "second@lawfirm.test" });
            const first = await tokensFor("first@lawfirm.test", TEST_PASSWORD);
            const second = await tokensFor("second@lawfirm.test", TEST_PASSWORD);

            const out = await call(logoutRoute, { method: "POST", token: first.access, body: { refresh: second.refresh } });
            const stillValid = await call(refreshRoute, { method: "POST", body: { refresh: second.refresh } });

            expect(out.statusCode).toBe(401);
            expect(out.body).toEqual({ detail: "Given token not valid for any token type" });
            expect(db.data.revoked_tokens).toHaveLength(0);
            expect(stillValid.statusCode).toBe(200);
        });
    });

    describe("register", () => {
        const base = { email: "new@lawfirm.test", first_name: "New", last_name: "Person" };

        it("creates a lawyer account by default", async () => {
            const res = await call(registerRoute, {
                method: "POST",
                body: { ...base, password: "longenough1", password2: "longenough1" },
            });

            expect(res.statusCode).toBe(201);
            expect(res.body).toMatchObject({ email: "new@lawfirm.test", user_type: "lawyer", is_active: true });
            expect(bodyOf(res)).not.toHaveProperty("password_hash");
        });

        it("requires matching passwords", async () => {
            const res = await call(registerRoute, {
                method: "POST",
                body: { ...base, password: "longenough1", password2: "different22" },
            });

            expect(res.statusCode).toBe(400);
            expect(res.body).toEqual({ password: ["Password fields didn't match."] });
        });

        it("requires at least eight characters", async () => {
            const res = await call(registerRoute, {
                method: "POST",
                body: { ...base, password: "short", password2: "short" },
            });

            expect(res.statusCode).toBe(400);
            expect(res.body).toEqual({ password: ["This password is too short. It must contain at least 8 characters."] });
        });

        it("does not let a visitor register as an admin", async () => {
            const res = await call(registerRoute, {
                method: "POST",
                body: { ...base, password: "longenough1", password2: "longenough1", user_type: "admin" },
            });

            expect(res.statusCode).toBe(400);
            expect(res.body).toEqual({ user_type: ['"admin" is not a valid choice.'] });
            expect(db.data.users).toHaveLength(0);
        });

        it("gives registered accounts no staff rights", async () => {
            const res = await call(registerRoute, {
                method: "POST",
                body: { ...base, password: "longenough1", password2: "longenough1", user_type: "paralegal" },
            });
            const { access } = await tokensFor("new@lawfirm.test", "longenough1");
            const listed = await call(usersRoute, { method: "GET", token: access });

            expect(res.statusCode).toBe(201);
            expect(res.body).toMatchObject({ user_type: "paralegal", is_staff: false });
            expect(listed.statusCode).toBe(403);
        });

        it("rejects an email that is already registered", async () => {
            await signedInUser(db, { email: "new@lawfirm.test" });

            const res = await call(registerRoute, {
                method: "POST",
                body: { ...base, password: "longenough1", password2: "longenough1" },
            });

            expect(res.statusCode).toBe(400);
            expect(res.body).toEqual({ email: ["user with this email already exists."] });
        });
    });

    describe("profile and password", () => {
        it("reads and patches the caller's profile", async () => {
            const { token } = await signedInUser(db, { first_name: "Old", last_name: "Name" });

            const res = await call(profileRoute, { method: "PATCH", token, body: { first_name: "New", phone: "555-0100" } });

            expect(res.statusCode).toBe(200);
            expect(res.body).toMatchObject({ first_name: "New", last_name: "Name", full_name: "New Name", phone: "555-0100" });
        });

        it("refuses a password change when the old password is wrong", async () => {
            const { token } = await signedInUser(db);

            const res = await call(changePasswordRoute, {
                method: "PUT",
                token,
                body: { old_password: "wrong-one", new_password: "brandnew123" },
            });

            expect(res.statusCode).toBe(400);
            expect(res.body).toEqual({ old_password: ["Wrong password."] });
        });

        it("changes the password when the old one matches", async () => {
            const { token } = await signedInUser(db, { email: "rotate@lawfirm.test" });

            const res = await call(changePasswordRoute, {
                method: "PUT",
                token,
                body: { old_password: TEST_PASSWORD, new_password: "brandnew123" },
            });

            expect(res.statusCode).toBe(200);
            expect(res.body).toEqual({ message: "Password updated successfully" });
            expect((await login("rotate@lawfirm.test", TEST_PASSWORD)).statusCode).toBe(401);
            expect((await login("rotate@lawfirm.test", "brandnew123")).statusCode).toBe(200);
        });
    });

    describe("user administration", () => {
        it("limits the user list to admins", async () => {
            const lawyer = await signedInUser(db);
            const admin = await signedInUser(db, { user_type: "admin" });

            const denied = await call(usersRoute, { method: "GET", token: lawyer.token });
            const allowed = await call(usersRoute, { method: "GET", token: admin.token, url: "/api/auth/users/" });

            expect(denied.statusCode).toBe(403);
            expect(denied.body).toEqual({ detail: "You do not have permission to perform this action." });
            expect(allowed.statusCode).toBe(200);
            expect(allowed.body).toMatchObject({ count: 2, next: null, previous: null });
        });

        it("resolves me to the caller", async () => {
            const { user, token } = await signedInUser(db);

            const res = await call(userDetailRoute, { method: "GET", token, query: { id: "me" } });

            expect(res.statusCode).toBe(200);
            expect(res.body).toMatchObject({ id: user.id, email: user.email });
        });

        it("forbids non-admins from reading other accounts", async () => {
            const { token } = await signedInUser(db);
            const other = await signedInUser(db);

            const res = await call(userDetailRoute, { method: "GET", token, query: { id: other.user.id } });

            expect(res.statusCode).toBe(403);
        });

        it("ignores role changes requested by non-admins", async () => {
            const { user, token } = await signedInUser(db);

            const res = await call(userDetailRoute, { method: "PATCH", token, query: { id: "me" }, body: { user_type: "admin", last_name: "Changed" } });

            expect(res.statusCode).toBe(200);
            expect(res.body).toMatchObject({ user_type: "lawyer", last_name: "Changed" });
            expect(user.user_type).toBe("lawyer");
        });

        it("treats the staff flag, not the role name, as admin rights", async () => {
            const { user, token } = await signedInUser(db, { user_type: "admin" });
            user.is_staff = false;

            const res = await call(usersRoute, { method: "GET", token });

            expect(res.statusCode).toBe(403);
        });

        it("lets an admin delete an account", async () => {
            const admin = await signedInUser(db, { user_type: "admin" });
            const other = await signedInUser(db);

            const res = await call(userDetailRoute, { method: "DELETE", token: admin.token, query: { id: other.user.id } });

            expect(res.statusCode).toBe(204);
            expect(db.data.users.map((u) => u.id)).toEqual([admin.user.id]);
        });
    });
});
