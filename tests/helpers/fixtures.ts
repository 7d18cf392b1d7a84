import { v4 as uuidv4 } from "uuid";
import { createMemoryDb, setDb, type Db } from "@/lib/database";
import { issueAccessToken } from "@/lib/auth/tokens";
import { createUser } from "@/lib/services/users";
import type { Client, User, UserType } from "@/lib/types";

export const TEST_PASSWORD = "password123";

export function setupMemoryDb(): Db {
    const db = createMemoryDb();
    setDb(db);
    return db;
}

let userCounter = 0;

export async function makeUser(db: Db, overrides: { email?: string; user_type?: UserType; first_name?: string; last_name?: string } = {}) {
    userCounter += 1;
    return createUser(db, {
        email: overrides.email ?? `user${userCounter}@lawfirm.test`,
        password: TEST_PASSWORD,
        first_name: overrides.first_name ?? "Test",
        last_name: overrides.last_name ?? `User${userCounter}`,
        user_type: overrides.user_type ?? "lawyer",
    });
}

/** A user plus a valid access token for them. */
export async function signedInUser(db: Db, overrides: Parameters<typeof makeUser>[1] = {}): Promise<{ user: User; token: string }> {
    const user = await makeUser(db, overrides);
    return { user, token: await issueAccessToken(user) };
}

/** Inserts a client row directly, bypassing the API. */
export function insertClient(db: Db, owner: User, fields: Partial<Client> = {}): Client {
    const now = new Date().toISOString();
    const client: Client = {
        id: uuidv4(),
        first_name: "Ada",
        last_name: "Client",
        email: null,
        phone: "",
        address: "",
        city: "",
        state: "",
        postal_code: "",
        country: "",
        date_of_birth: null,
        occupation: "",
        company: "",
        is_active: true,
        created_by: owner.id,
        created_at: now,
        updated_at: now,
        ...fields,
    };
    db.data.clients.push(client);
    return client;
}
