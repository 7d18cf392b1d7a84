import { startOfMonth } from 'date-fns';
import { v4 as uuidv4 } from 'uuid';
import type { Db } from '../database';
import type { Client, ClientNote, User } from '../types';
import { NotFoundError, ValidationError } from '../errors';
import { fullName } from '../labels';
import type {
    ClientCreateInput, ClientInput, ClientNoteCreateInput, ClientNoteInput,
} from '../validation/clients';
import type { CityCountDto, ClientStatsDto } from '../api-types';
import { recordActivity } from './activity';
import { deleteClientRows } from './cascade';

export interface ClientFilters {
    search?: string;
    is_active?: boolean;
    city?: string;
}

const DUPLICATE_EMAIL = 'client with this email already exists.';

const byName = (a: Client, b: Client) =>
    a.last_name.localeCompare(b.last_name) || a.first_name.localeCompare(b.first_name);

const byNewest = (a: { created_at: string }, b: { created_at: string }) => b.created_at.localeCompare(a.created_at);

export function ownedClients(db: Db, user: User) {
    return db.data.clients.filter((c) => c.created_by === user.id);
}

export function listClients(db: Db, user: User, filters: ClientFilters = {}): Client[] {
    let clients = ownedClients(db, user);

    // 1. Search (case-insensitive substring)
    if (filters.search) {
        const query = filters.search.toLowerCase();
        clients = clients.filter((c) =>
            [c.first_name, c.last_name, c.email ?? '', c.phone].some((v) => v.toLowerCase().includes(query)));
    }

    // 2. Exact filters
    if (filters.is_active !== undefined) {
        clients = clients.filter((c) => c.is_active === filters.is_active);
    }
    if (filters.city) {
        clients = clients.filter((c) => c.city === filters.city);
    }

    return clients.sort(byName);
}

/** Client owned by the caller; anything else is a 404. */
export function getClient(db: Db, user: User, id: string): Client {
    const client = db.data.clients.find((c) => c.id === id && c.created_by === user.id);
    if (!client) throw new NotFoundError();
    return client;
}

function assertEmailUnique(db: Db, user: User, email: string | null | undefined, exceptId?: string) {
    if (!email) return;
    const needle = email.toLowerCase();
    const clash = ownedClients(db, user).some((c) => c.id !== exceptId && c.email?.toLowerCase() === needle);
    if (clash) throw ValidationError.field('email', DUPLICATE_EMAIL);
}

export async function createClient(db: Db, user: User, input: ClientCreateInput, now = new Date()): Promise<Client> {
    assertEmailUnique(db, user, input.email);

    const timestamp = now.toISOString();
    const client: Client = {
        id: uuidv4(),
        first_name: input.first_name,
        last_name: input.last_name,
        email: input.email ?? null,
        phone: input.phone ?? '',
        address: input.address ?? '',
        city: input.city ?? '',
        state: input.state ?? '',
        postal_code: input.postal_code ?? '',
        country: input.country ?? '',
        date_of_birth: input.date_of_birth ?? null,
        occupation: input.occupation ?? '',
        company: input.company ?? '',
        is_active: input.is_active ?? true,
        created_by: user.id,
        created_at: timestamp,
        updated_at: timestamp,
    };
    db.data.clients.push(client);
    recordActivity(db, user.id, 'client_created', `Created client ${fullName(client)}`, client.id, now);
    await db.write();
    return client;
}

export async function updateClient(db: Db, user: User, client: Client, input: ClientInput, now = new Date()): Promise<Client> {
    if (input.email !== undefined) {
        assertEmailUnique(db, user, input.email, client.id);
    }

    const { email, ...rest } = input;
    for (const [key, value] of Object.entries(rest)) {
        if (value !== undefined) Object.assign(client, { [key]: value });
    }
    if (email !== undefined) client.email = email;
    client.updated_at = now.toISOString();

    recordActivity(db, user.id, 'client_updated', `Updated client ${fullName(client)}`, client.id, now);
    await db.write();
    return client;
}

export async function setClientActive(db: Db, user: User, client: Client, active: boolean) {
    return updateClient(db, user, client, { is_active: active });
}

export async function deleteClient(db: Db, user: User, client: Client) {
    await deleteClientRows(db, client.id);
    recordActivity(db, user.id, 'client_deleted', `Deleted client ${fullName(client)}`, client.id);
    await db.write();
}

export function clientAppointments(db: Db, user: User, client: Client) {
    return db.data.appointments
        .filter((a) => a.user_id === user.id && a.client_id === client.id)
        .sort((a, b) => b.start_time.localeCompare(a.start_time));
}

export function topCities(clients: Client[], limit = 5): CityCountDto[] {
    const counts = new Map<string, number>();
    for (const client of clients) {
        const city = client.city.trim();
        if (city) counts.set(city, (counts.get(city) ?? 0) + 1);
    }
    return [...counts.entries()]
        .map(([city, count]) => ({ city, count }))
        .sort((a, b) => b.count - a.count || a.city.localeCompare(b.city))
        .slice(0, limit);
}

export function clientStats(db: Db, user: User, now = new Date()): ClientStatsDto {
    const clients = ownedClients(db, user);
    const active = clients.filter((c) => c.is_active).length;
    const monthStart = startOfMonth(now);

    return {
        total_clients: clients.length,
        active_clients: active,
        inactive_clients: clients.length - active,
        new_clients_this_month: clients.filter((c) => new Date(c.created_at) >= monthStart).length,
        top_cities: topCities(clients),
    };
}

// --- Notes ---

export function listClientNotes(db: Db, client: Client): ClientNote[] {
    return db.data.client_notes.filter((n) => n.client_id === client.id).sort(byNewest);
}

export function getClientNote(db: Db, client: Client, noteId: string): ClientNote {
    const note = db.data.client_notes.find((n) => n.id === noteId && n.client_id === client.id);
    if (!note) throw new NotFoundError();
    return note;
}

export async function createClientNote(db: Db, user: User, client: Client, input: ClientNoteCreateInput, now = new Date()) {
    const timestamp = now.toISOString();
    const note: ClientNote = {
        id: uuidv4(),
        client_id: client.id,
        title: input.title,
        content: input.content,
        created_by: user.id,
        created_at: timestamp,
        updated_at: timestamp,
    };
    db.data.client_notes.push(note);
    recordActivity(db, user.id, 'client_updated', `Added note "${note.title}" to ${fullName(client)}`, client.id, now);
    await db.write();
    return note;
}

export async function updateClientNote(db: Db, user: User, client: Client, note: ClientNote, input: ClientNoteInput, now = new Date()) {
    if (input.title !== undefined) note.title = input.title;
    if (input.content !== undefined) note.content = input.content;
    note.updated_at = now.toISOString();
    recordActivity(db, user.id, 'client_updated', `Edited note "${note.title}" on ${fullName(client)}`, client.id, now);
    await db.write();
    return note;
}

export async function deleteClientNote(db: Db, user: User, client: Client, note: ClientNote) {
    db.data.client_notes = db.data.client_notes.filter((n) => n.id !== note.id);
    recordActivity(db, user.id, 'client_updated', `Deleted note "${note.title}" from ${fullName(client)}`, client.id);
    await db.write();
}

export function notesSummary(db: Db, client: Client) {
    const notes = listClientNotes(db, client);
    return {
        client: client.id,
        client_name: fullName(client),
        total_notes: notes.length,
        latest_note_at: notes[0]?.created_at ?? null,
        recent_notes: notes.slice(0, 3),
    };
}
