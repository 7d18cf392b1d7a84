import { v4 as uuidv4 } from 'uuid';
import type { Db } from '../database';
import type { Case, CaseNote, CaseStatus, User } from '../types';
import { NotFoundError, ValidationError } from '../errors';
import type { CaseCreateInput, CaseInput } from '../validation/cases';
import { recordActivity } from './activity';
import { deleteCaseRows } from './cascade';

export interface CaseFilters {
    status?: string;
    client?: string;
    search?: string;
}

function isVisibleTo(item: Case, user: User) {
    return item.created_by === user.id || item.assigned_to.includes(user.id);
}

/** Cases the caller created or is assigned to, newest first. */
export function listCases(db: Db, user: User, filters: CaseFilters = {}): Case[] {
    let cases = db.data.cases.filter((c) => isVisibleTo(c, user));

    if (filters.status) {
        cases = cases.filter((c) => c.status === filters.status);
    }
    if (filters.client) {
        cases = cases.filter((c) => c.client_id === filters.client);
    }
    if (filters.search) {
        const query = filters.search.toLowerCase();
        cases = cases.filter((c) => c.title.toLowerCase().includes(query));
    }

    return cases.sort((a, b) => b.created_at.localeCompare(a.created_at));
}

export function getCase(db: Db, user: User, id: string): Case {
    const item = db.data.cases.find((c) => c.id === id && isVisibleTo(c, user));
    if (!item) throw new NotFoundError();
    return item;
}

function resolveClientId(db: Db, user: User, clientId: string) {
    const client = db.data.clients.find((c) => c.id === clientId && c.created_by === user.id);
    if (!client) {
        throw ValidationError.field('client', `Invalid pk "${clientId}" - object does not exist.`);
    }
    return client.id;
}

function resolveAssignees(db: Db, ids: string[]) {
    const unique = [...new Set(ids)];
    const missing = unique.find((id) => !db.data.users.some((u) => u.id === id));
    if (missing) {
        throw ValidationError.field('assigned_to', `Invalid pk "${missing}" - object does not exist.`);
    }
    return unique;
}

/**
 * Single place where status changes land: entering `closed` stamps closed_at,
 * any other status clears it.
 */
export function applyCaseStatus(item: Case, status: CaseStatus, now: Date) {
    item.status = status;
    item.closed_at = status === 'closed' ? now.toISOString() : null;
}

export async function createCase(db: Db, user: User, input: CaseCreateInput, now = new Date()): Promise<Case> {
    const timestamp = now.toISOString();
    const item: Case = {
        id: uuidv4(),
        title: input.title,
        description: input.description ?? '',
        client_id: resolveClientId(db, user, input.client),
        status: 'open',
        created_by: user.id,
        assigned_to: resolveAssignees(db, input.assigned_to ?? []),
        created_at: timestamp,
        updated_at: timestamp,
        closed_at: null,
    };
    applyCaseStatus(item, input.status ?? 'open', now);

    db.data.cases.push(item);
    recordActivity(db, user.id, 'case_created', `Opened case "${item.title}"`, item.id, now);
    await db.write();
    return item;
}

export async function updateCase(db: Db, user: User, item: Case, input: CaseInput, now = new Date()): Promise<Case> {
    // Validate references before touching the row.
    const clientId = input.client !== undefined ? resolveClientId(db, user, input.client) : undefined;
    const assignees = input.assigned_to !== undefined ? resolveAssignees(db, input.assigned_to) : undefined;

    if (input.title !== undefined) item.title = input.title;
    if (input.description !== undefined) item.description = input.description;
    if (clientId !== undefined) item.client_id = clientId;
    if (assignees !== undefined) item.assigned_to = assignees;
    if (input.status !== undefined) applyCaseStatus(item, input.status, now);
    item.updated_at = now.toISOString();

    const closing = input.status === 'closed';
    recordActivity(db, user.id, closing ? 'case_closed' : 'case_updated',
        `${closing ? 'Closed' : 'Updated'} case "${item.title}"`, item.id, now);
    await db.write();
    return item;
}

export function closeCase(db: Db, user: User, item: Case, now = new Date()) {
    return updateCase(db, user, item, { status: 'closed' }, now);
}

export async function addCaseNote(db: Db, user: User, item: Case, content: string, now = new Date()): Promise<CaseNote> {
    const timestamp = now.toISOString();
    const note: CaseNote = {
        id: uuidv4(),
        case_id: item.id,
        author: user.id,
        content,
        created_at: timestamp,
        updated_at: timestamp,
    };
    db.data.case_notes.push(note);
    recordActivity(db, user.id, 'case_note_added', `Added a note to case "${item.title}"`, item.id, now);
    await db.write();
    return note;
}

/** Adds the caller to assigned_to; a second call leaves the set unchanged. */
export async function assignToMe(db: Db, user: User, item: Case, now = new Date()) {
    if (!item.assigned_to.includes(user.id)) {
        item.assigned_to.push(user.id);
        item.updated_at = now.toISOString();
        recordActivity(db, user.id, 'case_updated', `Assigned self to case "${item.title}"`, item.id, now);
        await db.write();
    }
    return item;
}

export async function deleteCase(db: Db, user: User, item: Case) {
    deleteCaseRows(db, item.id);
    recordActivity(db, user.id, 'case_deleted', `Deleted case "${item.title}"`, item.id);
    await db.write();
}
