import { addDays, addHours, setHours, startOfHour } from 'date-fns';
import { v4 as uuidv4 } from 'uuid';
import type { Db } from '../database';
import type { Client, User, UserType } from '../types';
import { fullName } from '../labels';
import { createUser, findUserByEmail } from './users';

interface SampleUser {
    email: string;
    password: string;
    first_name: string;
    last_name: string;
    user_type: UserType;
}

export const SAMPLE_USERS: SampleUser[] = [
    { email: 'john.doe@lawfirm.com', password: 'password123', first_name: 'John', last_name: 'Doe', user_type: 'lawyer' },
    { email: 'jane.smith@lawfirm.com', password: 'password123', first_name: 'Jane', last_name: 'Smith', user_type: 'paralegal' },
    { email: 'admin@lawfirm.com', password: 'admin123', first_name: 'Admin', last_name: 'User', user_type: 'admin' },
];

const SAMPLE_CLIENTS = [
    { first_name: 'Michael', last_name: 'Johnson', email: 'michael.j@email.com', phone: '+1-555-0101', address: '123 Main St', city: 'New York', state: 'NY', postal_code: '10001', date_of_birth: '1980-05-15' },
    { first_name: 'Sarah', last_name: 'Williams', email: 'sarah.w@email.com', phone: '+1-555-0102', address: '456 Oak Ave', city: 'Los Angeles', state: 'CA', postal_code: '90001', date_of_birth: '1985-08-22' },
    { first_name: 'Robert', last_name: 'Brown', email: 'robert.b@email.com', phone: '+1-555-0103', address: '789 Pine Rd', city: 'Chicago', state: 'IL', postal_code: '60007', date_of_birth: '1975-03-10' },
    { first_name: 'Emily', last_name: 'Davis', email: 'emily.d@email.com', phone: '+1-555-0104', address: '321 Elm St', city: 'Houston', state: 'TX', postal_code: '77001', date_of_birth: '1990-12-05' },
    { first_name: 'James', last_name: 'Miller', email: 'james.m@email.com', phone: '+1-555-0105', address: '654 Maple Dr', city: 'Phoenix', state: 'AZ', postal_code: '85001', date_of_birth: '1982-07-18' },
];

export interface SeedSummary {
    users: number;
    clients: number;
    appointments: number;
}

async function ensureUsers(db: Db, summary: SeedSummary) {
    for (const sample of SAMPLE_USERS) {
        if (findUserByEmail(db, sample.email)) {
            console.info(`[seed] User already exists: ${sample.email}`);
            continue;
        }
        await createUser(db, sample);
        summary.users += 1;
    }
}

function ensureClients(db: Db, owner: User, now: Date, summary: SeedSummary): Client[] {
    const clients: Client[] = [];
    for (const sample of SAMPLE_CLIENTS) {
        const existing = db.data.clients.find((c) => c.created_by === owner.id && c.email === sample.email);
        if (existing) {
            clients.push(existing);
            continue;
        }

        const timestamp = now.toISOString();
        const client: Client = {
            id: uuidv4(),
            ...sample,
            country: 'USA',
            occupation: '',
            company: '',
            is_active: true,
            created_by: owner.id,
            created_at: timestamp,
            updated_at: timestamp,
        };
        db.data.clients.push(client);
        db.data.client_notes.push({
            id: uuidv4(),
            client_id: client.id,
            title: 'Initial Consultation',
            content: `Initial consultation with ${fullName(client)}.`,
            created_by: owner.id,
            created_at: timestamp,
            updated_at: timestamp,
        });
        clients.push(client);
        summary.clients += 1;
        console.info(`[seed] Created client: ${fullName(client)}`);
    }
    return clients;
}

function ensureAppointments(db: Db, owner: User, clients: Client[], now: Date, summary: SeedSummary) {
    clients.forEach((client, index) => {
        const exists = db.data.appointments.some((a) => a.user_id === owner.id && a.client_id === client.id);
        if (exists) return;

        // One hour slots on consecutive days, 10:00 to 14:00 local time.
        const start = startOfHour(setHours(addDays(now, index + 1), 10 + index));
        const timestamp = now.toISOString();
        db.data.appointments.push({
            id: uuidv4(),
            user_id: owner.id,
            client_id: client.id,
            case_id: null,
            title: `Consultation with ${fullName(client)}`,
            description: `Follow-up meeting with ${fullName(client)}.`,
            start_time: start.toISOString(),
            end_time: addHours(start, 1).toISOString(),
            status: index % 2 === 0 ? 'scheduled' : 'confirmed',
            location: 'Main office',
            notes: '',
            created_at: timestamp,
            updated_at: timestamp,
        });
        summary.appointments += 1;
    });
}

/** Creates the demo accounts, clients and appointments. Running it again adds nothing. */
export async function seedSampleData(db: Db, now = new Date()): Promise<SeedSummary> {
    const summary: SeedSummary = { users: 0, clients: 0, appointments: 0 };

    await ensureUsers(db, summary);

    const owner = findUserByEmail(db, SAMPLE_USERS[0].email);
    if (!owner) {
        throw new Error('Sample lawyer account is missing after seeding users');
    }

    const clients = ensureClients(db, owner, now, summary);
    ensureAppointments(db, owner, clients, now, summary);
    await db.write();

    console.info(`[seed] Done: ${summary.users} users, ${summary.clients} clients, ${summary.appointments} appointments created`);
    return summary;
}
