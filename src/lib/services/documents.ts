import fs from 'fs';
import path from 'path';
import type { IncomingMessage } from 'http';
import { IncomingForm, type Fields, type Files } from 'formidable';
import { v4 as uuidv4 } from 'uuid';
import type { Db } from '../database';
import type { Client, ClientDocument, User } from '../types';
import { getServerConfig } from '../config';
import { NotFoundError, ValidationError } from '../errors';
import { fullName } from '../labels';
import { documentFieldsSchema, type DocumentFieldsInput } from '../validation/clients';
import { recordActivity } from './activity';

export const DOCUMENT_FIELD = 'document';

export function clientUploadDir(clientId: string) {
    return path.join(getServerConfig().uploadDir, 'clients', clientId);
}

export function listClientDocuments(db: Db, client: Client): ClientDocument[] {
    return db.data.client_documents
        .filter((d) => d.client_id === client.id)
        .sort((a, b) => b.uploaded_at.localeCompare(a.uploaded_at));
}

export function getClientDocument(db: Db, client: Client, documentId: string): ClientDocument {
    const doc = db.data.client_documents.find((d) => d.id === documentId && d.client_id === client.id);
    if (!doc) throw new NotFoundError();
    return doc;
}

function firstField(fields: Fields, name: string) {
    const value = fields[name];
    return Array.isArray(value) ? value[0] : value;
}

// formidable rejects with an Error carrying the HTTP status it suggests.
function isUploadError(error: unknown): error is Error & { httpCode: number } {
    return error instanceof Error && 'httpCode' in error && typeof error.httpCode === 'number';
}

async function parseMultipart(req: IncomingMessage, uploadDir: string): Promise<[Fields, Files]> {
    const form = new IncomingForm({
        uploadDir,
        keepExtensions: true,
        maxFileSize: getServerConfig().maxUploadBytes,
        maxFiles: 1,
    });

    try {
        return await new Promise<[Fields, Files]>((resolve, reject) => {
            form.parse(req, (err, fields, files) => {
                if (err) reject(err);
                else resolve([fields, files]);
            });
        });
    } catch (error) {
        if (isUploadError(error) && error.httpCode < 500) {
            throw ValidationError.field(DOCUMENT_FIELD, error.message);
        }
        throw error;
    }
}

/** Stores a multipart upload (field `document`) under the client's directory. */
export async function uploadClientDocument(db: Db, user: User, client: Client, req: IncomingMessage, now = new Date()) {
    const uploadDir = clientUploadDir(client.id);
    await fs.promises.mkdir(uploadDir, { recursive: true });

    const [fields, files] = await parseMultipart(req, uploadDir);
    const uploaded = files[DOCUMENT_FIELD]?.[0];
    if (!uploaded) {
        throw ValidationError.field(DOCUMENT_FIELD, 'No file was submitted.');
    }

    let meta: DocumentFieldsInput;
    try {
        meta = documentFieldsSchema.parse({
            title: firstField(fields, 'title'),
            description: firstField(fields, 'description'),
            document_type: firstField(fields, 'document_type'),
        });
    } catch (error) {
        await fs.promises.rm(uploaded.filepath, { force: true });
        throw error;
    }

    const fileName = uploaded.originalFilename || path.basename(uploaded.filepath);
    const doc: ClientDocument = {
        id: uuidv4(),
        client_id: client.id,
        title: meta.title || fileName,
        description: meta.description ?? '',
        document_type: meta.document_type ?? '',
        file_name: fileName,
        mime_type: uploaded.mimetype || 'application/octet-stream',
        size: uploaded.size,
        path: uploaded.filepath,
        uploaded_by: user.id,
        uploaded_at: now.toISOString(),
    };
    db.data.client_documents.push(doc);
    recordActivity(db, user.id, 'client_updated', `Uploaded ${doc.file_name} for ${fullName(client)}`, client.id, now);
    await db.write();
    return doc;
}

export async function updateClientDocument(db: Db, user: User, client: Client, doc: ClientDocument, input: DocumentFieldsInput) {
    if (input.title) doc.title = input.title;
    if (input.description !== undefined) doc.description = input.description;
    if (input.document_type !== undefined) doc.document_type = input.document_type;
    recordActivity(db, user.id, 'client_updated', `Updated document ${doc.file_name} for ${fullName(client)}`, client.id);
    await db.write();
    return doc;
}

export async function deleteClientDocument(db: Db, user: User, client: Client, doc: ClientDocument) {
    db.data.client_documents = db.data.client_documents.filter((d) => d.id !== doc.id);
    recordActivity(db, user.id, 'client_updated', `Deleted document ${doc.file_name} for ${fullName(client)}`, client.id);
    await db.write();
    await fs.promises.rm(doc.path, { force: true });
}

export function openDocumentStream(doc: ClientDocument) {
    if (!fs.existsSync(doc.path)) {
        throw new NotFoundError('File not found on server.');
    }
    return fs.createReadStream(doc.path);
}
