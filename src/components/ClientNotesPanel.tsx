"use client";

import { useCallback, useEffect, useState } from "react";
import { Loader2, Pencil, Plus, Trash2 } from "lucide-react";
import { toast } from "sonner";
import { Button } from "@/components/ui/button";
import { Input } from "@/components/ui/input";
import { Textarea } from "@/components/ui/textarea";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import { useApi } from "@/components/ApiProvider";
import type { ClientNoteDto } from "@/lib/api-types";
import { fullName } from "@/lib/labels";
import { describeError, formatDateTime, removeById, replaceById, upsertById } from "@/lib/view-models";

interface Draft {
    title: string;
    content: string;
}

const EMPTY_DRAFT: Draft = { title: "", content: "" };

export function ClientNotesPanel({ clientId }: { clientId: string }) {
    const api = useApi();
    const [notes, setNotes] = useState<ClientNoteDto[]>([]);
    const [loading, setLoading] = useState(true);
    const [draft, setDraft] = useState<Draft>(EMPTY_DRAFT);
    const [saving, setSaving] = useState(false);
    const [editingId, setEditingId] = useState<string | null>(null);
    const [editDraft, setEditDraft] = useState<Draft>(EMPTY_DRAFT);

    const fetchNotes = useCallback(async () => {
        try {
            const page = await api.clients.notes(clientId, { page_size: 100 });
            setNotes(page.results);
        } catch (error) {
            toast.error(describeError(error));
        } finally {
            setLoading(false);
        }
    }, [api, clientId]);

    useEffect(() => {
        void fetchNotes();
    }, [fetchNotes]);

    const handleAdd = async (e: React.FormEvent) => {
        e.preventDefault();
        if (!draft.title.trim() || !draft.content.trim()) return;
        setSaving(true);
        try {
            const note = await api.clients.addNote(clientId, draft);
            setNotes((prev) => upsertById(prev, note));
            setDraft(EMPTY_DRAFT);
            toast.success("Note added.");
        } catch (error) {
            toast.error(describeError(error));
        } finally {
            setSaving(false);
        }
    };

    const startEdit = (note: ClientNoteDto) => {
        setEditingId(note.id);
        setEditDraft({ title: note.title, content: note.content });
    };

    const handleUpdate = async (noteId: string) => {
        try {
            const note = await api.clients.updateNote(clientId, noteId, editDraft);
            setNotes((prev) => replaceById(prev, note));
            setEditingId(null);
        } catch (error) {
            toast.error(describeError(error));
        }
    };

    const handleDelete = async (noteId: string) => {
        if (!confirm("Delete this note?")) return;
        try {
            await api.clients.removeNote(clientId, noteId);
            setNotes((prev) => removeById(prev, noteId));
        } catch (error) {
            toast.error(describeError(error));
        }
    };

    return (
        <Card>
            <CardHeader>
                <CardTitle>Notes</CardTitle>
            </CardHeader>
            <CardContent className="space-y-6">
                <form onSubmit={handleAdd} className="space-y-2">
                    <Input
                        aria-label="Note title"
                        placeholder="Title"
                        value={draft.title}
                        onChange={(e) => setDraft((prev) => ({ ...prev, title: e.target.value }))}
                    />
                    <Textarea
                        aria-label="Note content"
                        placeholder="Write a note..."
                        value={draft.content}
                        onChange={(e) => setDraft((prev) => ({ ...prev, content: e.target.value }))}
                    />
                    <Button type="submit" size="sm" disabled={saving || !draft.title.trim() || !draft.content.trim()}>
                        {saving ? <Loader2 className="h-4 w-4 animate-spin" /> : <Plus className="h-4 w-4" />}
                        Add note
                    </Button>
                </form>

                {loading ? (
                    <Loader2 className="h-5 w-5 animate-spin text-muted-foreground" />
                ) : notes.length === 0 ? (
                    <p className="text-sm text-muted-foreground">No notes yet.</p>
                ) : (
                    <ul className="space-y-4">
                        {notes.map((note) => (
                            <li key={note.id} className="rounded-md border p-4">
                                {editingId === note.id ? (
                                    <div className="space-y-2">
                                        <Input
                                            aria-label="Edit title"
                                            value={editDraft.title}
                                            onChange={(e) => setEditDraft((prev) => ({ ...prev, title: e.target.value }))}
                                        />
                                        <Textarea
                                            aria-label="Edit content"
                                            value={editDraft.content}
                                            onChange={(e) => setEditDraft((prev) => ({ ...prev, content: e.target.value }))}
                                        />
                                        <div className="flex gap-2">
                                            <Button size="sm" onClick={() => void handleUpdate(note.id)}>Save</Button>
                                            <Button size="sm" variant="outline" onClick={() => setEditingId(null)}>Cancel</Button>
                                        </div>
                                    </div>
                                ) : (
                                    <>
                                        <div className="flex items-start justify-between gap-2">
                                            <div>
                                                <p className="font-medium">{note.title}</p>
                                                <p className="text-xs text-muted-foreground">
                                                    {formatDateTime(note.created_at)}
                                                    {note.created_by && ` by ${fullName(note.created_by)}`}
                                                </p>
                                            </div>
                                            <div className="flex">
                                                <Button variant="ghost" size="icon" aria-label="Edit note" onClick={() => startEdit(note)}>
                                                    <Pencil className="h-4 w-4" />
                                                </Button>
                                                <Button variant="ghost" size="icon" aria-label="Delete note" onClick={() => void handleDelete(note.id)}>
                                                    <Trash2 className="h-4 w-4" />
                                                </Button>
                                            </div>
                                        </div>
                                        <p className="mt-2 whitespace-pre-wrap text-sm">{note.content}</p>
                                    </>
                                )}
                            </li>
                        ))}
                    </ul>
                )}
            </CardContent>
        </Card>
    );
}
