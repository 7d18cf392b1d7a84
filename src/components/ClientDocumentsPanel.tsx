"use client";

import { useCallback, useEffect, useRef, useState } from "react";
import { Download, FileText, Loader2, Paperclip, Trash2 } from "lucide-react";
import { toast } from "sonner";
import { Button } from "@/components/ui/button";
import { Input } from "@/components/ui/input";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import { useApi } from "@/components/ApiProvider";
import type { ClientDocumentDto } from "@/lib/api-types";
import { describeError, formatDateTime, removeById, upsertById } from "@/lib/view-models";

function formatSize(bytes: number) {
    if (bytes < 1024) return `${bytes} B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function ClientDocumentsPanel({ clientId }: { clientId: string }) {
    const api = useApi();
    const [documents, setDocuments] = useState<ClientDocumentDto[]>([]);
    const [loading, setLoading] = useState(true);
    const [uploading, setUploading] = useState(false);
    const [title, setTitle] = useState("");
    const [documentType, setDocumentType] = useState("");
    const fileInputRef = useRef<HTMLInputElement>(null);

    const fetchDocuments = useCallback(async () => {
        try {
            const page = await api.clients.documents(clientId, { page_size: 100 });
            setDocuments(page.results);
        } catch (error) {
            toast.error(describeError(error));
        } finally {
            setLoading(false);
        }
    }, [api, clientId]);

    useEffect(() => {
        void fetchDocuments();
    }, [fetchDocuments]);

    const handleUpload = async (e: React.ChangeEvent<HTMLInputElement>) => {
        const file = e.target.files?.[0];
        if (!file) return;

        setUploading(true);
        try {
            const doc = await api.clients.uploadDocument(clientId, file, file.name, {
                title: title || file.name,
                document_type: documentType,
            });
            setDocuments((prev) => upsertById(prev, doc));
            setTitle("");
            setDocumentType("");
            toast.success("Document uploaded.");
        } catch (error) {
            toast.error(describeError(error));
        } finally {
            setUploading(false);
            if (fileInputRef.current) fileInputRef.current.value = "";
        }
    };

    const handleDownload = async (doc: ClientDocumentDto) => {
        try {
            const blob = await api.clients.downloadDocument(doc);
            const url = URL.createObjectURL(blob);
            const link = document.createElement("a");
            link.href = url;
            link.download = doc.file_name;
            link.click();
            URL.revokeObjectURL(url);
        } catch (error) {
            toast.error(describeError(error));
        }
    };

    const handleDelete = async (doc: ClientDocumentDto) => {
        if (!confirm(`Delete "${doc.title}"?`)) return;
        try {
            await api.clients.removeDocument(clientId, doc.id);
            setDocuments((prev) => removeById(prev, doc.id));
            toast.success("Document deleted.");
        } catch (error) {
            toast.error(describeError(error));
        }
    };

    return (
        <Card>
            <CardHeader>
                <CardTitle>Documents</CardTitle>
            </CardHeader>
            <CardContent className="space-y-6">
                <div className="flex flex-col gap-2 sm:flex-row">
                    <Input aria-label="Document title" placeholder="Title (optional)" value={title} onChange={(e) => setTitle(e.target.value)} />
                    <Input
                        aria-label="Document type"
                        placeholder="Type, e.g. contract"
                        value={documentType}
                        onChange={(e) => setDocumentType(e.target.value)}
                    />
                    <input ref={fileInputRef} type="file" className="hidden" onChange={(e) => void handleUpload(e)} />
                    <Button type="button" disabled={uploading} onClick={() => fileInputRef.current?.click()}>
                        {uploading ? <Loader2 className="h-4 w-4 animate-spin" /> : <Paperclip className="h-4 w-4" />}
                        Upload
                    </Button>
                </div>

                {loading ? (
                    <Loader2 className="h-5 w-5 animate-spin text-muted-foreground" />
                ) : documents.length === 0 ? (
                    <p className="text-sm text-muted-foreground">No documents uploaded.</p>
                ) : (
                    <ul className="divide-y">
                        {documents.map((doc) => (
                            <li key={doc.id} className="flex items-center justify-between gap-4 py-3">
                                <div className="flex items-center gap-3">
                                    <FileText className="h-5 w-5 text-muted-foreground" />
                                    <div>
                                        <p className="font-medium">{doc.title}</p>
                                        <p className="text-xs text-muted-foreground">
                                            {[doc.document_type, formatSize(doc.size), formatDateTime(doc.uploaded_at)].filter(Boolean).join(" · ")}
                                        </p>
                                    </div>
                                </div>
                                <div className="flex">
                                    <Button variant="ghost" size="icon" aria-label="Download" onClick={() => void handleDownload(doc)}>
                                        <Download className="h-4 w-4" />
                                    </Button>
                                    <Button variant="ghost" size="icon" aria-label="Delete document" onClick={() => void handleDelete(doc)}>
                                        <Trash2 className="h-4 w-4" />
                                    </Button>
                                </div>
                            </li>
                        ))}
                    </ul>
                )}
            </CardContent>
        </Card>
    );
}
