// Core data structures for the annotation service

export interface Annotation {
    start: number;
    end: number;
    text: string;
    label: string;
    rank: string | null;
}

export interface StoredDocument {
    doc_id: string;
    filename: string;
    text: string;
    preview: string;
}

// Inbound upload before a preview has been computed
export interface DocumentInput {
    doc_id: string;
    filename: string;
    text: string;
}

export interface DocumentText {
    doc_id: string;
    text: string;
}

export type LabelPalette = Record<string, string>;

export interface UserRecord {
    salt: string;
    passwordHash: string;
}

export interface LoginResponse {
    token: string;
    username: string;
}

export interface ErrorResponse {
    error: string;
    details?: { path: string; message: string }[];
}
