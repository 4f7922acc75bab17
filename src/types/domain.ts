export type LeadStatus = 'new' | 'contacted' | 'converted' | 'invalid';

export type WorkerStatus = 'active' | 'inactive';

export type JobStatus = 'dispatched' | 'complete' | 'paid' | 'cancelled';

export type MessageChannel = 'whatsapp' | 'email';

export type MessageStatus = 'sent' | 'pending' | 'failed';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export const LEAD_STATUSES: readonly LeadStatus[] = ['new', 'contacted', 'converted', 'invalid'];
export const JOB_STATUSES: readonly JobStatus[] = ['dispatched', 'complete', 'paid', 'cancelled'];
export const MESSAGE_CHANNELS: readonly MessageChannel[] = ['whatsapp', 'email'];

/**
 * Posizione geografica nota. Una posizione sconosciuta è `null`, mai (0, 0).
 */
export interface GeoPoint {
    lat: number;
    lon: number;
}

export interface LeadRecord {
    id: number;
    name: string;
    category: string;
    address: string;
    lat: number | null;
    lon: number | null;
    phone: string;
    email: string;
    source: string;
    note: string | null;
    status: LeadStatus;
    created_at: string;
    updated_at: string | null;
    last_contact: string | null;
    contact_count: number;
}

export interface WorkerRecord {
    id: number;
    name: string;
    skills: string;
    phone: string | null;
    email: string;
    lat: number | null;
    lon: number | null;
    status: WorkerStatus;
    rating: number;
    rating_count: number;
    jobs_completed: number;
    note: string | null;
    created_at: string;
    updated_at: string | null;
}

export interface JobRecord {
    id: number;
    lead_id: number;
    worker_id: number;
    service: string;
    price: number;
    status: JobStatus;
    evidence: string | null;
    notes: string | null;
    created_at: string;
    updated_at: string | null;
    completed_at: string | null;
}

export interface JobListItem {
    id: number;
    service: string;
    status: JobStatus;
    price: number;
    created_at: string;
    lead_name: string;
    worker_name: string;
    worker_phone: string | null;
}

export interface MessageRecord {
    id: number;
    lead_id: number;
    channel: MessageChannel;
    template: string | null;
    content: string;
    status: MessageStatus;
    sent_at: string;
}

export interface CachedQueryRecord {
    id: number;
    query_hash: string;
    query_params: string;
    response_data: string;
    created_at: string;
    expires_at: string;
}

export interface BatchSummary {
    succeeded: number;
    skipped: number;
    errors: number;
}
