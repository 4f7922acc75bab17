import fs from 'fs';
import path from 'path';
import Papa from 'papaparse';
import { DatabaseManager } from '../db';
import { listAllLeads, listAllWorkers, listJobsForExport } from '../core/repositories';
import { logInfo } from '../telemetry/logger';

export type ExportKind = 'leads' | 'workers' | 'jobs';

export const EXPORT_KINDS: readonly ExportKind[] = ['leads', 'workers', 'jobs'];

export interface ExportResult {
    kind: ExportKind;
    path: string;
    rows: number;
}

type CsvCell = string | number | null;

const LEAD_FIELDS = [
    'ID', 'Name', 'Category', 'Address', 'Lat', 'Lon',
    'Phone', 'Email', 'Status', 'Source', 'Contact Count',
    'Last Contact', 'Created At',
];

const WORKER_FIELDS = [
    'ID', 'Name', 'Skills', 'Phone', 'Email', 'Lat', 'Lon',
    'Status', 'Jobs Completed', 'Rating', 'Created At',
];

const JOB_FIELDS = [
    'Job ID', 'Service', 'Status', 'Price', 'Created At',
    'Lead Name', 'Lead Phone', 'Worker Name', 'Worker Phone',
];

export function defaultExportPath(kind: ExportKind): string {
    return `${kind}_export.csv`;
}

/**
 * Scrive il CSV solo se ci sono righe: un export vuoto non crea file.
 */
function writeCsv(kind: ExportKind, outputPath: string, fields: string[], data: CsvCell[][]): ExportResult {
    if (data.length > 0) {
        const directory = path.dirname(outputPath);
        fs.mkdirSync(directory, { recursive: true });
        fs.writeFileSync(outputPath, Papa.unparse({ fields, data }), 'utf8');
    }
    return { kind, path: outputPath, rows: data.length };
}

export async function exportLeads(db: DatabaseManager, outputPath: string = defaultExportPath('leads')): Promise<ExportResult> {
    const leads = await listAllLeads(db);
    const data: CsvCell[][] = leads.map((lead) => [
        lead.id, lead.name, lead.category, lead.address, lead.lat, lead.lon,
        lead.phone, lead.email, lead.status, lead.source, lead.contact_count,
        lead.last_contact, lead.created_at,
    ]);
    const result = writeCsv('leads', outputPath, LEAD_FIELDS, data);
    await logInfo('export.completed', { ...result });
    return result;
}

export async function exportWorkers(db: DatabaseManager, outputPath: string = defaultExportPath('workers')): Promise<ExportResult> {
    const workers = await listAllWorkers(db);
    const data: CsvCell[][] = workers.map((worker) => [
        worker.id, worker.name, worker.skills, worker.phone, worker.email, worker.lat, worker.lon,
        worker.status, worker.jobs_completed, worker.rating, worker.created_at,
    ]);
    const result = writeCsv('workers', outputPath, WORKER_FIELDS, data);
    await logInfo('export.completed', { ...result });
    return result;
}

export async function exportJobs(db: DatabaseManager, outputPath: string = defaultExportPath('jobs')): Promise<ExportResult> {
    const jobs = await listJobsForExport(db);
    const data: CsvCell[][] = jobs.map((job) => [
        job.id, job.service, job.status, job.price, job.created_at,
        job.lead_name, job.lead_phone, job.worker_name, job.worker_phone,
    ]);
    const result = writeCsv('jobs', outputPath, JOB_FIELDS, data);
    await logInfo('export.completed', { ...result });
    return result;
}

export async function exportByKind(db: DatabaseManager, kind: ExportKind, outputPath?: string): Promise<ExportResult> {
    switch (kind) {
        case 'leads':
            return exportLeads(db, outputPath);
        case 'workers':
            return exportWorkers(db, outputPath);
        case 'jobs':
            return exportJobs(db, outputPath);
    }
}
