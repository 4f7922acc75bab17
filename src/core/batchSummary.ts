import { BatchSummary } from '../types/domain';

export function emptySummary(): BatchSummary {
    return { succeeded: 0, skipped: 0, errors: 0 };
}

export function formatSummary(summary: BatchSummary): string {
    return `${summary.succeeded} ok, ${summary.skipped} saltati, ${summary.errors} errori`;
}
