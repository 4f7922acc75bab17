#!/usr/bin/env node
import { closeDatabase, initDatabase } from './db';
import { config, validateConfigSchema } from './config';
import { errorMessage } from './core/errors';
import { bindAuditLog } from './telemetry/logger';
import { runAddWorkerCommand, runImportWorkersCommand, runListWorkersCommand } from './cli/commands/workerCommands';
import { runCollectCommand, runLeadStatusCommand, runListLeadsCommand } from './cli/commands/leadCommands';
import { runJobStatusCommand, runListJobsCommand, runMatchCommand } from './cli/commands/dispatchCommands';
import { runSendCommand } from './cli/commands/outreachCommands';
import { runCleanupCommand, runExportCommand, runStatsCommand } from './cli/commands/adminCommands';

// Chiusura ordinata: il DB va chiuso anche su Ctrl+C per non lasciare il WAL a metà.
let shuttingDown = false;
function setupGracefulShutdown(): void {
    const handler = async (signal: string): Promise<void> => {
        if (shuttingDown) return;
        shuttingDown = true;
        console.warn(`[SIGNAL] ${signal} ricevuto, chiusura in corso...`);
        await closeDatabase();
        process.exit(130);
    };
    process.on('SIGINT', () => { void handler('SIGINT'); });
    process.on('SIGTERM', () => { void handler('SIGTERM'); });
}

function printHelp(): void {
    console.log('Utilizzo: npm start -- <comando> [opzioni]');
    console.log('Comandi:');
    console.log('  collect --city <città> --service <servizio> [--limit <n>]');
    console.log('  import-workers --file <workers.csv>');
    console.log('  add-worker --name <nome> --skills <a,b> [--phone <tel>] [--email <email>] [--lat <lat> --lon <lon>]');
    console.log('  list-leads [--limit <n>]');
    console.log('  list-workers [--limit <n>]');
    console.log('  list-jobs [--status dispatched|complete|paid|cancelled] [--limit <n>]');
    console.log('  lead-status <leadId> <new|contacted|converted|invalid>');
    console.log('  match --service <servizio> [--max <n>]');
    console.log('  job-status <jobId> <complete|paid|cancelled> [--rating <0-5>] [--evidence <testo>] [--notes <testo>]');
    console.log('  send-whatsapp --lead-id <id> --city <città> --service <servizio> [--template <chiave>] [--sender <nome>]');
    console.log('  send-email --lead-id <id> --city <città> --service <servizio> [--template <chiave>] [--sender <nome>] [--phone <tel>]');
    console.log('  export leads|workers|jobs [--output <file.csv>]');
    console.log('  stats');
    console.log('  cleanup');
}

async function main(): Promise<void> {
    setupGracefulShutdown();
    const args = process.argv.slice(2);
    const command = args[0];
    const commandArgs = args.slice(1);

    if (!command || command === 'help' || command === '--help') {
        printHelp();
        return;
    }

    for (const warning of validateConfigSchema(config)) {
        console.warn(warning);
    }

    const db = await initDatabase();
    bindAuditLog(db);

    switch (command) {
        case 'collect':
            await runCollectCommand(db, commandArgs);
            break;
        case 'import-workers':
            await runImportWorkersCommand(db, commandArgs);
            break;
        case 'add-worker':
            await runAddWorkerCommand(db, commandArgs);
            break;
        case 'list-leads':
            await runListLeadsCommand(db, commandArgs);
            break;
        case 'list-workers':
            await runListWorkersCommand(db, commandArgs);
            break;
        case 'list-jobs':
            await runListJobsCommand(db, commandArgs);
            break;
        case 'lead-status':
            await runLeadStatusCommand(db, commandArgs);
            break;
        case 'match':
            await runMatchCommand(db, commandArgs);
            break;
        case 'job-status':
            await runJobStatusCommand(db, commandArgs);
            break;
        case 'send-whatsapp':
            await runSendCommand(db, 'whatsapp', commandArgs);
            break;
        case 'send-email':
            await runSendCommand(db, 'email', commandArgs);
            break;
        case 'export':
            await runExportCommand(db, commandArgs);
            break;
        case 'stats':
            await runStatsCommand(db);
            break;
        case 'cleanup':
            await runCleanupCommand(db);
            break;
        default:
            console.error(`Comando sconosciuto: ${command}`);
            printHelp();
            process.exitCode = 1;
            break;
    }
}

main()
    .catch((error) => {
        console.error('[FATAL]', errorMessage(error));
        process.exitCode = 1;
    })
    .finally(async () => {
        bindAuditLog(null);
        await closeDatabase();
    });
