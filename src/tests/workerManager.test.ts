import assert from 'assert';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { after, describe, it } from 'node:test';
import { listAllWorkers } from '../core/repositories';
import { addWorker, listWorkers, prepareWorker } from '../core/workerManager';
import { importWorkersFromCSV } from '../csvImporter';
import { createTestDatabase, FakeClock, seedWorker } from './helpers';

const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lead-dispatch-workers-'));

after(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
});

function writeCsv(name: string, lines: string[]): string {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, lines.join('\n'), 'utf8');
    return filePath;
}

describe('prepareWorker', () => {
    it('normalizza le skill in minuscolo separate da virgola', () => {
        const result = prepareWorker({ name: 'Ravi', skills: ' Plumbing , ELECTRICAL,, ' });
        assert.ok(result.ok);
        assert.equal(result.worker.input.skills, 'plumbing,electrical');
    });
});

describe('addWorker', () => {
    it('inserisce un worker valido', async () => {
        const db = await createTestDatabase();
        const result = await addWorker(
            db,
            { name: 'Ravi Kumar', skills: 'Plumbing', phone: '+91 98765 43210', email: 'ravi@example.com', lat: '19.08', lon: '72.88' },
            new FakeClock()
        );
        assert.deepEqual(result, { ok: true, workerId: 1, downgraded: [] });
        const [worker] = await listAllWorkers(db);
        assert.equal(worker?.skills, 'plumbing');
        assert.equal(worker?.lat, 19.08);
        assert.equal(worker?.status, 'active');
        await db.close();
    });

    it('fallisce chiuso su telefono o email non validi', async () => {
        const db = await createTestDatabase();
        const result = await addWorker(db, { name: 'Anil', skills: 'carpentry', phone: 'call me', email: 'anil@' });
        assert.deepEqual(result, { ok: false, reason: 'invalid_input', message: 'Campi non validi: phone, email.' });
        assert.deepEqual(await listAllWorkers(db), []);
        await db.close();
    });

    it('accetta coordinate non valide come posizione sconosciuta', async () => {
        const db = await createTestDatabase();
        const result = await addWorker(db, { name: 'Anil', skills: 'carpentry', lat: '95', lon: '10' });
        assert.ok(result.ok);
        assert.deepEqual(result.downgraded, [{ field: 'coordinates', reason: 'invalid_coordinates' }]);
        const [worker] = await listAllWorkers(db);
        assert.equal(worker?.lat, null);
        assert.equal(worker?.lon, null);
        await db.close();
    });

    it('segnala il telefono duplicato e i campi obbligatori mancanti', async () => {
        const db = await createTestDatabase();
        await addWorker(db, { name: 'Ravi', skills: 'plumbing', phone: '+91 98765 43210' });
        const duplicate = await addWorker(db, { name: 'Other Ravi', skills: 'plumbing', phone: '+91 98765 43210' });
        assert.equal(!duplicate.ok && duplicate.reason, 'duplicate');

        const noSkills = await addWorker(db, { name: 'Sunil', skills: '' });
        assert.deepEqual(noSkills, { ok: false, reason: 'invalid_input', message: 'Skills worker mancanti.' });
        await db.close();
    });

    it('consente più worker senza telefono', async () => {
        const db = await createTestDatabase();
        assert.ok((await addWorker(db, { name: 'A', skills: 'painting' })).ok);
        assert.ok((await addWorker(db, { name: 'B', skills: 'painting' })).ok);
        assert.equal((await listAllWorkers(db)).length, 2);
        await db.close();
    });
});

describe('listWorkers', () => {
    it('elenca solo gli attivi per lavori completati e poi id decrescente', async () => {
        const db = await createTestDatabase();
        const a = await seedWorker(db, { name: 'A', skills: 'plumbing', jobsCompleted: 3 });
        const b = await seedWorker(db, { name: 'B', skills: 'plumbing', jobsCompleted: 3 });
        const c = await seedWorker(db, { name: 'C', skills: 'plumbing', jobsCompleted: 7 });
        await seedWorker(db, { name: 'D', skills: 'plumbing', jobsCompleted: 9, status: 'inactive' });

        assert.deepEqual((await listWorkers(db)).map((worker) => worker.id), [c, b, a]);
        assert.deepEqual((await listWorkers(db, 1)).map((worker) => worker.id), [c]);
        await db.close();
    });
});

describe('importWorkersFromCSV', () => {
    it('importa le righe valide, azzera i campi non validi e conta duplicati ed errori', async () => {
        const db = await createTestDatabase();
        const filePath = writeCsv('workers.csv', [
            'name,skills,phone,email,lat,lon',
            'Ravi Kumar,"Plumbing, Electrical",+91 98765 43210,ravi@example.com,19.08,72.88',
            'Anil,carpentry,not-a-phone,bad@,abc,72.1',
            ',plumbing,+91 11111 11111,,,',
            'Sunil,,+91 22222 22222,,,',
            'Duplicate Ravi,plumbing,+91 98765 43210,,,',
        ]);

        const result = await importWorkersFromCSV(db, filePath, new FakeClock());
        assert.deepEqual(result.summary, { succeeded: 2, skipped: 1, errors: 2 });
        assert.deepEqual(result.rowErrors, [
            { row: 4, message: 'Nome worker mancante.' },
            { row: 5, message: 'Skills worker mancanti.' },
        ]);

        const [ravi, anil] = await listAllWorkers(db);
        assert.equal(ravi?.skills, 'plumbing,electrical');
        assert.equal(ravi?.lat, 19.08);
        assert.equal(ravi?.email, 'ravi@example.com');
        assert.equal(anil?.phone, null);
        assert.equal(anil?.email, '');
        assert.equal(anil?.lat, null);
        await db.close();
    });

    it('accetta full_name e intestazioni con maiuscole', async () => {
        const db = await createTestDatabase();
        const filePath = writeCsv('workers-alt.csv', ['Full_Name,Skills', 'Meena Joshi,Cleaning']);

        const result = await importWorkersFromCSV(db, filePath);
        assert.deepEqual(result.summary, { succeeded: 1, skipped: 0, errors: 0 });
        const [worker] = await listAllWorkers(db);
        assert.equal(worker?.name, 'Meena Joshi');
        assert.equal(worker?.skills, 'cleaning');
        await db.close();
    });

    it('rifiuta un file inesistente', async () => {
        const db = await createTestDatabase();
        await assert.rejects(importWorkersFromCSV(db, path.join(tempDir, 'missing.csv')));
        await db.close();
    });
});
