import assert from 'assert';
import { describe, it } from 'node:test';
import { isoAt } from '../core/clock';
import { createJob, findBestWorker, matchAllLeads, UNKNOWN_DISTANCE_PENALTY_KM } from '../core/jobMatcher';
import { isValidLeadTransition, transitionLead } from '../core/leadStateService';
import { getLeadById, insertLead, listJobsForLead, setLeadStatus } from '../core/repositories';
import { DatabaseManager } from '../db';
import { haversineKm } from '../geo/distance';
import { createTestDatabase, FailingDatabase, FakeClock, padWorkersUntil, seedLead, seedWorker } from './helpers';

async function countJobs(db: DatabaseManager): Promise<number> {
    const row = await db.get<{ total: number }>(`SELECT COUNT(*) AS total FROM jobs`);
    return Number(row?.total ?? 0);
}

describe('lead state machine', () => {
    it('applica la tabella delle transizioni', () => {
        assert.equal(isValidLeadTransition('new', 'contacted'), true);
        assert.equal(isValidLeadTransition('new', 'converted'), false);
        assert.equal(isValidLeadTransition('contacted', 'contacted'), true);
        assert.equal(isValidLeadTransition('contacted', 'new'), true);
        assert.equal(isValidLeadTransition('converted', 'new'), false);
        assert.equal(isValidLeadTransition('invalid', 'new'), true);
        assert.equal(isValidLeadTransition('invalid', 'contacted'), false);
    });
});

describe('findBestWorker', () => {
    it('preferisce il punteggio più basso: W2 a 9 km con rating 3 batte W1 a 10 km con rating 0', async () => {
        const db = await createTestDatabase();
        const leadId = await seedLead(db, { name: 'Lead', location: { lat: 10, lon: 76 } });
        await seedWorker(db, { name: 'W1', skills: 'plumbing', location: { lat: 10.09, lon: 76 }, rating: 0 });
        const w2 = await seedWorker(db, { name: 'W2', skills: 'plumbing', location: { lat: 10.081, lon: 76 }, rating: 3 });

        const result = await findBestWorker(db, leadId, 'plumbing');
        assert.equal(result.kind, 'matched');
        assert.ok(result.kind === 'matched');
        assert.equal(result.worker.id, w2);
        const expectedDistance = haversineKm({ lat: 10, lon: 76 }, { lat: 10.081, lon: 76 });
        assert.equal(result.distanceKm, expectedDistance);
        assert.equal(result.score, (expectedDistance ?? 0) - 6);
        await db.close();
    });

    it('sostituisce 999 km alla distanza sconosciuta e decide sul rating', async () => {
        const db = await createTestDatabase();
        const leadId = await seedLead(db, { name: 'Nowhere Lead' });
        await seedWorker(db, { name: 'Low', skills: 'plumbing', location: { lat: 19, lon: 72 }, rating: 1 });
        const high = await seedWorker(db, { name: 'High', skills: 'plumbing', rating: 4 });

        const result = await findBestWorker(db, leadId, 'plumbing');
        assert.ok(result.kind === 'matched');
        assert.equal(result.worker.id, high);
        assert.equal(result.distanceKm, UNKNOWN_DISTANCE_PENALTY_KM);
        assert.equal(result.score, 991);
        await db.close();
    });

    it('filtra le skill per sottostringa case-insensitive e ignora i worker inattivi', async () => {
        const db = await createTestDatabase();
        const leadId = await seedLead(db, { name: 'Lead', location: { lat: 19.07, lon: 72.87 } });
        const electrician = await seedWorker(db, { name: 'Multi', skills: 'plumbing,electrical', location: { lat: 19.08, lon: 72.88 } });
        await seedWorker(db, { name: 'Carpenter', skills: 'carpentry', location: { lat: 19.07, lon: 72.87 } });
        await seedWorker(db, { name: 'Retired', skills: 'electrical', location: { lat: 19.07, lon: 72.87 }, status: 'inactive' });

        const upper = await findBestWorker(db, leadId, 'ELECTRICAL');
        assert.ok(upper.kind === 'matched');
        assert.equal(upper.worker.id, electrician);

        const partial = await findBestWorker(db, leadId, 'elec');
        assert.ok(partial.kind === 'matched');
        assert.equal(partial.worker.id, electrician);

        assert.deepEqual(await findBestWorker(db, leadId, 'painting'), { kind: 'no_match' });
        await db.close();
    });

    it('a parità di punteggio vince il primo nell\'ordine rating, lavori completati, id', async () => {
        const db = await createTestDatabase();
        const leadId = await seedLead(db, { name: 'Lead', location: { lat: 19.07, lon: 72.87 } });
        const spot = { lat: 19.08, lon: 72.88 };
        await seedWorker(db, { name: 'First', skills: 'plumbing', location: spot, rating: 4, jobsCompleted: 1 });
        const veteran = await seedWorker(db, { name: 'Veteran', skills: 'plumbing', location: spot, rating: 4, jobsCompleted: 9 });
        await seedWorker(db, { name: 'Twin', skills: 'plumbing', location: spot, rating: 4, jobsCompleted: 9 });

        const result = await findBestWorker(db, leadId, 'plumbing');
        assert.ok(result.kind === 'matched');
        assert.equal(result.worker.id, veteran);
        await db.close();
    });

    it('segnala il lead inesistente', async () => {
        const db = await createTestDatabase();
        assert.deepEqual(await findBestWorker(db, 404, 'plumbing'), { kind: 'not_found' });
        await db.close();
    });
});

describe('createJob', () => {
    it('crea il job e porta il lead a contacted', async () => {
        const db = await createTestDatabase();
        const clock = new FakeClock();
        const leadId = await seedLead(db, { name: 'Lead' });
        const workerId = await seedWorker(db, { name: 'Worker', skills: 'plumbing' });

        const result = await createJob(db, leadId, workerId, 'plumbing', 0, clock);
        assert.deepEqual(result, { ok: true, jobId: 1 });

        const [job] = await listJobsForLead(db, leadId);
        assert.ok(job);
        assert.equal(job.worker_id, workerId);
        assert.equal(job.status, 'dispatched');
        assert.equal(job.price, 0);
        const lead = await getLeadById(db, leadId);
        assert.equal(lead?.status, 'contacted');
        assert.equal(lead?.updated_at, isoAt(clock));
        await db.close();
    });

    it('fallisce chiuso su lead o worker inesistenti', async () => {
        const db = await createTestDatabase();
        const leadId = await seedLead(db, { name: 'Lead' });
        const workerId = await seedWorker(db, { name: 'Worker', skills: 'plumbing' });

        const missingWorker = await createJob(db, leadId, 999, 'plumbing');
        assert.equal(!missingWorker.ok && missingWorker.reason, 'not_found');
        const missingLead = await createJob(db, 999, workerId, 'plumbing');
        assert.equal(!missingLead.ok && missingLead.reason, 'not_found');
        assert.equal(await countJobs(db), 0);
        assert.equal((await getLeadById(db, leadId))?.status, 'new');
        await db.close();
    });

    it('rifiuta il dispatch su un lead già convertito', async () => {
        const db = await createTestDatabase();
        const leadId = await seedLead(db, { name: 'Lead' });
        const workerId = await seedWorker(db, { name: 'Worker', skills: 'plumbing' });
        await setLeadStatus(db, leadId, 'converted', new Date().toISOString());

        const result = await createJob(db, leadId, workerId, 'plumbing');
        assert.equal(!result.ok && result.reason, 'invalid_transition');
        assert.equal(await countJobs(db), 0);
        await db.close();
    });

    it('annulla entrambe le scritture se l\'aggiornamento del lead fallisce', async () => {
        const db = await createTestDatabase();
        const leadId = await seedLead(db, { name: 'Lead' });
        const workerId = await seedWorker(db, { name: 'Worker', skills: 'plumbing' });

        const result = await createJob(new FailingDatabase(db, /UPDATE leads/), leadId, workerId, 'plumbing');
        assert.equal(!result.ok && result.reason, 'write_failed');
        assert.equal(await countJobs(db), 0);
        assert.equal((await getLeadById(db, leadId))?.status, 'new');
        await db.close();
    });

    it('lascia il lead invariato se l\'inserimento del job fallisce', async () => {
        const db = await createTestDatabase();
        const leadId = await seedLead(db, { name: 'Lead' });
        const workerId = await seedWorker(db, { name: 'Worker', skills: 'plumbing' });

        const result = await createJob(new FailingDatabase(db, /INSERT INTO jobs/), leadId, workerId, 'plumbing');
        assert.equal(!result.ok && result.reason, 'write_failed');
        assert.equal(await countJobs(db), 0);
        assert.equal((await getLeadById(db, leadId))?.status, 'new');
        await db.close();
    });
});

describe('matchAllLeads', () => {
    it('non riassegna i lead contacted finché non vengono riportati a new', async () => {
        const db = await createTestDatabase();
        const clock = new FakeClock();
        const leadId = await seedLead(db, { name: 'Lead', location: { lat: 19.07, lon: 72.87 } });
        await seedWorker(db, { name: 'Worker', skills: 'plumbing', location: { lat: 19.08, lon: 72.88 } });

        const first = await matchAllLeads(db, 'plumbing', 10, clock);
        assert.equal(first.created, 1);
        const second = await matchAllLeads(db, 'plumbing', 10, clock);
        assert.equal(second.created, 0);
        assert.deepEqual(second.outcomes, []);

        await transitionLead(db, leadId, 'new', isoAt(clock));
        const third = await matchAllLeads(db, 'plumbing', 10, clock);
        assert.equal(third.created, 1);
        assert.equal((await listJobsForLead(db, leadId)).length, 2);
        await db.close();
    });

    it('filtra per categoria, rispetta il massimo e riporta i lead senza worker', async () => {
        const db = await createTestDatabase();
        const clock = new FakeClock();
        const now = isoAt(clock);
        for (const name of ['A', 'B', 'C']) {
            await insertLead(db, { name, category: 'Plumbing Services', address: '', location: null, phone: '', email: '' }, now);
        }
        const electricalLead = await seedLead(db, { name: 'D', category: 'electrical' });
        await seedWorker(db, { name: 'Worker', skills: 'plumbing' });

        const report = await matchAllLeads(db, 'plumbing', 2, clock);
        assert.equal(report.created, 2);
        assert.deepEqual(report.summary, { succeeded: 2, skipped: 0, errors: 0 });
        assert.deepEqual(report.outcomes.map((outcome) => outcome.leadId), [1, 2]);
        assert.equal((await getLeadById(db, electricalLead))?.status, 'new');

        const noWorker = await matchAllLeads(db, 'electrical', 10, clock);
        assert.deepEqual(noWorker.outcomes, [{ leadId: electricalLead, status: 'no_match' }]);
        assert.deepEqual(noWorker.summary, { succeeded: 0, skipped: 1, errors: 0 });
        assert.equal((await getLeadById(db, electricalLead))?.status, 'new');
        await db.close();
    });

    it('continua il batch dopo un errore di scrittura su un lead', async () => {
        const db = await createTestDatabase();
        await seedLead(db, { name: 'A' });
        await seedLead(db, { name: 'B' });
        await seedWorker(db, { name: 'Worker', skills: 'plumbing' });

        const report = await matchAllLeads(new FailingDatabase(db, /INSERT INTO jobs/), 'plumbing', 10);
        assert.equal(report.created, 0);
        assert.deepEqual(report.summary, { succeeded: 0, skipped: 0, errors: 2 });
        assert.deepEqual(
            report.outcomes.map((outcome) => outcome.status),
            ['failed', 'failed']
        );
        await db.close();
    });

    it('scenario Mumbai: il lead 1 va al worker 5', async () => {
        const db = await createTestDatabase();
        const clock = new FakeClock();
        const leadId = await seedLead(db, { name: 'Mumbai Plumbing Co', category: 'plumbing', location: { lat: 19.07, lon: 72.87 } });
        await padWorkersUntil(db, 5);
        const nearId = await seedWorker(db, {
            name: 'Ravi',
            skills: 'plumbing,electrical',
            location: { lat: 19.08, lon: 72.88 },
            rating: 4.5,
        });
        await padWorkersUntil(db, 9);
        const farId = await seedWorker(db, { name: 'Suresh', skills: 'plumbing', location: { lat: 19.5, lon: 73.1 }, rating: 1.0 });
        assert.deepEqual([leadId, nearId, farId], [1, 5, 9]);

        const best = await findBestWorker(db, 1, 'plumbing');
        assert.ok(best.kind === 'matched');
        assert.equal(best.worker.id, 5);
        assert.ok(best.score < 0);

        const report = await matchAllLeads(db, 'plumbing', 10, clock);
        assert.equal(report.created, 1);
        const jobs = await db.query<{ lead_id: number; worker_id: number }>(`SELECT lead_id, worker_id FROM jobs`);
        assert.deepEqual(jobs, [{ lead_id: 1, worker_id: 5 }]);
        assert.equal((await getLeadById(db, 1))?.status, 'contacted');
        await db.close();
    });
});
