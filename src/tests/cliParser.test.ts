import assert from 'assert';
import { describe, it } from 'node:test';
import {
    getOptionValue,
    getPositionalArgs,
    parseFloatStrict,
    parseIntStrict,
    parseJobStatus,
    parseLeadStatus,
    parsePositiveInt,
    requireOption,
} from '../cli/cliParser';

describe('cliParser', () => {
    it('legge opzioni e posizionali', () => {
        const args = ['12', 'complete', '--rating', '4', '--verbose', '--notes', 'ok'];
        assert.equal(getOptionValue(args, '--rating'), '4');
        assert.equal(getOptionValue(args, '--missing'), undefined);
        assert.deepEqual(getPositionalArgs(args, ['--verbose']), ['12', 'complete']);
    });

    it('requireOption fallisce se l\'opzione manca o non ha valore', () => {
        assert.equal(requireOption(['--city', 'Mumbai'], '--city', 'collect'), 'Mumbai');
        assert.throws(() => requireOption(['--city'], '--city', 'collect'), /Manca --city/);
        assert.throws(() => requireOption(['--city', '--service', 'x'], '--city', 'collect'), /Manca --city/);
    });

    it('analizza numeri in modo rigoroso', () => {
        assert.equal(parseIntStrict('42', '--limit'), 42);
        assert.throws(() => parseIntStrict('4x', '--limit'), /Valore non valido/);
        assert.throws(() => parsePositiveInt('0', '--max'), /--max deve essere >= 1/);
        assert.equal(parseFloatStrict('4.5', '--rating'), 4.5);
        assert.throws(() => parseFloatStrict('', '--rating'), /Valore non valido/);
    });

    it('valida gli stati di job e lead', () => {
        assert.equal(parseJobStatus('COMPLETE'), 'complete');
        assert.equal(parseLeadStatus(' new '), 'new');
        assert.throws(() => parseJobStatus('done'), /Stato job non valido/);
        assert.throws(() => parseLeadStatus('archived'), /Stato lead non valido/);
    });
});
