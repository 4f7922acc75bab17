import assert from 'assert';
import { describe, it } from 'node:test';
import {
    hashSensitiveData,
    isValidEmail,
    isValidPhone,
    MAX_NAME_LENGTH,
    normalizeServiceKeyword,
    parseCoordinates,
    sanitizeContactFields,
    sanitizeString,
} from '../validation/inputValidator';

describe('sanitizeString', () => {
    it('rimuove i caratteri di controllo e tronca', () => {
        assert.equal(sanitizeString('Acme\u0000 Plumbing\u0007', 100), 'Acme Plumbing');
        assert.equal(sanitizeString('abcdef', 3), 'abc');
        assert.equal(sanitizeString(null, 10), '');
        assert.equal(sanitizeString(42, 10), '42');
    });
});

describe('isValidPhone / isValidEmail', () => {
    it('accetta i formati previsti', () => {
        assert.equal(isValidPhone('+91 98765-43210'), true);
        assert.equal(isValidPhone('(022) 1234'), true);
        assert.equal(isValidPhone('12345'), false);
        assert.equal(isValidPhone('call me'), false);
        assert.equal(isValidEmail('Owner@Example.COM'), true);
        assert.equal(isValidEmail('owner@example'), false);
        assert.equal(isValidEmail(''), false);
    });
});

describe('parseCoordinates', () => {
    it('accetta numeri e stringhe numeriche nel range', () => {
        assert.deepEqual(parseCoordinates('19.07', 72.87), { point: { lat: 19.07, lon: 72.87 }, status: 'ok' });
    });

    it('tratta (0, 0) e valori assenti come posizione sconosciuta', () => {
        assert.deepEqual(parseCoordinates(0, 0), { point: null, status: 'missing' });
        assert.deepEqual(parseCoordinates(undefined, ''), { point: null, status: 'missing' });
    });

    it('azzera coordinate fuori range o non numeriche', () => {
        assert.deepEqual(parseCoordinates(91, 10), { point: null, status: 'invalid' });
        assert.deepEqual(parseCoordinates(10, -181), { point: null, status: 'invalid' });
        assert.deepEqual(parseCoordinates('north', 10), { point: null, status: 'invalid' });
        assert.deepEqual(parseCoordinates(10, undefined), { point: null, status: 'invalid' });
    });
});

describe('sanitizeContactFields', () => {
    it('azzera i campi non validi e li riporta come downgrade', () => {
        const result = sanitizeContactFields({
            name: 'x'.repeat(MAX_NAME_LENGTH + 5),
            phone: 'not-a-phone',
            email: 'broken@',
            lat: 200,
            lon: 10,
            skills: 'Plumbing,Electrical',
        });
        assert.equal(result.value.name.length, MAX_NAME_LENGTH);
        assert.equal(result.value.phone, '');
        assert.equal(result.value.email, '');
        assert.equal(result.value.location, null);
        assert.equal(result.value.skills, 'plumbing,electrical');
        assert.deepEqual(result.downgraded, [
            { field: 'name', reason: 'truncated' },
            { field: 'phone', reason: 'invalid_phone' },
            { field: 'email', reason: 'invalid_email' },
            { field: 'coordinates', reason: 'invalid_coordinates' },
        ]);
    });

    it('non segnala nulla per un record pulito', () => {
        const result = sanitizeContactFields({
            name: 'Sharma Hardware',
            phone: '+91 22 1234 5678',
            email: 'info@sharma.example',
            lat: 19.07,
            lon: 72.87,
        });
        assert.deepEqual(result.downgraded, []);
        assert.deepEqual(result.value.location, { lat: 19.07, lon: 72.87 });
        assert.equal(result.value.phone, '+91 22 1234 5678');
    });
});

describe('normalizeServiceKeyword / hashSensitiveData', () => {
    it('normalizza la keyword e produce hash brevi stabili', () => {
        assert.equal(normalizeServiceKeyword('  PLUMBING '), 'plumbing');
        assert.equal(hashSensitiveData('a').length, 16);
        assert.equal(hashSensitiveData('a'), hashSensitiveData('a'));
        assert.notEqual(hashSensitiveData('a'), hashSensitiveData('b'));
    });
});
