import { describe, expect, test } from 'vitest';
import { CallResultStore } from '../stores/CallResultStore.js';

function steppingClock(...isoTimes: string[]): () => Date {
    let index = 0;
    return () => new Date(isoTimes[Math.min(index++, isoTimes.length - 1)]);
}

describe('CallResultStore', () => {
    test('creates a pending record', () => {
        const store = new CallResultStore(steppingClock('2026-01-01T10:00:00.000Z'));

        expect(store.create('CA1', '+919876543210', 'queued')).toEqual({
            call_sid: 'CA1',
            to: '+919876543210',
            status: 'queued',
            response: 'pending',
            speech_result: '',
            updated_at: '2026-01-01T10:00:00.000Z'
        });
    });

    test('a status update keeps the recorded response and speech', () => {
        const store = new CallResultStore(steppingClock(
            '2026-01-01T10:00:00.000Z',
            '2026-01-01T10:00:30.000Z',
            '2026-01-01T10:01:00.000Z'
        ));
        store.create('CA1', '+919876543210', 'queued');
        store.recordResponse({ callSid: 'CA1', to: '+919876543210', response: 'taken', speechResult: 'Yes I did' });

        store.recordStatus('CA1', 'completed');

        expect(store.get('CA1')).toEqual({
            call_sid: 'CA1',
            to: '+919876543210',
            status: 'completed',
            response: 'taken',
            speech_result: 'Yes I did',
            updated_at: '2026-01-01T10:01:00.000Z'
        });
    });

    test('a response keeps the existing status and destination', () => {
        const store = new CallResultStore(steppingClock('2026-01-01T10:00:00.000Z'));
        store.create('CA1', '+16505550100', 'in-progress');

        const record = store.recordResponse({ callSid: 'CA1', to: '', response: 'missed', speechResult: '' });

        expect(record.status).toBe('in-progress');
        expect(record.to).toBe('+16505550100');
        expect(record.response).toBe('missed');
    });

    test('unknown calls are created by callbacks', () => {
        const store = new CallResultStore(steppingClock('2026-01-01T10:00:00.000Z'));

        expect(store.recordResponse({ callSid: 'CA2', to: '+1555', response: 'taken', speechResult: 'yes' }).status)
            .toBe('completed');
        expect(store.recordStatus('CA3', 'ringing')).toMatchObject({ to: '', response: 'pending', status: 'ringing' });
        expect(store.get('CA2')).toMatchObject({ to: '+1555', response: 'taken' });
        expect(store.get('CA3')).toMatchObject({ status: 'ringing' });
    });

    test('returns null for unknown sids and copies for known ones', () => {
        const store = new CallResultStore();
        expect(store.get('missing')).toBeNull();

        const created = store.create('CA1', '+1555', 'queued');
        created.status = 'mutated';
        expect(store.get('CA1')?.status).toBe('queued');
    });
});
