import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { SessionMemoryStore, generateSessionId } from '../SessionMemoryStore';
import { IN_MEMORY, openDatabase } from '../../db/init';
import { ERROR_CODES, OrchestratorError } from '../../utils/errors';
import { makeAction, makeFinding } from '../../__tests__/fixtures';
import type { Finding } from '../../types';

function finding(overrides: Partial<Finding> = {}): Finding {
    const { sessionId: _sessionId, ...rest } = makeFinding(overrides);
    return rest;
}

describe('SessionMemoryStore', () => {
    let store: SessionMemoryStore;

    beforeEach(() => {
        store = new SessionMemoryStore(IN_MEMORY);
    });

    afterEach(() => {
        store.close();
    });

    test('generates sortable session ids from the UTC clock', () => {
        const id = generateSessionId(new Date('2025-03-04T05:06:07Z'));
        expect(id).toMatch(/^session_20250304_050607_[0-9a-f]{8}$/);
    });

    test('loads appended records in append order', () => {
        const session = store.createSession('default', 'session-a');
        for (let i = 0; i < 5; i++) {
            store.append(session.id, { type: 'query', payload: { planId: `plan-${i}`, text: `query ${i}` } });
        }

        const loaded = store.load('session-a');
        expect(loaded.persona).toBe('default');
        expect(loaded.records).toHaveLength(5);
        expect(loaded.records.map((record) => record.type === 'query' && record.payload.text)).toEqual([
            'query 0',
            'query 1',
            'query 2',
            'query 3',
            'query 4',
        ]);
        const seqs = loaded.records.map((record) => record.seq);
        expect([...seqs].sort((a, b) => a - b)).toEqual(seqs);
    });

    test('round-trips action and finding payloads', () => {
        store.createSession('default', 'session-a');
        const action = makeAction({}, { sessionId: 'session-a' });
        store.append('session-a', { type: 'action', payload: { action, plugin: 'nmap', durationMs: 12, findingCount: 1 } });
        const stored = finding();
        store.append('session-a', { type: 'finding', payload: stored });

        const [first, second] = store.load('session-a').records;
        expect(first.type === 'action' && first.payload.action).toEqual(action);
        expect(second.type === 'finding' && second.payload).toEqual(stored);
    });

    test('rejects appends to unknown sessions', () => {
        expect(() => store.append('session-missing', { type: 'query', payload: { planId: 'p', text: 'x' } })).toThrow(
            'Session session-missing not found'
        );
    });

    test('throws SESSION_NOT_FOUND when loading an unknown session', () => {
        try {
            store.load('session-missing');
            throw new Error('expected load to throw');
        } catch (error) {
            expect(error instanceof OrchestratorError && error.code).toBe(ERROR_CODES.SESSION_NOT_FOUND);
        }
    });

    test('returns the newest records oldest first', () => {
        store.createSession('default', 'session-a');
        for (let i = 0; i < 4; i++) {
            store.append('session-a', { type: 'query', payload: { planId: 'p', text: `q${i}` } });
        }
        const recent = store.recentRecords('session-a', 2);
        expect(recent.map((record) => record.type === 'query' && record.payload.text)).toEqual(['q2', 'q3']);
        expect(store.recentRecords('session-a', 0)).toEqual([]);
    });

    test('lists sessions', () => {
        store.createSession('default', 'session-a');
        store.createSession('recon-only', 'session-b');
        expect(store.listSessions().map((session) => session.id).sort()).toEqual(['session-a', 'session-b']);
        expect(store.hasSession('session-b')).toBe(true);
        expect(store.getSession('session-c')).toBeUndefined();
    });

    describe('query', () => {
        beforeEach(() => {
            store.createSession('default', 'session-a');
            store.createSession('default', 'session-b');
            store.append('session-a', { type: 'finding', payload: finding({ id: 'f1', target: '192.168.1.10' }) });
            store.append('session-a', {
                type: 'finding',
                payload: finding({ id: 'f2', target: '192.168.1.11', severity: 'High', category: 'vulnerability' }),
            });
            store.append('session-b', {
                type: 'finding',
                payload: finding({ id: 'f3', target: '192.168.1.10', severity: 'Critical', category: 'exploitation' }),
            });
            store.append('session-b', { type: 'query', payload: { planId: 'p', text: 'not a finding' } });
        });

        test('recalls findings for a target across sessions with their session ids', () => {
            const recalled = store.query({ target: '192.168.1.10' });
            expect(recalled.map((item) => [item.id, item.sessionId])).toEqual([
                ['f1', 'session-a'],
                ['f3', 'session-b'],
            ]);
        });

        test('normalizes the target filter', () => {
            expect(store.query({ target: 'http://192.168.1.11:8080/' }).map((item) => item.id)).toEqual(['f2']);
        });

        test('filters by category case-insensitively, severity and minimum severity', () => {
            expect(store.query({ category: 'VULNERABILITY' }).map((item) => item.id)).toEqual(['f2']);
            expect(store.query({ severity: 'Info' }).map((item) => item.id)).toEqual(['f1']);
            expect(store.query({ minSeverity: 'High' }).map((item) => item.id)).toEqual(['f2', 'f3']);
        });

        test('restricts to the given sessions', () => {
            expect(store.query({ sessionIds: ['session-b'] }).map((item) => item.id)).toEqual(['f3']);
            expect(store.query({ sessionIds: [] })).toEqual([]);
        });
    });
});

describe('session database', () => {
    test('rejects updates and deletes on the record log', () => {
        const db = openDatabase(IN_MEMORY);
        db.prepare('INSERT INTO sessions (id, persona, created_at) VALUES (?, ?, ?)').run('s', 'default', '2025-01-01');
        db.prepare('INSERT INTO session_records (session_id, type, timestamp, payload) VALUES (?, ?, ?, ?)').run(
            's',
            'query',
            '2025-01-01',
            '{}'
        );

        expect(() => db.prepare("UPDATE session_records SET payload = '[]'").run()).toThrow('session records are append-only');
        expect(() => db.prepare('DELETE FROM session_records').run()).toThrow('session records are append-only');
        db.close();
    });
});
