import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { FindingAggregator, fingerprintEvidence } from '../FindingAggregator';
import { SessionMemoryStore } from '../SessionMemoryStore';
import { IN_MEMORY } from '../../db/init';
import { ERROR_CODES, OrchestratorError } from '../../utils/errors';
import { makeFinding } from '../../__tests__/fixtures';

const sha256 = { algorithm: 'sha256' as const, evidenceKeys: [] };

describe('fingerprintEvidence', () => {
    test('ignores key order', () => {
        expect(fingerprintEvidence({ a: 1, b: 'x' }, sha256)).toBe(fingerprintEvidence({ b: 'x', a: 1 }, sha256));
    });

    test('uses only the configured evidence keys', () => {
        const options = { algorithm: 'exact' as const, evidenceKeys: ['port'] };
        expect(fingerprintEvidence({ port: 22, banner: 'OpenSSH 8.9' }, options)).toBe('{"port":22}');
        expect(fingerprintEvidence({ port: 22, banner: 'OpenSSH 9.6' }, options)).toBe('{"port":22}');
    });

    test('hashes to hex with sha256', () => {
        expect(fingerprintEvidence({}, sha256)).toMatch(/^[0-9a-f]{64}$/);
    });
});

describe('FindingAggregator.aggregate', () => {
    const aggregator = new FindingAggregator({ query: () => [], hasSession: () => true }, sha256);

    test('merges duplicates and keeps the most severe severity', () => {
        const summary = aggregator.aggregate(
            [
                makeFinding({ id: 'f1', severity: 'Low', title: 'low title', timestamp: '2025-01-01T00:00:00.000Z' }),
                makeFinding({
                    id: 'f2',
                    severity: 'High',
                    title: 'high title',
                    timestamp: '2025-01-02T00:00:00.000Z',
                    sessionId: 'session-b',
                    sourceActionId: 'action-2',
                }),
            ],
            ['session-a', 'session-b']
        );

        expect(summary.totalFindings).toBe(2);
        expect(summary.uniqueFindings).toBe(1);
        const [merged] = summary.findings;
        expect(merged.occurrences).toBe(2);
        expect(merged.severity).toBe('High');
        expect(merged.title).toBe('high title');
        expect(merged.firstSeen).toBe('2025-01-01T00:00:00.000Z');
        expect(merged.lastSeen).toBe('2025-01-02T00:00:00.000Z');
        expect(merged.sessionIds).toEqual(['session-a', 'session-b']);
        expect(merged.sourceActionIds).toEqual(['action-1', 'action-2']);
        expect(summary.severityCounts).toEqual({ Critical: 0, High: 1, Medium: 0, Low: 0, Info: 0 });
    });

    test('treats target case and URL form as the same target', () => {
        const summary = aggregator.aggregate([
            makeFinding({ target: 'Example.com' }),
            makeFinding({ target: 'https://example.com/' }),
        ]);
        expect(summary.uniqueFindings).toBe(1);
        expect(summary.findings[0].target).toBe('example.com');
    });

    test('keeps findings with different evidence apart', () => {
        const summary = aggregator.aggregate([
            makeFinding({ evidence: { port: 22 } }),
            makeFinding({ evidence: { port: 80 } }),
        ]);
        expect(summary.uniqueFindings).toBe(2);
    });

    test('orders by severity then target and breaks down per target', () => {
        const summary = aggregator.aggregate([
            makeFinding({ target: '192.168.1.20', severity: 'Info', evidence: { port: 1 } }),
            makeFinding({ target: '192.168.1.10', severity: 'Critical', evidence: { port: 2 } }),
            makeFinding({ target: '192.168.1.10', severity: 'Info', evidence: { port: 3 } }),
        ]);

        expect(summary.findings.map((item) => [item.severity, item.target])).toEqual([
            ['Critical', '192.168.1.10'],
            ['Info', '192.168.1.10'],
            ['Info', '192.168.1.20'],
        ]);
        expect(summary.targets.map((item) => [item.target, item.total])).toEqual([
            ['192.168.1.10', 2],
            ['192.168.1.20', 1],
        ]);
        expect(summary.targets[0].severityCounts.Critical).toBe(1);
    });

    test('summarizes nothing as all zeros', () => {
        const summary = aggregator.aggregate([]);
        expect(summary.totalFindings).toBe(0);
        expect(summary.findings).toEqual([]);
        expect(summary.targets).toEqual([]);
    });
});

describe('FindingAggregator.summarize', () => {
    let store: SessionMemoryStore;
    let aggregator: FindingAggregator;

    beforeEach(() => {
        store = new SessionMemoryStore(IN_MEMORY);
        aggregator = new FindingAggregator(store, sha256);
        store.createSession('default', 'session-a');
        store.createSession('default', 'session-b');
        const { sessionId: _a, ...first } = makeFinding({ severity: 'Medium' });
        const { sessionId: _b, ...second } = makeFinding({ severity: 'Critical' });
        store.append('session-a', { type: 'finding', payload: first });
        store.append('session-b', { type: 'finding', payload: second });
    });

    afterEach(() => {
        store.close();
    });

    test('merges the same finding across sessions', () => {
        const summary = aggregator.summarize(['session-a', 'session-b']);
        expect(summary.sessionIds).toEqual(['session-a', 'session-b']);
        expect(summary.uniqueFindings).toBe(1);
        expect(summary.findings[0].severity).toBe('Critical');
        expect(summary.findings[0].sessionIds).toEqual(['session-a', 'session-b']);
    });

    test('summarizes a single session', () => {
        const summary = aggregator.summarize('session-a');
        expect(summary.totalFindings).toBe(1);
        expect(summary.findings[0].severity).toBe('Medium');
    });

    test('rejects unknown sessions', () => {
        expect(() => aggregator.summarize(['session-a', 'session-x'])).toThrow(OrchestratorError);
        try {
            aggregator.summarize('session-x');
        } catch (error) {
            expect(error instanceof OrchestratorError && error.code).toBe(ERROR_CODES.SESSION_NOT_FOUND);
        }
    });
});
