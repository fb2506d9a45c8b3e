import { describe, test, expect } from '@jest/globals';
import { parsePlanText } from '../PlanParser';

const knownTools = ['nmap', 'nikto', 'nuclei', 'metasploit'];

describe('parsePlanText', () => {
    test('reads a fenced JSON plan and stringifies parameter values', () => {
        const text = [
            'Here is the plan:',
            '```json',
            '{"actions":[{"tool":"Nmap","target":"192.168.1.10","parameters":{"ports":"22,80","aggressive":true},"description":"scan"}]}',
            '```',
        ].join('\n');

        expect(parsePlanText(text, { knownTools })).toEqual({
            ok: true,
            strategy: 'json',
            actions: [
                {
                    tool: 'nmap',
                    target: '192.168.1.10',
                    parameters: { ports: '22,80', aggressive: 'true' },
                    description: 'scan',
                },
            ],
        });
    });

    test('accepts a bare array with alternate field names', () => {
        const text = '[{"name":"nuclei","url":"https://example.com","params":{"tags":["cve","rce"]},"reason":"templates"}]';
        const result = parsePlanText(text, { knownTools });
        expect(result).toEqual({
            ok: true,
            strategy: 'json',
            actions: [
                { tool: 'nuclei', target: 'https://example.com', parameters: { tags: 'cve,rce' }, description: 'templates' },
            ],
        });
    });

    test('fills a missing target from the fallback', () => {
        const result = parsePlanText('[{"tool":"nmap"}]', { knownTools, fallbackTarget: '192.168.1.20' });
        expect(result).toEqual({
            ok: true,
            strategy: 'json',
            actions: [{ tool: 'nmap', target: '192.168.1.20', parameters: {}, description: '' }],
        });
    });

    test('falls back to keyword matching on prose', () => {
        const text = '1. Run nmap against 192.168.1.10 with ports=22-80\n2. nikto on example.com ssl=true\nThen summarize.';
        const result = parsePlanText(text, { knownTools });
        expect(result).toEqual({
            ok: true,
            strategy: 'keyword',
            actions: [
                {
                    tool: 'nmap',
                    target: '192.168.1.10',
                    parameters: { ports: '22-80' },
                    description: 'Run nmap against 192.168.1.10 with ports=22-80',
                },
                {
                    tool: 'nikto',
                    target: 'example.com',
                    parameters: { ssl: 'true' },
                    description: 'nikto on example.com ssl=true',
                },
            ],
        });
    });

    test('does not match a tool name inside a longer word', () => {
        expect(parsePlanText('use nmap-extra on 192.168.1.10', { knownTools })).toEqual({
            ok: false,
            reason: 'no actionable structure in backend output',
        });
    });

    test('drops duplicate entries', () => {
        const entry = { tool: 'nmap', target: '192.168.1.10', parameters: { ports: '22' } };
        const result = parsePlanText(JSON.stringify([entry, entry]), { knownTools });
        expect(result.ok && result.actions).toHaveLength(1);
    });

    test('reports empty output', () => {
        expect(parsePlanText('   \n', { knownTools })).toEqual({ ok: false, reason: 'backend returned empty output' });
    });

    test('reports output with nothing actionable', () => {
        expect(parsePlanText('I cannot help with that.', { knownTools })).toEqual({
            ok: false,
            reason: 'no actionable structure in backend output',
        });
    });
});
