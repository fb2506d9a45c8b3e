import { describe, test, expect } from '@jest/globals';
import { MetasploitPlugin, dedupeModules, metasploitOperation } from '../MetasploitPlugin';
import { FakeToolServer, makeAction } from '../../__tests__/fixtures';

function runtimeWith(toolServer: FakeToolServer) {
    return { signal: new AbortController().signal, timeoutMs: 1000, toolServer };
}

const MODULE = 'exploit/unix/ftp/vsftpd_234_backdoor';

describe('metasploitOperation', () => {
    test('derives the operation from the parameters', () => {
        expect(metasploitOperation(makeAction({ tool: 'metasploit', parameters: { action: 'exploit' } }))).toBe('run');
        expect(metasploitOperation(makeAction({ tool: 'metasploit', parameters: { action: 'run', mode: 'check' } }))).toBe(
            'check'
        );
        expect(metasploitOperation(makeAction({ tool: 'metasploit', parameters: { service: 'vsftpd' } }))).toBe('suggest');
        expect(metasploitOperation(makeAction({ tool: 'metasploit', parameters: { module: MODULE } }))).toBe('info');
        expect(metasploitOperation(makeAction({ tool: 'metasploit' }))).toBe('search');
    });
});

describe('dedupeModules', () => {
    test('keeps the first module per full name and drops unnamed ones', () => {
        expect(dedupeModules([{ fullname: 'a' }, { path: 'a' }, { name: 'no path' }, { fullname: 'b' }])).toEqual([
            { fullname: 'a' },
            { fullname: 'b' },
        ]);
    });
});

describe('MetasploitPlugin', () => {
    const plugin = new MetasploitPlugin();

    test('escalates exploit runs and leaves the rest to the keyword check', () => {
        expect(plugin.riskClassify(makeAction({ tool: 'msf', parameters: { action: 'exploit', module: MODULE } }))).toBe(
            'dangerous'
        );
        expect(plugin.riskClassify(makeAction({ tool: 'msf', description: 'search exploit modules' }))).toBeUndefined();
    });

    test('suggests exploit modules for a service and version', async () => {
        const tools = new FakeToolServer().on('metasploit', async (parameters) =>
            parameters.search === 'vsftpd'
                ? [{ fullname: MODULE, description: 'VSFTPD v2.3.4 Backdoor Command Execution', rank: 'excellent' }]
                : { modules: [{ fullname: MODULE, description: 'duplicate' }, { fullname: 'exploit/other', name: 'Other' }] }
        );

        const findings = await plugin.execute(
            makeAction({ tool: 'metasploit', parameters: { service: 'vsftpd', version: '2.3.4' } }),
            runtimeWith(tools)
        );

        expect(tools.calls.map((call) => call.parameters)).toEqual([
            { action: 'search', search: 'vsftpd', type: 'exploit' },
            { action: 'search', search: 'vsftpd 2.3.4', type: 'exploit' },
        ]);
        expect(findings).toEqual([
            {
                category: 'exploit_suggestion',
                severity: 'Low',
                title: `${MODULE}: VSFTPD v2.3.4 Backdoor Command Execution`,
                evidence: { fullname: MODULE, rank: 'excellent' },
            },
            {
                category: 'exploit_suggestion',
                severity: 'Low',
                title: 'exploit/other: Other',
                evidence: { fullname: 'exploit/other', name: 'Other' },
            },
        ]);
    });

    test('reports a vulnerable check as a high finding', async () => {
        const tools = new FakeToolServer().on('metasploit', async () => ({ success: true, vulnerable: true, check_code: 'vulnerable' }));

        const findings = await plugin.execute(
            makeAction({ tool: 'metasploit', parameters: { action: 'check', module: MODULE } }),
            runtimeWith(tools)
        );

        expect(tools.calls[0].parameters).toEqual({ action: 'run', module: MODULE, target: '192.168.1.10', mode: 'check' });
        expect(findings).toEqual([
            {
                category: 'vulnerability',
                severity: 'High',
                title: `${MODULE} reports the target as vulnerable`,
                evidence: { module: MODULE, check_code: 'vulnerable' },
            },
        ]);
    });

    test('reports nothing for a run that opens no session', async () => {
        const tools = new FakeToolServer().on('metasploit', async () => ({ success: true }));
        const findings = await plugin.execute(
            makeAction({ tool: 'metasploit', parameters: { action: 'exploit', module: MODULE, payload: 'cmd/unix/interact' } }),
            runtimeWith(tools)
        );
        expect(findings).toEqual([]);
        expect(tools.calls[0].parameters.payload).toBe('cmd/unix/interact');
    });

    test('requires a module for runs', async () => {
        const tools = new FakeToolServer().on('metasploit', async () => ({}));
        await expect(
            plugin.execute(makeAction({ tool: 'metasploit', parameters: { action: 'exploit' } }), runtimeWith(tools))
        ).rejects.toThrow('metasploit: a module parameter is required');
    });
});
