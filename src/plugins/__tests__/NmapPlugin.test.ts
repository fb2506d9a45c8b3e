import { describe, test, expect } from '@jest/globals';
import { NmapPlugin, scanProfile } from '../NmapPlugin';
import { FakeToolServer, makeAction } from '../../__tests__/fixtures';

function runtimeWith(toolServer: FakeToolServer) {
    return { signal: new AbortController().signal, timeoutMs: 1000, toolServer };
}

describe('NmapPlugin', () => {
    const plugin = new NmapPlugin();

    test('picks a scan profile from parameters or the description', () => {
        expect(scanProfile(makeAction({ parameters: { profile: 'FULL' } }))).toBe('full');
        expect(scanProfile(makeAction({ description: 'scan all ports' }))).toBe('full');
        expect(scanProfile(makeAction({ description: 'find web servers' }))).toBe('http');
        expect(scanProfile(makeAction({ description: 'quick look' }))).toBe('quick');
    });

    test('answers to nmap and portscan', () => {
        expect(plugin.matches(makeAction({ tool: 'portscan' }))).toBe(true);
        expect(plugin.matches(makeAction({ tool: 'nikto' }))).toBe(false);
    });

    test('treats intrusive NSE scripts as dangerous', () => {
        expect(plugin.riskClassify(makeAction({ parameters: { script: 'ssh-brute' } }))).toBe('dangerous');
        expect(plugin.riskClassify(makeAction({ parameters: { script: 'banner' } }))).toBeUndefined();
        expect(plugin.riskClassify(makeAction())).toBeUndefined();
    });

    test('reports each open port as a finding', async () => {
        const tools = new FakeToolServer().on('nmap', async () => ({
            success: true,
            ports: [
                { port: 22, protocol: 'tcp', state: 'open', service: 'ssh', version: 'OpenSSH 9.6' },
                { port: 23, protocol: 'tcp', state: 'closed', service: 'telnet' },
                { port: 53, protocol: 'udp', state: 'open' },
            ],
        }));

        const findings = await plugin.execute(makeAction(), runtimeWith(tools));

        expect(tools.calls).toEqual([
            {
                tool: 'nmap',
                parameters: { target: '192.168.1.10', ports: '1-1000', scan_type: 'syn', service_detection: true },
            },
        ]);
        expect(findings).toEqual([
            {
                target: undefined,
                category: 'open_port',
                severity: 'Info',
                title: 'Open port 22/tcp (ssh)',
                evidence: { port: 22, protocol: 'tcp', service: 'ssh', version: 'OpenSSH 9.6' },
            },
            {
                target: undefined,
                category: 'open_port',
                severity: 'Info',
                title: 'Open port 53/udp (unknown)',
                evidence: { port: 53, protocol: 'udp' },
            },
        ]);
    });

    test('keeps only web ports for the http profile', async () => {
        const tools = new FakeToolServer().on('nmap', async () =>
            JSON.stringify({
                open_ports: [
                    { port: 22, service: 'ssh' },
                    { port: 8080, service: 'http-proxy' },
                    { port: 9000, service: 'http' },
                ],
            })
        );

        const findings = await plugin.execute(makeAction({ parameters: { profile: 'http' } }), runtimeWith(tools));

        expect(tools.calls[0].parameters.ports).toBe('80,443,8080,8443,8000,8888');
        expect(findings.map((finding) => finding.title)).toEqual([
            'Open port 8080/tcp (http-proxy)',
            'Open port 9000/tcp (http)',
        ]);
    });

    test('passes explicit ports and scripts through', async () => {
        const tools = new FakeToolServer().on('nmap', async () => ({ open_ports: [] }));
        await plugin.execute(makeAction({ parameters: { ports: '443', script: 'ssl-cert', scan_type: 'connect' } }), runtimeWith(tools));
        expect(tools.calls[0].parameters).toEqual({
            target: '192.168.1.10',
            ports: '443',
            scan_type: 'connect',
            service_detection: true,
            script: 'ssl-cert',
        });
    });

    test('fails when the tool server reports failure', async () => {
        const tools = new FakeToolServer().on('nmap', async () => ({ success: false, error: 'host unreachable' }));
        await expect(plugin.execute(makeAction(), runtimeWith(tools))).rejects.toThrow('nmap failed: host unreachable');
    });
});
