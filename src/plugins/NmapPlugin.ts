/**
 * Nmap plugin - port and service discovery through the tool server.
 */

import type { Action, FindingDraft, RiskEscalation } from '../types';
import type { PluginRuntime, ToolPlugin } from './types';
import { outputRecord, pickEvidence, recordList, stringOf, toolNamed } from './output';

export type ScanProfile = 'quick' | 'full' | 'http';

const PROFILE_PORTS: Record<ScanProfile, string> = {
    quick: '1-1000',
    full: '1-65535',
    http: '80,443,8080,8443,8000,8888',
};

const HTTP_PORTS = new Set([80, 443, 8080, 8443, 8000, 8888]);

// NSE categories that touch the target beyond discovery
const INTRUSIVE_SCRIPTS = ['brute', 'dos', 'exploit', 'intrusive', 'malware', 'fuzzer', 'vuln'];

export function scanProfile(action: Action): ScanProfile {
    const explicit = action.parameters.profile?.toLowerCase();
    if (explicit === 'quick' || explicit === 'full' || explicit === 'http') return explicit;

    const text = action.description.toLowerCase();
    if (text.includes('full') || text.includes('all ports')) return 'full';
    if (text.includes('http') || text.includes('web')) return 'http';
    return 'quick';
}

export class NmapPlugin implements ToolPlugin {
    readonly name = 'nmap';
    readonly description = 'Port scanning and service detection using Nmap';
    readonly tools = ['nmap', 'portscan'];

    matches(action: Action): boolean {
        return toolNamed(this.tools, action.tool);
    }

    riskClassify(action: Action): RiskEscalation {
        const script = action.parameters.script?.toLowerCase();
        if (script && INTRUSIVE_SCRIPTS.some((category) => script.includes(category))) {
            return 'dangerous';
        }
        return undefined;
    }

    async execute(action: Action, runtime: PluginRuntime): Promise<FindingDraft[]> {
        const profile = scanProfile(action);
        const parameters: Record<string, string | boolean> = {
            target: action.target,
            ports: action.parameters.ports ?? PROFILE_PORTS[profile],
            scan_type: action.parameters.scan_type ?? 'syn',
            service_detection: true,
        };
        if (action.parameters.script) {
            parameters.script = action.parameters.script;
        }

        const output = outputRecord(
            await runtime.toolServer.executeTool('nmap', parameters, {
                signal: runtime.signal,
                timeoutMs: runtime.timeoutMs,
            })
        );
        if (output.success === false) {
            throw new Error(`nmap failed: ${stringOf(output, 'error') ?? 'unknown error'}`);
        }

        let ports = recordList(output, ['open_ports']);
        if (ports.length === 0) {
            ports = recordList(output, ['ports']).filter((port) => port.state === 'open');
        }
        if (profile === 'http') {
            ports = ports.filter((port) => {
                const service = stringOf(port, 'service')?.toLowerCase() ?? '';
                return service.includes('http') || HTTP_PORTS.has(Number(port.port));
            });
        }

        return ports.map((port): FindingDraft => {
            const number = stringOf(port, 'port') ?? '?';
            const protocol = stringOf(port, 'protocol') ?? 'tcp';
            const service = stringOf(port, 'service') ?? 'unknown';
            return {
                target: stringOf(port, 'host', 'ip'),
                category: 'open_port',
                severity: 'Info',
                title: `Open port ${number}/${protocol} (${service})`,
                evidence: pickEvidence(port, ['port', 'protocol', 'service', 'version', 'product']),
            };
        });
    }
}
