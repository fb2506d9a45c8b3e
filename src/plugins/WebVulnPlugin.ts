/**
 * Web vulnerability plugin - Nikto and Nuclei scans through the tool server.
 */

import type { Action, FindingDraft, RiskEscalation } from '../types';
import { toSeverity } from '../types';
import type { PluginRuntime, ToolPlugin } from './types';
import { outputRecord, pickEvidence, recordList, stringOf, toolNamed } from './output';
import { isRecord } from '../utils/json';

export type WebScanner = 'nikto' | 'nuclei';

const DEFAULT_TEMPLATES = 'cves,vulnerabilities,exposures';
const INTRUSIVE_TEMPLATES = ['intrusive', 'fuzz', 'dos', 'rce'];
const EVIDENCE_KEYS = ['id', 'template-id', 'template', 'matched-at', 'url', 'method', 'osvdb', 'uri', 'name'];

export interface WebTarget {
    url: string;
    host: string;
    port: number;
    ssl: boolean;
}

/** Resolve a host or URL into scan coordinates; bare hosts use https only for port 443 or ssl=true. */
export function resolveWebTarget(target: string, parameters: Readonly<Record<string, string>>): WebTarget {
    if (/^https?:\/\//i.test(target)) {
        const url = new URL(target);
        const ssl = url.protocol === 'https:';
        return { url: target, host: url.hostname, port: url.port ? Number(url.port) : ssl ? 443 : 80, ssl };
    }
    const port = parameters.port ? Number(parameters.port) : undefined;
    const ssl = parameters.ssl === 'true' || port === 443;
    const resolvedPort = port ?? (ssl ? 443 : 80);
    const defaultPort = ssl ? 443 : 80;
    const url = `${ssl ? 'https' : 'http'}://${target}${resolvedPort === defaultPort ? '' : `:${resolvedPort}`}`;
    return { url, host: target, port: resolvedPort, ssl };
}

function scannersFor(action: Action): WebScanner[] {
    const tool = action.tool.toLowerCase();
    if (tool === 'nikto' || tool === 'nuclei') return [tool];
    const requested = action.parameters.scanner?.toLowerCase();
    if (requested === 'nikto' || requested === 'nuclei') return [requested];
    return ['nikto', 'nuclei'];
}

export class WebVulnPlugin implements ToolPlugin {
    readonly name = 'web_vuln';
    readonly description = 'Web vulnerability scanning using Nikto and Nuclei';
    readonly tools = ['web_vuln', 'nikto', 'nuclei'];

    matches(action: Action): boolean {
        return toolNamed(this.tools, action.tool);
    }

    riskClassify(action: Action): RiskEscalation {
        const templates = action.parameters.templates?.toLowerCase() ?? '';
        return INTRUSIVE_TEMPLATES.some((tag) => templates.includes(tag)) ? 'dangerous' : undefined;
    }

    async execute(action: Action, runtime: PluginRuntime): Promise<FindingDraft[]> {
        const web = resolveWebTarget(action.target, action.parameters);
        const findings: FindingDraft[] = [];

        for (const scanner of scannersFor(action)) {
            const raw =
                scanner === 'nikto'
                    ? await runtime.toolServer.executeTool(
                          'nikto',
                          { target: web.host, port: web.port, ssl: web.ssl },
                          { signal: runtime.signal, timeoutMs: runtime.timeoutMs }
                      )
                    : await runtime.toolServer.executeTool(
                          'nuclei',
                          { target: web.url, templates: action.parameters.templates ?? DEFAULT_TEMPLATES },
                          { signal: runtime.signal, timeoutMs: runtime.timeoutMs }
                      );

            const output = outputRecord(raw);
            if (output.success === false) {
                throw new Error(`${scanner} failed: ${stringOf(output, 'error') ?? 'unknown error'}`);
            }
            const keys = scanner === 'nikto' ? ['findings', 'vulnerabilities'] : ['matches', 'results', 'findings'];
            for (const entry of recordList(output, keys)) {
                findings.push(this.toFinding(entry, scanner, web));
            }
        }
        return findings;
    }

    private toFinding(entry: Record<string, unknown>, scanner: WebScanner, web: WebTarget): FindingDraft {
        const info = isRecord(entry.info) ? entry.info : {};
        const rawSeverity = entry.severity ?? info.severity;
        const title =
            stringOf(entry, 'description', 'msg', 'name') ??
            stringOf(info, 'name') ??
            stringOf(entry, 'template-id', 'id') ??
            `${scanner} finding`;
        return {
            target: web.host,
            category: 'web_vulnerability',
            // Nikto items carry no severity of their own
            severity: rawSeverity === undefined ? 'Medium' : toSeverity(rawSeverity),
            title,
            evidence: { scanner, url: web.url, ...pickEvidence(entry, EVIDENCE_KEYS) },
        };
    }
}
