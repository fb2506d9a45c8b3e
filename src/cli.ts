#!/usr/bin/env node
/**
 * scopewarden CLI
 *
 * Usage:
 *   scopewarden --run [query]          Run a query (interactive when no query)
 *   scopewarden --sessions             List sessions
 *   scopewarden --summary <id...>      Summarize one or more sessions
 *   scopewarden --recall               Recall findings across sessions
 *   scopewarden --personas             List personas
 *   scopewarden --serve                Start the HTTP API
 *   scopewarden --token [operator]     Issue an API token
 *   scopewarden --version              Show version
 *   scopewarden --help                 Show this help
 */

import readline from 'readline';
import dotenv from 'dotenv';
import { loadConfig } from './config/loader';
import { createRuntime, type Runtime } from './bootstrap';
import { createAuthenticator } from './middleware/auth';
import { startServer } from './server';
import type { EventEnvelope } from './agents/EventChannel';
import type { PlanResult } from './agents/OrchestratorAgent';
import { SEVERITIES, type FindingFilter, type Severity, type Summary } from './types';
import { asMessage } from './utils/errors';
import { configureLogger } from './utils/logger';
import { readVersion } from './utils/version';

// ANSI Colors
const colors = {
    reset: '\x1b[0m',
    bright: '\x1b[1m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    cyan: '\x1b[36m',
};

const SEVERITY_COLORS: Record<Severity, string> = {
    Critical: colors.red + colors.bright,
    High: colors.red,
    Medium: colors.yellow,
    Low: colors.blue,
    Info: colors.cyan,
};

function log(msg: string, color = colors.reset) {
    console.log(`${color}${msg}${colors.reset}`);
}

function logSuccess(msg: string) {
    log(`✓ ${msg}`, colors.green);
}

function logError(msg: string) {
    log(`✗ ${msg}`, colors.red);
}

function logWarning(msg: string) {
    log(`⚠ ${msg}`, colors.yellow);
}

function logInfo(msg: string) {
    log(`ℹ ${msg}`, colors.cyan);
}

// ============ ARGUMENTS ============

const VALUE_OPTIONS = ['--config', '--persona', '--session', '--target', '--category', '--min-severity', '--port'] as const;
type ValueOption = (typeof VALUE_OPTIONS)[number];

export interface ParsedArgs {
    command: string | undefined;
    positional: string[];
    options: Partial<Record<ValueOption, string>>;
}

function isValueOption(arg: string): arg is ValueOption {
    return VALUE_OPTIONS.some((option) => option === arg);
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
    const [command, ...rest] = argv;
    const positional: string[] = [];
    const options: Partial<Record<ValueOption, string>> = {};
    for (let i = 0; i < rest.length; i++) {
        const arg = rest[i];
        if (isValueOption(arg)) {
            const value = rest[i + 1];
            if (value === undefined) {
                throw new Error(`${arg} requires a value`);
            }
            options[arg] = value;
            i++;
            continue;
        }
        positional.push(arg);
    }
    return { command, positional, options };
}

function openRuntime(args: ParsedArgs): Runtime {
    const { config } = loadConfig({ configPath: args.options['--config'] });
    // Keep the terminal for results; LOG_LEVEL still overrides
    configureLogger({ level: 'warn', json: false });
    return createRuntime(config);
}

function ask(rl: readline.Interface, question: string): Promise<string> {
    return new Promise((resolve) => rl.question(question, resolve));
}

// ============ OUTPUT ============

function printEvent(event: EventEnvelope): void {
    switch (event.type) {
        case 'query_rejected':
            logError(`Query rejected: ${event.error.message}`);
            break;
        case 'plan_created':
            logInfo(`Plan ${event.planId} from ${event.backend ?? 'none'}: ${event.actions.length} action(s)`);
            if (event.notice) logWarning(event.notice);
            for (const action of event.actions) {
                log(`    • ${action.tool} ${action.target} ${action.description}`);
            }
            break;
        case 'planning_failed':
            logError(`Planning failed: ${event.error.message}`);
            break;
        case 'action_started':
            log(`→ ${event.action.tool} ${event.action.target}`, colors.blue);
            break;
        case 'action_completed':
            if (event.status === 'completed') {
                logSuccess(`${event.action.tool} ${event.action.target}: ${event.findingCount} finding(s)`);
            } else {
                logWarning(`${event.action.tool} ${event.action.target}: ${event.status}${event.error ? ` (${event.error.code}: ${event.error.message})` : ''}`);
            }
            break;
        case 'finding_added': {
            const { finding } = event;
            log(`    [${finding.severity}] ${finding.title} (${finding.target})`, SEVERITY_COLORS[finding.severity]);
            break;
        }
        case 'confirmation_resolved':
            logInfo(`Confirmation for ${event.actionId}: ${event.status}`);
            break;
        case 'plan_stopped':
            logWarning(`Plan ${event.planId} stopped`);
            break;
        default:
            break;
    }
}

function printSummary(summary: Summary): void {
    log(`\n${colors.bright}Summary${colors.reset} (${summary.sessionIds.join(', ')})`);
    log(`  ${summary.uniqueFindings} unique of ${summary.totalFindings} finding(s)`);
    log(`  ${SEVERITIES.map((severity) => `${severity}: ${summary.severityCounts[severity]}`).join('  ')}`);
    for (const target of summary.targets) {
        log(`  ${target.target.padEnd(30)} ${target.total}`);
    }
    for (const finding of summary.findings) {
        const seen = finding.occurrences > 1 ? ` x${finding.occurrences}` : '';
        log(`  [${finding.severity}] ${finding.title} (${finding.target})${seen}`, SEVERITY_COLORS[finding.severity]);
    }
    console.log('');
}

// ============ COMMANDS ============

async function runQuery(
    runtime: Runtime,
    rl: readline.Interface,
    sessionId: string,
    query: string,
    current: { planId: string }
): Promise<PlanResult> {
    const { orchestrator, events } = runtime;
    const { planId, completion } = orchestrator.submitQuery(sessionId, query);
    current.planId = planId;

    // Confirmation prompts are asked one at a time
    let prompts: Promise<void> = Promise.resolve();
    const unsubscribe = events.subscribe(
        (event) => {
            if (!('planId' in event) || event.planId !== planId) return;
            if (event.type === 'confirmation_required') {
                const { action, deadline } = event;
                prompts = prompts.then(async () => {
                    log(`\n${colors.yellow}${colors.bright}Confirmation required${colors.reset}`);
                    log(`  ${action.tool} ${action.target} ${JSON.stringify(action.parameters)}`);
                    log(`  ${action.description}`);
                    const answer = await ask(rl, `  Approve before ${deadline}? [y/N] `);
                    if (!orchestrator.confirm(action.id, /^y(es)?$/i.test(answer.trim()))) {
                        logWarning('Confirmation was already settled');
                    }
                });
                return;
            }
            printEvent(event);
        },
        { sessionId }
    );

    try {
        const result = await completion;
        await prompts;
        return result;
    } finally {
        unsubscribe();
        current.planId = '';
    }
}

async function runCommand(args: ParsedArgs): Promise<void> {
    const runtime = openRuntime(args);
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    const stopCurrent = { planId: '' };
    rl.on('SIGINT', () => {
        if (stopCurrent.planId && runtime.orchestrator.stop(stopCurrent.planId)) {
            logWarning('Stopping plan...');
            return;
        }
        rl.close();
    });

    try {
        const session = runtime.orchestrator.openSession(args.options['--session'], args.options['--persona']);
        logInfo(`Session ${session.id} (persona: ${session.persona})`);

        const once = args.positional.join(' ').trim();
        if (once) {
            const result = await runQuery(runtime, rl, session.id, once, stopCurrent);
            if (result.summary) printSummary(result.summary);
            if (result.status === 'failed' || result.status === 'rejected') process.exitCode = 1;
            return;
        }

        logInfo('Enter a query, or "exit" to quit');
        for (;;) {
            const query = (await ask(rl, `${colors.bright}> ${colors.reset}`)).trim();
            if (query === '') continue;
            if (query === 'exit' || query === 'quit') break;
            if (query === 'summary') {
                printSummary(runtime.orchestrator.getSessionSummary(session.id));
                continue;
            }
            const result = await runQuery(runtime, rl, session.id, query, stopCurrent);
            if (result.summary) printSummary(result.summary);
        }
    } finally {
        rl.close();
        await runtime.close();
    }
}

function listSessions(args: ParsedArgs): void {
    const runtime = openRuntime(args);
    try {
        const sessions = runtime.orchestrator.listSessions();
        if (sessions.length === 0) {
            logWarning('No sessions found');
            return;
        }
        console.log('\n  Session                              | Persona          | Created');
        console.log('  -------------------------------------|------------------|------------------------');
        for (const session of sessions) {
            console.log(`  ${session.id.padEnd(36)} | ${session.persona.padEnd(16)} | ${session.createdAt}`);
        }
        console.log('');
    } finally {
        runtime.store.close();
    }
}

function showSummary(args: ParsedArgs): void {
    if (args.positional.length === 0) {
        logError('Usage: scopewarden --summary <session-id> [session-id...]');
        process.exit(1);
    }
    const runtime = openRuntime(args);
    try {
        printSummary(runtime.orchestrator.getSessionSummary(args.positional));
    } finally {
        runtime.store.close();
    }
}

function recall(args: ParsedArgs): void {
    const minSeverity = args.options['--min-severity'];
    const severity = minSeverity ? SEVERITIES.find((level) => level.toLowerCase() === minSeverity.toLowerCase()) : undefined;
    if (minSeverity && !severity) {
        logError(`--min-severity must be one of ${SEVERITIES.join(', ')}`);
        process.exit(1);
    }
    const filter: FindingFilter = {
        target: args.options['--target'] ?? args.positional[0],
        category: args.options['--category'],
        minSeverity: severity,
        sessionIds: args.options['--session'] ? [args.options['--session']] : undefined,
    };

    const runtime = openRuntime(args);
    try {
        const findings = runtime.orchestrator.recall(filter);
        if (findings.length === 0) {
            logWarning('No findings match');
            return;
        }
        for (const finding of findings) {
            log(
                `  [${finding.severity}] ${finding.title} (${finding.target}) ${finding.sessionId} ${finding.timestamp}`,
                SEVERITY_COLORS[finding.severity]
            );
        }
        logInfo(`${findings.length} finding(s)`);
    } finally {
        runtime.store.close();
    }
}

function listPersonas(args: ParsedArgs): void {
    const runtime = openRuntime(args);
    try {
        for (const persona of runtime.orchestrator.listPersonas()) {
            log(`\n  ${colors.bright}${persona.name}${colors.reset} - ${persona.description}`);
            log(`    tools: ${persona.allowedTools.join(', ')}`);
            log(`    recall prior findings: ${persona.recallPriorFindings ? 'yes' : 'no'}, history: ${persona.historyLimit}`);
        }
        console.log('');
    } finally {
        runtime.store.close();
    }
}

function issueToken(args: ParsedArgs): void {
    const { config } = loadConfig({ configPath: args.options['--config'] });
    if (!config.server.authSecret) {
        logError('server.authSecret (or SCOPEWARDEN_AUTH_SECRET) must be set to issue tokens');
        process.exit(1);
    }
    const operator = args.positional[0] ?? 'operator';
    console.log(createAuthenticator(config.server.authSecret).generateToken(operator));
}

function showHelp(): void {
    console.log(`
${colors.cyan}${colors.bright}scopewarden${colors.reset} - scope-enforced security testing orchestrator

${colors.bright}USAGE:${colors.reset}
    scopewarden <command> [options]

${colors.bright}COMMANDS:${colors.reset}
    ${colors.green}--run [query]${colors.reset}
        Run one query, or start an interactive prompt when no query is given
        
    ${colors.green}--sessions${colors.reset}
        List stored sessions
        
    ${colors.green}--summary <session-id...>${colors.reset}
        Deduplicated findings summary for one or more sessions
        
    ${colors.green}--recall [target]${colors.reset}
        Findings across sessions (filters: --target, --category, --min-severity, --session)
        
    ${colors.green}--personas${colors.reset}
        List the configured personas
        
    ${colors.green}--serve${colors.reset}
        Start the HTTP API (--port to override)
        
    ${colors.green}--token [operator]${colors.reset}
        Issue a bearer token for the HTTP API
        
    ${colors.green}--version${colors.reset}
        Show version information
        
    ${colors.green}--help${colors.reset}
        Show this help message

${colors.bright}OPTIONS:${colors.reset}
    --config <path>      Configuration file
    --persona <name>     Persona for a new session
    --session <id>       Resume (or create) a session

${colors.bright}EXAMPLES:${colors.reset}
    scopewarden --run "scan 192.168.1.10 for open ports"
    scopewarden --run --persona recon-only --session session_20250101_120000_abcd1234
    scopewarden --recall 192.168.1.10 --min-severity high
`);
}

// Main
async function main(): Promise<void> {
    dotenv.config();
    const args = parseArgs(process.argv.slice(2));

    if (!args.command) {
        showHelp();
        return;
    }

    try {
        switch (args.command) {
            case '--run':
            case '-r':
                await runCommand(args);
                break;

            case '--sessions':
            case '-s':
                listSessions(args);
                break;

            case '--summary':
                showSummary(args);
                break;

            case '--recall':
                recall(args);
                break;

            case '--personas':
                listPersonas(args);
                break;

            case '--serve': {
                const port = args.options['--port'] ? Number(args.options['--port']) : undefined;
                await startServer({ configPath: args.options['--config'], port });
                break;
            }

            case '--token':
                issueToken(args);
                break;

            case '--version':
            case '-v':
                log(`\nscopewarden v${readVersion()}`, colors.cyan);
                break;

            case '--help':
            case '-h':
                showHelp();
                break;

            default:
                logError(`Unknown command: ${args.command}`);
                showHelp();
                process.exit(1);
        }
    } catch (error) {
        logError(`Error: ${asMessage(error)}`);
        process.exit(1);
    }
}

if (require.main === module) {
    void main();
}
