import { describe, test, expect, beforeAll, afterAll } from '@jest/globals';
import { createApp } from '../../app';
import { createRuntime, type Runtime } from '../../bootstrap';
import { createAuthenticator } from '../../middleware/auth';
import { createBuiltinPlugins } from '../../plugins';
import type { EventEnvelope, EventType } from '../../agents/EventChannel';
import { DEFAULT_PERSONA } from '../../config/personas';
import { FakeToolServer, ScriptedBackend, listen, planJson, testConfig, type Listening } from '../../__tests__/fixtures';

const MODULE = 'exploit/unix/ftp/vsftpd_234_backdoor';

// Exploit requests get an exploit plan, everything else a port scan
const backend = new ScriptedBackend('scripted', [
    async (request) =>
        request.userPrompt.includes('exploit')
            ? planJson([{ tool: 'metasploit', target: '192.168.1.10', parameters: { action: 'exploit', module: MODULE } }])
            : planJson([{ tool: 'nmap', target: '192.168.1.10', description: 'port scan' }]),
]);

describe('HTTP API', () => {
    let runtime: Runtime;
    let server: Listening;
    let token: string;

    beforeAll(async () => {
        runtime = createRuntime(testConfig(), {
            backends: [backend],
            plugins: createBuiltinPlugins(),
            toolServer: new FakeToolServer()
                .on('nmap', async () => ({ open_ports: [{ port: 22, protocol: 'tcp', service: 'ssh' }] }))
                .on('metasploit', async () => ({ success: true })),
            personas: new Map([['default', DEFAULT_PERSONA]]),
        });
        const auth = createAuthenticator('test-secret');
        token = auth.generateToken('tester');
        server = await listen(
            createApp({
                orchestrator: runtime.orchestrator,
                events: runtime.events,
                auth,
                corsOrigins: ['http://localhost:3000'],
                version: '1.2.3',
            })
        );
    });

    afterAll(async () => {
        await server.close();
        await runtime.close();
    });

    function api(path: string, init: { method?: string; body?: unknown; auth?: string | null } = {}): Promise<Response> {
        const headers: Record<string, string> = { 'Content-Type': 'application/json' };
        const bearer = init.auth === undefined ? token : init.auth;
        if (bearer !== null) headers.Authorization = `Bearer ${bearer}`;
        return fetch(`${server.url}/api${path}`, {
            method: init.method ?? 'GET',
            headers,
            body: init.body === undefined ? undefined : JSON.stringify(init.body),
        });
    }

    function nextEvent(type: EventType): Promise<EventEnvelope> {
        return new Promise((resolve) => {
            const unsubscribe = runtime.events.subscribe(
                (event) => {
                    unsubscribe();
                    resolve(event);
                },
                { types: [type] }
            );
        });
    }

    test('serves health without a token', async () => {
        const res = await api('/health', { auth: null });
        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({
            status: 'ok',
            version: '1.2.3',
            backends: ['scripted'],
            toolServer: { url: null, available: false, tools: [] },
        });
    });

    test('requires a valid token everywhere else', async () => {
        expect((await api('/sessions', { auth: null })).status).toBe(401);
        const forged = await api('/sessions', { auth: 'not-a-token' });
        expect(forged.status).toBe(403);
        expect(await forged.json()).toEqual({ error: true, message: 'Invalid or expired token' });
    });

    test('creates, lists and loads sessions', async () => {
        const created = await api('/sessions', { method: 'POST', body: { persona: 'default', id: 'session-a' } });
        expect(created.status).toBe(201);
        expect(await created.json()).toMatchObject({ id: 'session-a', persona: 'default' });

        const list = await api('/sessions');
        expect(await list.json()).toMatchObject({ sessions: [{ id: 'session-a' }] });

        const loaded = await api('/sessions/session-a');
        expect(await loaded.json()).toMatchObject({ id: 'session-a', records: [] });
    });

    test('validates session input', async () => {
        expect((await api('/sessions', { method: 'POST', body: { persona: 5 } })).status).toBe(400);
        const unknown = await api('/sessions', { method: 'POST', body: { persona: 'nobody' } });
        expect(unknown.status).toBe(400);
        expect(await unknown.json()).toMatchObject({ code: 'CONFIGURATION_ERROR' });
        const missing = await api('/sessions/session-missing');
        expect(missing.status).toBe(404);
        expect(await missing.json()).toEqual({
            error: true,
            code: 'SESSION_NOT_FOUND',
            message: 'Session session-missing not found',
        });
    });

    test('runs a query in the background and exposes its findings', async () => {
        const done = nextEvent('plan_complete');
        const res = await api('/sessions/session-a/queries', { method: 'POST', body: { query: 'scan 192.168.1.10' } });
        expect(res.status).toBe(202);
        const body = await res.json();
        const complete = await done;
        expect(body).toEqual({ planId: complete.type === 'plan_complete' ? complete.planId : null, sessionId: 'session-a' });

        const findings = await api('/findings?target=192.168.1.10');
        expect(await findings.json()).toMatchObject({ count: 1, findings: [{ title: 'Open port 22/tcp (ssh)', sessionId: 'session-a' }] });

        const summary = await api('/sessions/session-a/summary');
        expect(await summary.json()).toMatchObject({ uniqueFindings: 1, severityCounts: { Info: 1 } });

        const multi = await api('/summary?sessions=session-a');
        expect(await multi.json()).toMatchObject({ sessionIds: ['session-a'], totalFindings: 1 });
    });

    test('validates queries and filters', async () => {
        expect((await api('/sessions/session-a/queries', { method: 'POST', body: { query: '  ' } })).status).toBe(400);
        expect((await api('/sessions/session-missing/queries', { method: 'POST', body: { query: 'scan' } })).status).toBe(404);
        expect((await api('/findings?severity=bogus')).status).toBe(400);
        expect((await api('/summary')).status).toBe(400);
    });

    test('confirms a pending dangerous action', async () => {
        const required = nextEvent('confirmation_required');
        const done = nextEvent('plan_complete');
        await api('/sessions/session-a/queries', { method: 'POST', body: { query: 'exploit 192.168.1.10' } });
        const event = await required;
        if (event.type !== 'confirmation_required') throw new Error('unexpected event');

        const pending = await api('/confirmations');
        expect(await pending.json()).toMatchObject({
            confirmations: [{ actionId: event.action.id, sessionId: 'session-a', tool: 'metasploit', status: 'pending' }],
        });

        const invalid = await api(`/actions/${event.action.id}/confirm`, { method: 'POST', body: { approve: 'yes' } });
        expect(invalid.status).toBe(400);

        const approved = await api(`/actions/${event.action.id}/confirm`, { method: 'POST', body: { approve: true } });
        expect(await approved.json()).toEqual({ actionId: event.action.id, status: 'approved' });

        const again = await api(`/actions/${event.action.id}/confirm`, { method: 'POST', body: { approve: false } });
        expect(again.status).toBe(409);
        await done;
    });

    test('returns 404 when stopping an unknown plan', async () => {
        expect((await api('/plans/plan-missing/stop', { method: 'POST' })).status).toBe(404);
    });

    test('lists personas', async () => {
        const res = await api('/personas');
        expect(await res.json()).toMatchObject({ personas: [{ name: 'default' }] });
    });

    test('answers malformed JSON with 400', async () => {
        const res = await fetch(`${server.url}/api/sessions`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${token}` },
            body: '{"persona":',
        });
        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ error: true, message: 'Malformed JSON body' });
    });

    test('replays buffered session events over SSE', async () => {
        const controller = new AbortController();
        const res = await fetch(`${server.url}/api/sessions/session-a/events?since=0`, {
            headers: { Authorization: `Bearer ${token}` },
            signal: controller.signal,
        });
        expect(res.status).toBe(200);
        expect(res.headers.get('content-type')).toBe('text/event-stream');

        const reader = res.body?.getReader();
        const chunk = await reader?.read();
        controller.abort();
        const text = new TextDecoder().decode(chunk?.value);
        expect(text).toMatch(/^id: \d+\nevent: persona_loaded\ndata: \{/);
    });

    test('returns 404 for the event stream of an unknown session', async () => {
        expect((await api('/sessions/session-missing/events')).status).toBe(404);
    });
});
