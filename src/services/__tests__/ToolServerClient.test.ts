import { describe, test, expect, beforeAll, afterAll } from '@jest/globals';
import express from 'express';
import { ToolServerClient } from '../ToolServerClient';
import { listen, type Listening } from '../../__tests__/fixtures';

describe('ToolServerClient', () => {
    let server: Listening;
    const mcpCalls: unknown[] = [];

    beforeAll(async () => {
        const app = express();
        app.use(express.json());
        app.get('/health', (req, res) => {
            res.json({ status: 'healthy' });
        });
        app.get('/tools', (req, res) => {
            res.json({ tools: [{ name: 'nmap' }, 'nikto', { description: 'unnamed' }] });
        });
        app.post('/tools/nmap/execute', (req, res) => {
            res.json({ success: true, echoed: req.body });
        });
        app.post('/mcp/tools/call', (req, res) => {
            mcpCalls.push(req.body);
            res.json({ result: { success: true, via: 'mcp' } });
        });
        server = await listen(app);
    });

    afterAll(async () => {
        await server.close();
    });

    function options() {
        return { signal: new AbortController().signal, timeoutMs: 2000 };
    }

    test('reports availability from /health', async () => {
        await expect(new ToolServerClient(server.url).isAvailable()).resolves.toBe(true);
        await expect(new ToolServerClient('http://127.0.0.1:1', 200).isAvailable()).resolves.toBe(false);
    });

    test('lists tool names', async () => {
        await expect(new ToolServerClient(`${server.url}/`).listTools()).resolves.toEqual(['nmap', 'nikto']);
    });

    test('executes a tool on its own endpoint', async () => {
        const client = new ToolServerClient(server.url);
        await expect(client.executeTool('nmap', { target: '192.168.1.10', ports: '22' }, options())).resolves.toEqual({
            success: true,
            echoed: { parameters: { target: '192.168.1.10', ports: '22' } },
        });
    });

    test('falls back to the MCP call endpoint when the tool endpoint is missing', async () => {
        const client = new ToolServerClient(server.url);
        await expect(client.executeTool('nikto', { target: 'example.com', port: 443 }, options())).resolves.toEqual({
            success: true,
            via: 'mcp',
        });
        expect(mcpCalls).toEqual([{ name: 'nikto', arguments: { target: 'example.com', port: 443 } }]);
    });

    test('does not retry when the server is unreachable', async () => {
        const client = new ToolServerClient('http://127.0.0.1:1');
        await expect(client.executeTool('nmap', {}, options())).rejects.toThrow();
    });
});
