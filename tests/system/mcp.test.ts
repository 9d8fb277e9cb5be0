import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import pino from 'pino';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { createMcpServer } from '../../src/transports/mcp';
import { createDispatcher } from '../../src/tools';
import { TOOL_NAMES } from '../../src/tools/ToolTypes';

let server: Server;
let client: Client;

describe('MCP server', () => {
  beforeAll(async () => {
    const dispatcher = createDispatcher({ authToken: 'test-secret', identifier: '910000000000' }, pino({ level: 'silent' }));
    server = createMcpServer(dispatcher, { name: 'text-utilities-test', version: '0.0.0' });
    client = new Client({ name: 'test-client', version: '0.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);
  });

  afterAll(async () => {
    await client.close();
    await server.close();
  });

  it('lists the tools with their input schemas', async () => {
    const { tools } = await client.listTools();
    expect(tools.map(t => t.name)).toEqual([...TOOL_NAMES]);
    const convert = tools.find(t => t.name === 'convert_case');
    expect(convert?.inputSchema.required).toEqual(['text', 'case_type']);
  });

  it('calls a tool and returns one text block', async () => {
    const result = await client.callTool({ name: 'base64_converter', arguments: { text: 'hello', operation: 'encode' } });
    expect(result).toMatchObject({
      content: [{ type: 'text', text: '✅ **BASE64 ENCODED**\n\n**Original:** hello\n**Encoded:** aGVsbG8=\n\n📋 **Copy the encoded text above!**' }],
    });
  });

  it('validates the token', async () => {
    const ok = await client.callTool({ name: 'validate', arguments: { token: 'test-secret' } });
    expect(ok).toMatchObject({ content: [{ type: 'text', text: '910000000000' }] });
    const bad = await client.callTool({ name: 'validate', arguments: { token: 'Test-Secret' } });
    expect(bad).toMatchObject({ content: [{ type: 'text', text: '❌ Invalid token' }] });
  });

  it('reports unknown tools as text', async () => {
    const result = await client.callTool({ name: 'nope', arguments: {} });
    expect(result).toMatchObject({ content: [{ type: 'text', text: '❌ Unknown tool: nope' }] });
  });
});
