import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { McpConnection } from '../../client/connection.js';
import { loadServerConfig } from '../../config/server.js';
import { GmailAdapter } from '../../gmail/client.js';
import { createFakeGmail, type FakeGmail } from '../../gmail/__tests__/fake-gmail.js';
import { CommandRunner } from '../../terminal/runner.js';
import type { ServerContext } from '../context.js';
import { createMcpServer } from '../server.js';

const EXPECTED_TOOLS = [
  'run_command',
  'list_emails',
  'get_email',
  'get_unread_emails',
  'send_email',
  'delete_email',
  'delete_emails_in_label',
  'gmail.delete_emails_in_label',
  'gmail.list_labels',
  'gmail.create_label',
  'gmail.update_label',
  'gmail.delete_label',
  'gmail.list_drafts',
  'gmail.get_draft',
  'gmail.create_draft',
  'gmail.update_draft'
];

describe('MCP server', () => {
  let workspaceDir: string;
  let fake: FakeGmail;
  let connection: McpConnection;

  beforeEach(async () => {
    workspaceDir = await mkdtemp(path.join(os.tmpdir(), 'mcp-server-'));
    fake = createFakeGmail(
      [
        { id: 'm1', subject: 'Hello', from: 'alice@example.com', date: 'Mon, 5 Oct 2026 10:00:00 +0000', body: 'First', labelIds: ['INBOX', 'UNREAD'] },
        { id: 'm2', subject: 'Again', from: 'bob@example.com', date: 'Tue, 6 Oct 2026 10:00:00 +0000', body: 'Second' }
      ],
      [{ id: 'Label_1', name: 'Work' }]
    );

    const config = loadServerConfig({ WORKSPACE_DIR: workspaceDir });
    const context: ServerContext = {
      config,
      gmail: new GmailAdapter(vi.fn(async () => fake.api), { deleteMode: 'trash' }),
      runner: new CommandRunner({ workspaceDir })
    };

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await createMcpServer(context).connect(serverTransport);
    connection = await McpConnection.open(clientTransport);
  });

  afterEach(async () => {
    await connection.close();
    await rm(workspaceDir, { recursive: true, force: true });
  });

  it('lists every tool', async () => {
    const tools = await connection.discoverTools();
    expect(tools.map(tool => tool.name).sort()).toEqual([...EXPECTED_TOOLS].sort());

    const sendEmail = tools.find(tool => tool.name === 'send_email');
    expect(sendEmail?.parameters.required).toEqual(['to', 'subject', 'body']);
  });

  it.runIf(process.platform !== 'win32')('runs a command in the workspace', async () => {
    const result = await connection.invoke({ name: 'run_command', arguments: { command: 'echo hi' } });
    expect(result).toEqual({ content: 'hi\n', isError: false });
  });

  it('lists unread emails', async () => {
    const result = await connection.invoke({ name: 'get_unread_emails', arguments: {} });
    expect(result.isError).toBe(false);
    expect(JSON.parse(result.content)).toEqual([
      { id: 'm1', subject: 'Hello', from: 'alice@example.com', date: 'Mon, 5 Oct 2026 10:00:00 +0000', snippet: 'First' }
    ]);
  });

  it('returns an error body for a missing label', async () => {
    const result = await connection.invoke({ name: 'delete_emails_in_label', arguments: { label_name: 'Missing' } });
    expect(result.isError).toBe(true);
    expect(JSON.parse(result.content)).toEqual({ error: "Label 'Missing' not found" });
    expect(fake.api.users.messages.batchModify).not.toHaveBeenCalled();
  });

  it('serves the namespaced alias with the same behavior', async () => {
    const result = await connection.invoke({ name: 'gmail.delete_emails_in_label', arguments: { label_name: 'work' } });
    expect(JSON.parse(result.content)).toEqual({ status: 'no emails found under this label' });
  });

  it('classifies Gmail API failures', async () => {
    const result = await connection.invoke({ name: 'get_email', arguments: { message_id: 'nope' } });
    expect(result.isError).toBe(true);
    expect(JSON.parse(result.content)).toEqual({
      error: 'not_found',
      code: 404,
      message: 'Requested entity was not found.'
    });
  });

  it('reports unknown tools as errors', async () => {
    const result = await connection.invoke({ name: 'no_such_tool', arguments: {} });
    expect(result.isError).toBe(true);
    expect(result.content).toContain('no_such_tool');
  });
});
