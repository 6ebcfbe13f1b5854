/**
 * Gmail MCP tool handlers
 * Implements message tools (list_emails, get_email, get_unread_emails, send_email,
 * delete_email, delete_emails_in_label) and the gmail.* label and draft tools
 */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { jsonResult, runTool, toJsonToolResult } from '../mcp/results.js';
import type { ServerContext } from '../mcp/context.js';
import { classifyGmailError } from './errors.js';

const UNREAD_QUERY = 'is:unread';
const UNREAD_LIMIT = 20;

const labelListVisibility = z.enum(['labelShow', 'labelShowIfUnread', 'labelHide']);
const messageListVisibility = z.enum(['show', 'hide']);

/**
 * Register Gmail tools with MCP server
 */
export function registerGmailHandlers(server: McpServer, context: ServerContext): void {
  const { gmail } = context;

  const deleteInLabel = async ({ label_name }: { label_name: string }) => {
    const outcome = await runTool(() => gmail.deleteEmailsInLabel(label_name), classifyGmailError);
    if (outcome.ok && 'error' in outcome.value) {
      return jsonResult(outcome.value, true);
    }
    return toJsonToolResult(outcome);
  };

  // list_emails - Search messages, one metadata fetch per hit
  server.registerTool('list_emails', {
    description: 'List Gmail emails with an optional Gmail search query (e.g. "from:user@example.com", "subject:meeting")',
    inputSchema: {
      query: z.string().default('').describe('Gmail search query'),
      max_results: z.number().int().min(1).max(500).default(10).describe('Maximum number of emails (default 10)')
    }
  }, async ({ query, max_results }) => {
    return toJsonToolResult(await runTool(() => gmail.listEmails(query, max_results), classifyGmailError));
  });

  // get_email - Full message with plain-text body
  server.registerTool('get_email', {
    description: 'Get full Gmail email content by message ID',
    inputSchema: {
      message_id: z.string().min(1).describe('Gmail message ID (from list_emails)')
    }
  }, async ({ message_id }) => {
    return toJsonToolResult(await runTool(() => gmail.getEmail(message_id), classifyGmailError));
  });

  server.registerTool('get_unread_emails', {
    description: `Get up to ${UNREAD_LIMIT} unread Gmail emails`
  }, async () => {
    return toJsonToolResult(await runTool(() => gmail.listEmails(UNREAD_QUERY, UNREAD_LIMIT), classifyGmailError));
  });

  server.registerTool('send_email', {
    description: 'Send a plain-text Gmail email',
    inputSchema: {
      to: z.string().min(1).describe('Recipient address(es), comma separated'),
      subject: z.string().describe('Subject line'),
      body: z.string().describe('Plain-text body')
    }
  }, async ({ to, subject, body }) => {
    return toJsonToolResult(await runTool(() => gmail.sendEmail(to, subject, body), classifyGmailError));
  });

  server.registerTool('delete_email', {
    description: gmail.deleteMode === 'permanent'
      ? 'Permanently delete a Gmail email by ID (cannot be undone)'
      : 'Move a Gmail email to Trash by ID',
    inputSchema: {
      message_id: z.string().min(1).describe('Gmail message ID')
    }
  }, async ({ message_id }) => {
    return toJsonToolResult(await runTool(() => gmail.deleteEmail(message_id), classifyGmailError));
  });

  const deleteInLabelConfig = {
    description: 'Move all emails under a Gmail label to Trash',
    inputSchema: {
      label_name: z.string().min(1).describe('Label name (case-insensitive)')
    }
  };
  server.registerTool('delete_emails_in_label', deleteInLabelConfig, deleteInLabel);
  server.registerTool('gmail.delete_emails_in_label', deleteInLabelConfig, deleteInLabel);

  // ===== LABELS =====

  server.registerTool('gmail.list_labels', {
    description: 'List all Gmail labels'
  }, async () => {
    return toJsonToolResult(await runTool(() => gmail.listLabels(), classifyGmailError));
  });

  server.registerTool('gmail.create_label', {
    description: 'Create a Gmail label',
    inputSchema: {
      name: z.string().min(1).describe('Label name'),
      label_list_visibility: labelListVisibility.default('labelShow').describe('Visibility in the label list'),
      message_list_visibility: messageListVisibility.default('show').describe('Visibility in the message list')
    }
  }, async ({ name, label_list_visibility, message_list_visibility }) => {
    return toJsonToolResult(await runTool(
      () => gmail.createLabel(name, label_list_visibility, message_list_visibility),
      classifyGmailError
    ));
  });

  server.registerTool('gmail.update_label', {
    description: 'Rename a Gmail label or change its visibility',
    inputSchema: {
      label_id: z.string().min(1).describe('Label ID (from gmail.list_labels)'),
      new_name: z.string().min(1).optional().describe('New label name'),
      label_list_visibility: labelListVisibility.optional(),
      message_list_visibility: messageListVisibility.optional()
    }
  }, async ({ label_id, new_name, label_list_visibility, message_list_visibility }) => {
    return toJsonToolResult(await runTool(
      () => gmail.updateLabel(label_id, {
        name: new_name,
        labelListVisibility: label_list_visibility,
        messageListVisibility: message_list_visibility
      }),
      classifyGmailError
    ));
  });

  server.registerTool('gmail.delete_label', {
    description: 'Delete a Gmail label (messages keep existing)',
    inputSchema: {
      label_id: z.string().min(1).describe('Label ID')
    }
  }, async ({ label_id }) => {
    return toJsonToolResult(await runTool(() => gmail.deleteLabel(label_id), classifyGmailError));
  });

  // ===== DRAFTS =====

  server.registerTool('gmail.list_drafts', {
    description: 'List Gmail drafts',
    inputSchema: {
      max_results: z.number().int().min(1).max(500).optional().describe('Maximum number of drafts')
    }
  }, async ({ max_results }) => {
    return toJsonToolResult(await runTool(() => gmail.listDrafts(max_results), classifyGmailError));
  });

  server.registerTool('gmail.get_draft', {
    description: 'Get a Gmail draft by ID',
    inputSchema: {
      draft_id: z.string().min(1).describe('Draft ID')
    }
  }, async ({ draft_id }) => {
    return toJsonToolResult(await runTool(() => gmail.getDraft(draft_id), classifyGmailError));
  });

  server.registerTool('gmail.create_draft', {
    description: 'Create a plain-text Gmail draft',
    inputSchema: {
      to: z.string().min(1).describe('Recipient address(es)'),
      subject: z.string().describe('Subject line'),
      body: z.string().describe('Plain-text body')
    }
  }, async ({ to, subject, body }) => {
    return toJsonToolResult(await runTool(() => gmail.createDraft(to, subject, body), classifyGmailError));
  });

  server.registerTool('gmail.update_draft', {
    description: 'Replace a Gmail draft. Only the fields given end up in the new draft.',
    inputSchema: {
      draft_id: z.string().min(1).describe('Draft ID'),
      to: z.string().optional(),
      subject: z.string().optional(),
      body: z.string().optional()
    }
  }, async ({ draft_id, to, subject, body }) => {
    return toJsonToolResult(await runTool(
      () => gmail.updateDraft(draft_id, { to, subject, body }),
      classifyGmailError
    ));
  });
}
