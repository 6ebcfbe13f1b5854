/**
 * Gmail adapter
 * Holds one authenticated Gmail API handle per process, created lazily on first use
 */
import type { gmail_v1 } from 'googleapis';
import type { DeleteMode } from '../config/server.js';
import { componentLogger } from '../logger.js';
import { buildRawMessage, parseEmailDetail, parseEmailSummary } from './parsers.js';
import type {
  DeleteByLabelResult,
  DeleteResult,
  EmailDetail,
  EmailSummary,
  GmailApi,
  LabelChanges,
  LabelListVisibility,
  MessageListVisibility,
  OutgoingMessage
} from './types.js';

const log = componentLogger('gmail');

const USER_ID = 'me';

export type GmailConnector = () => Promise<GmailApi>;

export interface GmailAdapterOptions {
  deleteMode: DeleteMode;
}

export class GmailAdapter {
  private api: GmailApi | null = null;
  private pendingAuth: Promise<GmailApi> | null = null;

  constructor(
    private readonly connect: GmailConnector,
    private readonly options: GmailAdapterOptions
  ) {}

  get isAuthenticated(): boolean {
    return this.api !== null;
  }

  get deleteMode(): DeleteMode {
    return this.options.deleteMode;
  }

  /**
   * Authenticate and cache the API handle. Concurrent callers share the
   * in-flight attempt; a failed attempt is forgotten so the next call retries.
   */
  auth(): Promise<GmailApi> {
    if (!this.pendingAuth) {
      this.pendingAuth = this.connect().then(
        (api) => {
          this.api = api;
          return api;
        },
        (error: unknown) => {
          this.pendingAuth = null;
          throw error;
        }
      );
    }
    return this.pendingAuth;
  }

  private async service(): Promise<GmailApi> {
    return this.api ?? this.auth();
  }

  async listEmails(query = '', maxResults = 10): Promise<EmailSummary[]> {
    const gmail = await this.service();
    const listResponse = await gmail.users.messages.list({ userId: USER_ID, q: query, maxResults });

    const emails: EmailSummary[] = [];
    for (const ref of listResponse.data.messages ?? []) {
      if (!ref.id) continue;
      const detail = await gmail.users.messages.get({ userId: USER_ID, id: ref.id, format: 'metadata' });
      emails.push(parseEmailSummary(detail.data, ref.id));
    }
    return emails;
  }

  async getEmail(messageId: string): Promise<EmailDetail> {
    const gmail = await this.service();
    const response = await gmail.users.messages.get({ userId: USER_ID, id: messageId, format: 'full' });
    return parseEmailDetail(response.data, messageId);
  }

  async sendEmail(to: string, subject: string, body: string): Promise<gmail_v1.Schema$Message> {
    const gmail = await this.service();
    const response = await gmail.users.messages.send({
      userId: USER_ID,
      requestBody: { raw: buildRawMessage({ to, subject, body }) }
    });
    log.info({ id: response.data.id }, 'Email sent');
    return response.data;
  }

  async deleteEmail(messageId: string): Promise<DeleteResult> {
    const gmail = await this.service();
    if (this.options.deleteMode === 'permanent') {
      await gmail.users.messages.delete({ userId: USER_ID, id: messageId });
      return { status: 'deleted', id: messageId };
    }
    await gmail.users.messages.trash({ userId: USER_ID, id: messageId });
    return { status: 'trashed', id: messageId };
  }

  /**
   * Move every message carrying the named label to Trash with one batchModify call.
   * The label is matched by name, ignoring case.
   */
  async deleteEmailsInLabel(labelName: string): Promise<DeleteByLabelResult> {
    const gmail = await this.service();

    const labelsResponse = await gmail.users.labels.list({ userId: USER_ID });
    const label = (labelsResponse.data.labels ?? []).find(
      l => l.name?.toLowerCase() === labelName.toLowerCase()
    );
    if (!label?.id) {
      return { error: `Label '${labelName}' not found` };
    }

    const listResponse = await gmail.users.messages.list({ userId: USER_ID, labelIds: [label.id] });
    const ids = (listResponse.data.messages ?? []).flatMap(m => (m.id ? [m.id] : []));
    if (ids.length === 0) {
      return { status: 'no emails found under this label' };
    }

    await gmail.users.messages.batchModify({
      userId: USER_ID,
      requestBody: { ids, removeLabelIds: [], addLabelIds: ['TRASH'] }
    });
    log.info({ label: labelName, count: ids.length }, 'Trashed messages in label');
    return { status: 'deleted', count: ids.length, label: labelName };
  }

  // ========================
  // LABEL MANAGEMENT
  // ========================

  async listLabels(): Promise<gmail_v1.Schema$Label[]> {
    const gmail = await this.service();
    const response = await gmail.users.labels.list({ userId: USER_ID });
    return response.data.labels ?? [];
  }

  async createLabel(
    name: string,
    labelListVisibility: LabelListVisibility = 'labelShow',
    messageListVisibility: MessageListVisibility = 'show'
  ): Promise<gmail_v1.Schema$Label> {
    const gmail = await this.service();
    const response = await gmail.users.labels.create({
      userId: USER_ID,
      requestBody: { name, labelListVisibility, messageListVisibility }
    });
    return response.data;
  }

  /** Only the fields present in `changes` are sent */
  async updateLabel(labelId: string, changes: LabelChanges): Promise<gmail_v1.Schema$Label> {
    const gmail = await this.service();
    const requestBody: gmail_v1.Schema$Label = {};
    if (changes.name) requestBody.name = changes.name;
    if (changes.labelListVisibility) requestBody.labelListVisibility = changes.labelListVisibility;
    if (changes.messageListVisibility) requestBody.messageListVisibility = changes.messageListVisibility;

    const response = await gmail.users.labels.patch({ userId: USER_ID, id: labelId, requestBody });
    return response.data;
  }

  async deleteLabel(labelId: string): Promise<{ status: 'deleted'; id: string }> {
    const gmail = await this.service();
    await gmail.users.labels.delete({ userId: USER_ID, id: labelId });
    return { status: 'deleted', id: labelId };
  }

  // ========================
  // DRAFTS
  // ========================

  async listDrafts(maxResults?: number): Promise<gmail_v1.Schema$ListDraftsResponse> {
    const gmail = await this.service();
    const response = await gmail.users.drafts.list({ userId: USER_ID, maxResults });
    return response.data;
  }

  async getDraft(draftId: string): Promise<gmail_v1.Schema$Draft> {
    const gmail = await this.service();
    const response = await gmail.users.drafts.get({ userId: USER_ID, id: draftId, format: 'full' });
    return response.data;
  }

  async createDraft(to: string, subject: string, body: string): Promise<gmail_v1.Schema$Draft> {
    const gmail = await this.service();
    const response = await gmail.users.drafts.create({
      userId: USER_ID,
      requestBody: { message: { raw: buildRawMessage({ to, subject, body }) } }
    });
    return response.data;
  }

  /**
   * Replace a draft's message with one built from the given fields only.
   * Fields left out are not carried over from the existing draft.
   */
  async updateDraft(draftId: string, message: OutgoingMessage): Promise<gmail_v1.Schema$Draft> {
    const gmail = await this.service();
    const response = await gmail.users.drafts.update({
      userId: USER_ID,
      id: draftId,
      requestBody: { id: draftId, message: { raw: buildRawMessage(message) } }
    });
    return response.data;
  }
}
