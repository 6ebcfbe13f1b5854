/**
 * Gmail types shared by the adapter, parsers and MCP tools
 */
import type { gmail_v1 } from 'googleapis';

/** Summary of a Gmail message (list results) */
export interface EmailSummary {
  id: string;
  subject: string;
  from: string;
  date: string;
  snippet: string;
}

/** Message with its plain-text body (get result) */
export interface EmailDetail {
  id: string;
  subject: string;
  from: string;
  to: string;
  date: string;
  body: string;
}

export interface DeleteResult {
  status: 'trashed' | 'deleted';
  id: string;
}

export type DeleteByLabelResult =
  | { status: 'deleted'; count: number; label: string }
  | { status: 'no emails found under this label' }
  | { error: string };

export type LabelListVisibility = 'labelShow' | 'labelShowIfUnread' | 'labelHide';
export type MessageListVisibility = 'show' | 'hide';

export interface LabelChanges {
  name?: string;
  labelListVisibility?: LabelListVisibility;
  messageListVisibility?: MessageListVisibility;
}

export interface OutgoingMessage {
  to?: string;
  subject?: string;
  body?: string;
}

interface ApiResponse<T> {
  data: T;
}

/**
 * The slice of the googleapis Gmail client the adapter calls.
 * `gmail_v1.Gmail` satisfies it; tests provide an in-memory fake.
 */
export interface GmailApi {
  users: {
    messages: {
      list(params: gmail_v1.Params$Resource$Users$Messages$List): Promise<ApiResponse<gmail_v1.Schema$ListMessagesResponse>>;
      get(params: gmail_v1.Params$Resource$Users$Messages$Get): Promise<ApiResponse<gmail_v1.Schema$Message>>;
      send(params: gmail_v1.Params$Resource$Users$Messages$Send): Promise<ApiResponse<gmail_v1.Schema$Message>>;
      trash(params: gmail_v1.Params$Resource$Users$Messages$Trash): Promise<ApiResponse<gmail_v1.Schema$Message>>;
      delete(params: gmail_v1.Params$Resource$Users$Messages$Delete): Promise<ApiResponse<void>>;
      batchModify(params: gmail_v1.Params$Resource$Users$Messages$Batchmodify): Promise<ApiResponse<void>>;
    };
    labels: {
      list(params: gmail_v1.Params$Resource$Users$Labels$List): Promise<ApiResponse<gmail_v1.Schema$ListLabelsResponse>>;
      create(params: gmail_v1.Params$Resource$Users$Labels$Create): Promise<ApiResponse<gmail_v1.Schema$Label>>;
      patch(params: gmail_v1.Params$Resource$Users$Labels$Patch): Promise<ApiResponse<gmail_v1.Schema$Label>>;
      delete(params: gmail_v1.Params$Resource$Users$Labels$Delete): Promise<ApiResponse<void>>;
    };
    drafts: {
      list(params: gmail_v1.Params$Resource$Users$Drafts$List): Promise<ApiResponse<gmail_v1.Schema$ListDraftsResponse>>;
      get(params: gmail_v1.Params$Resource$Users$Drafts$Get): Promise<ApiResponse<gmail_v1.Schema$Draft>>;
      create(params: gmail_v1.Params$Resource$Users$Drafts$Create): Promise<ApiResponse<gmail_v1.Schema$Draft>>;
      update(params: gmail_v1.Params$Resource$Users$Drafts$Update): Promise<ApiResponse<gmail_v1.Schema$Draft>>;
    };
  };
}
