import type { Result } from 'neverthrow';

import type { TargetFailedError } from './errors.js';

export interface NewPostMessage {
  content: string;
  link?: string | undefined;
  /** Upload uuids */
  images?: string[] | undefined;
}

export interface NewPostRequest {
  targets?: string[] | null | undefined;
  language?: string | undefined;
  /** One message, or a thread in reply order */
  messages: NewPostMessage[];
}

/**
 * What a target receives: the request with normalized target names.
 */
export interface TargetRequest {
  targets: string[];
  language?: string | undefined;
  messages: NewPostMessage[];
}

export interface PublishedMessage {
  id: string;
  uri?: string | undefined;
  replyToId?: string | undefined;
}

export interface PublishResponse {
  module: string;
  uri?: string | undefined;
  messages: PublishedMessage[];
}

export interface PublishContext {
  ownerId: string;
  signal?: AbortSignal | undefined;
}

/**
 * A publish destination. Wire clients for external platforms implement this.
 */
export interface PublishTarget {
  readonly name: string;
  readonly displayName: string;
  isConfigured(): boolean;
  publish(request: TargetRequest, context: PublishContext): Promise<Result<PublishResponse, TargetFailedError>>;
}

export type PublishOutcome =
  | { type: 'success'; target: string; result: PublishResponse }
  | { type: 'error'; target: string; module: string; status: number; error: string };
