import { getErrorMessage, isAbortError, throwIfAborted } from '@postcast/core';
import { getLogger } from '@postcast/logger';
import { err, ok, type Result } from 'neverthrow';

import {
  CompositePublishError,
  PublishValidationError,
  TargetFailedError,
  TargetNotConfiguredError,
  type PublishError,
  type TargetError,
} from './errors.js';
import type { TargetRegistry } from './target-registry.js';
import type { NewPostRequest, PublishContext, PublishOutcome, PublishResponse, TargetRequest } from './types.js';

const logger = getLogger('PublishService');

export const MAX_CONTENT_LENGTH = 1000;

export interface PublishServiceOptions {
  /** Maximum thread length per target */
  threadLimits?: Record<string, number> | undefined;
}

export interface BroadcastOptions {
  signal?: AbortSignal | undefined;
}

const DEFAULT_THREAD_LIMITS: Record<string, number> = {
  linkedin: 2,
};

/**
 * Sends one post to every requested target and aggregates the outcomes.
 * Targets are attempted once, concurrently; there is no retry.
 */
export class PublishService {
  private readonly threadLimits: ReadonlyMap<string, number>;

  constructor(
    private readonly registry: TargetRegistry,
    options: PublishServiceOptions = {}
  ) {
    this.threadLimits = new Map(Object.entries(options.threadLimits ?? DEFAULT_THREAD_LIMITS));
  }

  /**
   * Resolves to the responses keyed by target name when every target
   * succeeded, a PublishValidationError when the request is rejected up front,
   * or a CompositePublishError listing every target's outcome otherwise.
   * Rejects with AbortError when the signal fires.
   */
  async broadcastPost(
    request: NewPostRequest,
    ownerId: string,
    options: BroadcastOptions = {}
  ): Promise<Result<Record<string, PublishResponse>, PublishError>> {
    const { signal } = options;
    throwIfAborted(signal);

    const targets = this.registry.normalize(request.targets);
    if (targets.length === 0) {
      return ok({});
    }

    const validationError = this.validate(request, targets);
    if (validationError) {
      logger.info({ ownerId, targets, reason: validationError.message }, 'Rejected post request');
      return err(validationError);
    }

    logger.info({ ownerId, targets, messages: request.messages.length }, 'Broadcasting post');

    const targetRequest: TargetRequest = { targets, language: request.language, messages: request.messages };
    const context: PublishContext = { ownerId, signal };
    const attempts = targets.map((name) => this.attempt(name, targetRequest, context));

    const settled = await Promise.allSettled(attempts);
    throwIfAborted(signal);
    const outcomes = settled.map((attempt) => {
      if (attempt.status === 'rejected') throw attempt.reason;
      return attempt.value;
    });

    if (outcomes.every((outcome) => outcome.type === 'success')) {
      return ok(
        Object.fromEntries(
          outcomes.flatMap((outcome) => (outcome.type === 'success' ? [[outcome.target, outcome.result] as const] : []))
        )
      );
    }

    const failure = new CompositePublishError(outcomes);
    logger.warn({ ownerId, responses: outcomes }, failure.message);
    return err(failure);
  }

  private validate(request: NewPostRequest, targets: readonly string[]): PublishValidationError | undefined {
    if (request.messages.length === 0) {
      return new PublishValidationError('At least one message is required');
    }

    const invalid = request.messages.find(
      (message) => message.content.length === 0 || message.content.length > MAX_CONTENT_LENGTH
    );
    if (invalid) {
      return new PublishValidationError(`Content must be between 1 and ${MAX_CONTENT_LENGTH} characters`);
    }

    for (const target of targets) {
      const limit = this.threadLimits.get(target);
      if (limit !== undefined && request.messages.length > limit) {
        return new PublishValidationError(
          `${this.registry.displayName(target)} supports at most ${limit} messages per post`,
          { context: { target, limit, messages: request.messages.length } }
        );
      }
    }
    return undefined;
  }

  private async attempt(name: string, request: TargetRequest, context: PublishContext): Promise<PublishOutcome> {
    try {
      // isConfigured() belongs to the target and may throw too
      const resolved = this.registry.resolve(name);
      if (resolved.kind === 'unconfigured') {
        return failed(name, new TargetNotConfiguredError(resolved.displayName));
      }

      const result = await resolved.target.publish(request, context);
      return result.match(
        (response): PublishOutcome => ({ type: 'success', target: name, result: response }),
        (error) => failed(name, error)
      );
    } catch (error) {
      if (isAbortError(error) && context.signal?.aborted) throw error;
      logger.error({ error, target: name }, 'Publish target threw');
      const message = `Failed to create post via ${this.registry.displayName(name)}: ${getErrorMessage(error)}`;
      return failed(name, new TargetFailedError(500, name, message, { cause: error }));
    }
  }
}

function failed(target: string, error: TargetError): PublishOutcome {
  return { type: 'error', target, module: error.module, status: error.status, error: error.message };
}
