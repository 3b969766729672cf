import { DomainError, type DomainErrorOptions } from '@postcast/core';

import type { PublishOutcome } from './types.js';

/**
 * Errors crossing the publish boundary carry an HTTP-style status and the
 * module that produced them.
 */
export abstract class PublishFailure extends DomainError {
  abstract readonly status: number;
  readonly severity = 'error' as const;

  constructor(
    readonly module: string,
    message: string,
    options?: DomainErrorOptions
  ) {
    super(message, options);
  }

  override toJSON() {
    return { ...super.toJSON(), module: this.module, status: this.status };
  }
}

/**
 * The request was rejected before any target was called or anything stored.
 */
export class PublishValidationError extends PublishFailure {
  readonly code = 'PUBLISH_VALIDATION_ERROR';
  readonly status = 400;

  constructor(message: string, options?: DomainErrorOptions) {
    super('publish', message, options);
  }
}

export class TargetNotConfiguredError extends PublishFailure {
  readonly code = 'TARGET_NOT_CONFIGURED';
  readonly status = 503;

  constructor(displayName: string) {
    super('publish', `${displayName} integration not configured`);
  }
}

/**
 * A target attempted the publish and failed.
 */
export class TargetFailedError extends PublishFailure {
  readonly code = 'TARGET_FAILED';

  constructor(
    readonly status: number,
    module: string,
    message: string,
    options?: DomainErrorOptions
  ) {
    super(module, message, options);
  }
}

export type TargetError = TargetNotConfiguredError | TargetFailedError;

/**
 * At least one target failed. `responses` holds the outcome of every
 * target, successes included, in request order.
 */
export class CompositePublishError extends PublishFailure {
  readonly code = 'COMPOSITE_PUBLISH_ERROR';
  readonly status = 503;

  constructor(readonly responses: readonly PublishOutcome[]) {
    const failedModules = responses.flatMap((outcome) => (outcome.type === 'error' ? [outcome.module] : []));
    super('publish', `Failed to create post via ${failedModules.join(', ')}.`);
  }

  override toJSON() {
    return { ...super.toJSON(), responses: this.responses };
  }
}

export type PublishError = PublishValidationError | CompositePublishError;
