export {
  CompositePublishError,
  PublishFailure,
  PublishValidationError,
  TargetFailedError,
  TargetNotConfiguredError,
  type PublishError,
  type TargetError,
} from './errors.js';
export { FeedReader, type ListPostsOptions, type PresenceFilter } from './feed-reader.js';
export {
  MAX_CONTENT_LENGTH,
  PublishService,
  type BroadcastOptions,
  type PublishServiceOptions,
} from './publish-service.js';
export { NewPostMessageSchema, NewPostRequestSchema, parseNewPostRequest } from './schemas.js';
export { TargetRegistry, type ResolvedTarget } from './target-registry.js';
export { extractHashtags, FeedTarget, feedItemUri } from './targets/feed-target.js';
export type {
  NewPostMessage,
  NewPostRequest,
  PublishContext,
  PublishedMessage,
  PublishOutcome,
  PublishResponse,
  PublishTarget,
  TargetRequest,
} from './types.js';
