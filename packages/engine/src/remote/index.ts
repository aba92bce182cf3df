/**
 * Remote Module
 */

// Type-only exports
export type {
  RateSnapshot,
  RateResource,
  RemoteErrorCode,
  RemoteFailure,
  RemoteResult,
  RepositoryRef,
  RepositorySpec,
  RepositoryInfo,
  FileChange,
  MergedChange,
  IssueRef,
  CommitRef,
  DiscussionTarget,
  DiscussionRef,
  CommentRef,
  InvitationRef,
  PullRequestRef,
  RemoteClient,
  RemoteOperation,
} from './client.js';
export type { GitHubClientConfig } from './github-client.js';

// Value exports
export {
  REMOTE_CALL_COSTS,
  REMOTE_CALL_RESOURCES,
  RATE_RESOURCES,
  isRateResource,
  success, failure, withCoAuthorTrailers } from './client.js';
export { GitHubRemoteClient, parseRateHeaders, toRemoteFailure } from './github-client.js';
export { DryRunRemoteClient } from './dry-run-client.js';
