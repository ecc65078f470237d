export { loadConfig, loadLocalConfig } from './config.js'
export { createLogger } from './logger.js'
export { epochToIso, getDateRange, isWithinRange, parseDay } from './dates.js'
export { CollectorErrorCode, isCollectorError, makeCollectorError } from './errors.js'
export { createRedditClient, parseSortMethod, parseTimeFilter } from './reddit.js'
export { fetchCommentsFromPosts, fetchPosts, fetchUserInfo, flattenThread } from './collect.js'
export { DELETED_AUTHOR, toCommentRecord, toPostRecord, toUserRecord } from './records.js'
export {
  buildNetworkFromFiles,
  collectComments,
  collectNetwork,
  collectPosts,
  collectUsers,
  datasetFilename,
  runCollection
} from './pipeline.js'
export { commentRecordSchema, postRecordSchema, userRecordSchema } from './schema.js'
export { SORT_METHODS, TIME_FILTERS } from './types.js'
export type { LocalConfig } from './config.js'
export type { CollectorError } from './errors.js'
export type { RedditClient } from './reddit.js'
export type { Dataset, PipelineDeps } from './pipeline.js'
export type {
  CollectOptions,
  CollectorConfig,
  CommentRecord,
  DateRange,
  FetchFn,
  ListPostsOptions,
  LogLevel,
  Logger,
  PostRecord,
  RunSummary,
  SortMethod,
  TimeFilter,
  UserRecord
} from './types.js'
