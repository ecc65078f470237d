export { extractInteractions } from './extract.js'
export { aggregateEdges, buildInteractionNetwork } from './aggregate.js'
export {
  commentRowSchema,
  parseComments,
  parseParentRef,
  parsePosts,
  postRowSchema
} from './schema.js'
export { NetworkErrorCode, makeNetworkError } from './errors.js'
export { EDGE_COLUMNS } from './types.js'
export type {
  Comment,
  Edge,
  InteractionType,
  ParentType,
  Post,
  RawInteraction
} from './types.js'
export type { NetworkError } from './errors.js'
