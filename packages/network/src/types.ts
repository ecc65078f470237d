export type ParentType = 'post' | 'comment'

export type InteractionType = 'comment_on_post' | 'reply_to_comment'

export type Post = {
  post_id: string
  author_id: string | null
}

export type Comment = {
  comment_id: string
  author_id: string | null
  parent_id: string
  parent_type: ParentType
  created_utc: number
  post_id?: string | null
}

export type RawInteraction = {
  from_user_id: string
  to_user_id: string
  interaction_type: InteractionType
  timestamp: number
  comment_id: string
  post_id: string | null
}

export type Edge = {
  from_user_id: string
  to_user_id: string
  interaction_type: InteractionType
  weight: number
  first_interaction: number
}

export const EDGE_COLUMNS = [
  'from_user_id',
  'to_user_id',
  'interaction_type',
  'weight',
  'first_interaction'
] as const satisfies ReadonlyArray<keyof Edge>
