import { extractInteractions } from './extract.js'
import type { Comment, Edge, Post, RawInteraction } from './types.js'

function edgeKey(interaction: RawInteraction): string {
  return JSON.stringify([
    interaction.from_user_id,
    interaction.to_user_id,
    interaction.interaction_type
  ])
}

function compareText(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

function compareEdges(a: Edge, b: Edge): number {
  return (
    compareText(a.from_user_id, b.from_user_id) ||
    compareText(a.to_user_id, b.to_user_id) ||
    compareText(a.interaction_type, b.interaction_type)
  )
}

/**
 * Collapses interactions sharing (from, to, type) into one weighted edge.
 * Edges come back sorted by source, target, then type.
 */
export function aggregateEdges(interactions: readonly RawInteraction[]): Edge[] {
  const groups = new Map<string, Edge>()
  for (const interaction of interactions) {
    const key = edgeKey(interaction)
    const edge = groups.get(key)
    if (edge) {
      edge.weight += 1
      edge.first_interaction = Math.min(edge.first_interaction, interaction.timestamp)
      continue
    }
    groups.set(key, {
      from_user_id: interaction.from_user_id,
      to_user_id: interaction.to_user_id,
      interaction_type: interaction.interaction_type,
      weight: 1,
      first_interaction: interaction.timestamp
    })
  }
  return [...groups.values()].sort(compareEdges)
}

export function buildInteractionNetwork(
  comments: readonly Comment[],
  posts: readonly Post[]
): Edge[] {
  return aggregateEdges(extractInteractions(comments, posts))
}
