/**
 * Discord mention parsing
 */

const USER_MENTION = /<@!?(\d+)>/g

/**
 * Extract user IDs from a string of mentions, in order of first appearance
 *
 * `"<@1> <@!2> <@1>"` yields `{ ids: ['1', '2'], duplicates: ['1'] }`.
 */
export function parseMentions(input: string): { ids: string[]; duplicates: string[] } {
  const ids: string[] = []
  const duplicates: string[] = []

  for (const match of input.matchAll(USER_MENTION)) {
    const id = match[1]
    if (id === undefined) continue
    if (ids.includes(id)) {
      if (!duplicates.includes(id)) duplicates.push(id)
      continue
    }
    ids.push(id)
  }

  return { ids, duplicates }
}
