/**
 * ASCII tree rendering of a pattern.
 * @packageDocumentation
 */

import type { InspectablePattern } from '../types'

const BRANCH = '├── '
const LAST_BRANCH = '└── '
const CONTINUATION = '│   '
const GAP = '    '

/**
 * A line of the tree: either a nested node or a scalar detail.
 */
type TreeEntry =
  | { readonly type: 'node'; readonly node: InspectablePattern }
  | { readonly type: 'detail'; readonly text: string }

/**
 * Render a pattern as a tree drawn with box-drawing connectors, followed by
 * its full regex text.
 *
 * @example
 * ```
 * Pattern Structure:
 * Sequence of patterns:
 * ├── Literal text: 'id-'
 * └── One or more times:
 *     └── Any digit (0-9)
 *
 * Regex: id\-(?:\d)+
 * ```
 *
 * @param pattern - Root of the tree to draw
 * @returns Multi-line diagram
 *
 * @public
 */
export function visualizePattern(pattern: InspectablePattern): string {
  const lines = ['Pattern Structure:', pattern.describe()]
  appendEntries(pattern, '', lines)
  lines.push('', `Regex: ${pattern.toRegex()}`)
  return lines.join('\n')
}

/**
 * Append the entries beneath a node, each prefixed by its connector.
 */
function appendEntries(node: InspectablePattern, prefix: string, lines: string[]): void {
  const entries = entriesOf(node)

  entries.forEach((entry, index) => {
    const isLast = index === entries.length - 1
    const connector = isLast ? LAST_BRANCH : BRANCH

    if (entry.type === 'detail') {
      lines.push(prefix + connector + entry.text)
      return
    }

    lines.push(prefix + connector + entry.node.describe())
    appendEntries(entry.node, prefix + (isLast ? GAP : CONTINUATION), lines)
  })
}

function entriesOf(node: InspectablePattern): TreeEntry[] {
  const details: TreeEntry[] = node.details().map((text) => ({ type: 'detail', text }))
  const children: TreeEntry[] = node.children().map((child) => ({ type: 'node', node: child }))
  return [...details, ...children]
}
