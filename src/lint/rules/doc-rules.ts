import { findBrokenLinks } from '../../docs/links.js'
import type { Rule } from '../types.js'

export const docBrokenLink: Rule = {
  id: 'doc/broken-link',
  category: 'doc',
  description: 'Relative links in Markdown point at files that exist',
  defaultSeverity: 'error',
  check(ws) {
    return ws.docs.flatMap((doc) =>
      findBrokenLinks(ws.config.root, doc.path, doc.content).map((link) => ({
        message: `broken link: ${link.target}`,
        file: doc.path,
        line: link.line,
      })),
    )
  },
}

export const docRules: Rule[] = [docBrokenLink]
