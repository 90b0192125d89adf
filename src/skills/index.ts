export { buildSkillMarkdown, createSkill, toTitleCase, type NewSkill } from './creator.js'
export { isRecord, parseFrontmatter, splitFrontmatter, type FrontmatterResult } from './frontmatter.js'
export { findSkills, parseSkillMentions } from './matcher.js'
export { SKILL_FILE_NAME, SkillScanner, buildEntry } from './scanner.js'
export {
  createSkillMetadataSchema,
  isValidSkillName,
  validateSkillMetadata,
  type MetadataIssue,
  type SkillMetadata,
} from './schema.js'
export type { SkillEntry, SkillMatch, SkillScan } from './types.js'
