import { z } from 'zod';

/**
 * Team manifest (presets/teams.json): team id → members in turn order
 */
export const TeamEntrySchema = z.object({
  description: z.string().default(''),
  maxMessages: z.number().int().positive(),
  members: z.array(z.string().min(1)).min(1),
});

export const TeamManifestSchema = z.object({
  version: z.number().int().positive().default(1),
  teams: z.record(z.string().min(1), TeamEntrySchema),
});

/**
 * Frontmatter of a team member markdown file; the body is the base prompt
 */
export const TeamMemberFrontmatterSchema = z.object({
  name: z.string().min(1),
  role: z.string().min(1),
  tools: z.array(z.string().min(1)).optional(),
});

export type TeamEntry = z.infer<typeof TeamEntrySchema>;
export type TeamManifest = z.infer<typeof TeamManifestSchema>;
export type TeamMemberFrontmatter = z.infer<typeof TeamMemberFrontmatterSchema>;
