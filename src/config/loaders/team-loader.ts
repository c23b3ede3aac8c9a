import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import matter from 'gray-matter';

import { ConfigurationError, errorMessage } from '../../errors.js';
import {
  TeamManifestSchema,
  TeamMemberFrontmatterSchema,
  type TeamManifest,
} from '../schemas/team.schema.js';

/** Presets shipped with the package */
export const DEFAULT_PRESETS_DIR = fileURLToPath(new URL('../../../presets/', import.meta.url));

const MANIFEST_FILE = 'teams.json';

export interface TeamMemberPreset {
  name: string;
  role: string;
  basePrompt: string;
  toolNames?: string[];
  path: string;
}

export interface TeamPreset {
  id: string;
  description: string;
  maxMessages: number;
  members: TeamMemberPreset[];
}

/**
 * Load and validate the team manifest
 * @param presetsDir - Directory containing teams.json
 */
export function loadTeamManifest(presetsDir: string = DEFAULT_PRESETS_DIR): TeamManifest {
  const manifestPath = resolve(presetsDir, MANIFEST_FILE);

  if (!existsSync(manifestPath)) {
    throw new ConfigurationError(`Team manifest not found: ${manifestPath}`, manifestPath);
  }

  try {
    const data: unknown = JSON.parse(readFileSync(manifestPath, 'utf-8'));
    return TeamManifestSchema.parse(data);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to load team manifest from ${manifestPath}: ${errorMessage(error)}`,
      manifestPath,
      { cause: error },
    );
  }
}

/**
 * Load a single team member from its markdown file
 */
export function loadTeamMember(memberPath: string, basePath: string): TeamMemberPreset {
  const fullPath = resolve(basePath, memberPath);

  if (!existsSync(fullPath)) {
    throw new ConfigurationError(`Team member file not found: ${fullPath}`, fullPath);
  }

  try {
    const { data, content } = matter(readFileSync(fullPath, 'utf-8'));
    const frontmatter = TeamMemberFrontmatterSchema.parse(data);

    return {
      name: frontmatter.name,
      role: frontmatter.role,
      basePrompt: content.trim(),
      ...(frontmatter.tools ? { toolNames: frontmatter.tools } : {}),
      path: fullPath,
    };
  } catch (error) {
    throw new ConfigurationError(
      `Failed to load team member from ${fullPath}: ${errorMessage(error)}`,
      fullPath,
      { cause: error },
    );
  }
}

export function listTeamPresets(presetsDir: string = DEFAULT_PRESETS_DIR): string[] {
  return Object.keys(loadTeamManifest(presetsDir).teams);
}

/**
 * Load a team preset with its members in turn order
 * @throws ConfigurationError for an unknown team id or an invalid member file
 */
export function loadTeamPreset(teamId: string, presetsDir: string = DEFAULT_PRESETS_DIR): TeamPreset {
  const manifest = loadTeamManifest(presetsDir);
  const entry = manifest.teams[teamId];

  if (!entry) {
    const known = Object.keys(manifest.teams).join(', ');
    throw new ConfigurationError(`Unknown team "${teamId}". Available teams: ${known}`);
  }

  return {
    id: teamId,
    description: entry.description,
    maxMessages: entry.maxMessages,
    members: entry.members.map((memberPath) => loadTeamMember(memberPath, presetsDir)),
  };
}
