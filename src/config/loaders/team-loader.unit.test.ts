/**
 * Unit tests for team-loader
 * Tests the shipped presets and loading from a custom presets directory
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { ConfigurationError } from '../../errors.js';

import { listTeamPresets, loadTeamManifest, loadTeamPreset } from './team-loader.js';

describe('shipped presets', () => {
  it('should list the research and development teams', () => {
    expect(listTeamPresets()).toEqual(['research', 'development']);
  });

  it('should load the research team in turn order', () => {
    // When loading the research preset
    const preset = loadTeamPreset('research');

    // Then members and limits should match the manifest
    expect(preset.id).toBe('research');
    expect(preset.maxMessages).toBe(20);
    expect(preset.members.map((member) => member.name)).toEqual([
      'Researcher',
      'Analyst',
      'TechnicalExpert',
      'Coordinator',
    ]);
    expect(preset.members[0]?.role).toBe('Research Specialist');
    expect(preset.members[0]?.basePrompt).toMatch(/^You are a research specialist agent\./);
  });

  it('should load the development team in turn order', () => {
    // When loading the development preset
    const preset = loadTeamPreset('development');

    // Then members and limits should match the manifest
    expect(preset.maxMessages).toBe(25);
    expect(preset.members.map((member) => member.name)).toEqual([
      'Developer',
      'Architect',
      'Tester',
      'DevOps',
    ]);
  });

  it('should bind every tool when a member lists none', () => {
    // Given the shipped presets
    const preset = loadTeamPreset('development');

    // Then no member should restrict its tools
    expect(preset.members.every((member) => member.toolNames === undefined)).toBe(true);
  });

  it('should reject an unknown team with the available ids', () => {
    expect(() => loadTeamPreset('marketing')).toThrow(ConfigurationError);
    expect(() => loadTeamPreset('marketing')).toThrow(
      'Unknown team "marketing". Available teams: research, development',
    );
  });
});

describe('custom presets directory', () => {
  let presetsDir: string;

  beforeEach(() => {
    presetsDir = mkdtempSync(join(tmpdir(), 'presets-test-'));
    mkdirSync(join(presetsDir, 'pair'));
  });

  afterEach(() => {
    rmSync(presetsDir, { recursive: true, force: true });
  });

  function writeManifest(teams: Record<string, unknown>): void {
    writeFileSync(join(presetsDir, 'teams.json'), JSON.stringify({ version: 1, teams }));
  }

  it('should read tool restrictions and trim the prompt body', () => {
    // Given a member with a tools list
    writeManifest({ pair: { maxMessages: 4, members: ['pair/writer.md'] } });
    writeFileSync(
      join(presetsDir, 'pair', 'writer.md'),
      '---\nname: Writer\nrole: Technical Writer\ntools: [writeFile, readFile]\n---\n\nWrite docs.\n\n',
    );

    // When loading the preset
    const preset = loadTeamPreset('pair', presetsDir);

    // Then the member should carry its tools and trimmed prompt
    expect(preset.description).toBe('');
    expect(preset.members).toEqual([
      {
        name: 'Writer',
        role: 'Technical Writer',
        basePrompt: 'Write docs.',
        toolNames: ['writeFile', 'readFile'],
        path: join(presetsDir, 'pair', 'writer.md'),
      },
    ]);
  });

  it('should fail when a member file lacks a role', () => {
    // Given frontmatter without role
    writeManifest({ pair: { maxMessages: 4, members: ['pair/writer.md'] } });
    writeFileSync(join(presetsDir, 'pair', 'writer.md'), '---\nname: Writer\n---\nWrite docs.\n');

    // When loading / Then it should fail with the member path
    expect(() => loadTeamPreset('pair', presetsDir)).toThrow(
      `Failed to load team member from ${join(presetsDir, 'pair', 'writer.md')}`,
    );
  });

  it('should fail when a member file is missing', () => {
    // Given a manifest pointing at a missing file
    writeManifest({ pair: { maxMessages: 4, members: ['pair/missing.md'] } });

    // When loading / Then it should fail
    expect(() => loadTeamPreset('pair', presetsDir)).toThrow(
      `Team member file not found: ${join(presetsDir, 'pair', 'missing.md')}`,
    );
  });

  it('should fail for a team without members', () => {
    // Given an empty member list
    writeManifest({ pair: { maxMessages: 4, members: [] } });

    // When loading the manifest / Then it should fail
    expect(() => loadTeamManifest(presetsDir)).toThrow(ConfigurationError);
  });

  it('should fail when the manifest is missing', () => {
    expect(() => loadTeamManifest(join(presetsDir, 'nowhere'))).toThrow(/Team manifest not found/);
  });
});
