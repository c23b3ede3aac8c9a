import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import type { TeamPreset } from '../config/loaders/team-loader.js';
import { CapabilityUnavailable, DuplicateAgentError } from '../errors.js';
import { CapabilityRegistry } from '../tools/CapabilityRegistry.js';
import {
  createScriptedModelClient,
  createTestContext,
  type TestContext,
} from '../../tests/utils/factories/index.js';

import { AgentFactory } from './AgentFactory.js';

describe('AgentFactory', () => {
  let testContext: TestContext;
  let registry: CapabilityRegistry;
  let factory: AgentFactory;
  const modelClient = createScriptedModelClient();

  beforeEach(() => {
    testContext = createTestContext();
    registry = new CapabilityRegistry(testContext.context);
    registry.load([{ name: 'fs', command: 'npx', args: [], description: 'Files' }]);
    factory = new AgentFactory(testContext.context, registry);
  });

  afterEach(() => {
    testContext.cleanup();
  });

  it('binds the requested tools by reference, in order', () => {
    // When creating an agent with two tools
    const agent = factory.createAgent({
      name: 'Writer',
      role: 'Technical Writer',
      basePrompt: 'Write docs.',
      toolNames: ['writeFile', 'readFile'],
      modelClient,
    });

    // Then the bound tools should be the registry's own objects
    expect(agent.boundTools.map((tool) => tool.name)).toEqual(['writeFile', 'readFile']);
    expect(agent.boundTools[0]).toBe(registry.resolve('writeFile'));
    expect(agent.modelClient).toBe(modelClient);
  });

  it('binds every registered tool when none are requested', () => {
    const agent = factory.createAgent({
      name: 'Generalist',
      role: 'Helper',
      basePrompt: 'Help.',
      modelClient,
    });

    expect(agent.boundTools.map((tool) => tool.name)).toEqual(['readFile', 'writeFile', 'listFiles']);
  });

  it('composes the prompt with a catalog matching the bound tools', () => {
    // When creating an agent
    const agent = factory.createAgent({
      name: 'Reader',
      role: 'Reviewer',
      basePrompt: 'Review files.',
      toolNames: ['listFiles', 'readFile'],
      modelClient,
    });

    // Then the catalog should list the same tools in the same order
    expect(agent.systemPrompt).toContain(
      'Available tools:\n' +
        '1. listFiles(directory = "."): List the entries of a workspace directory\n' +
        '2. readFile(path): Read the contents of a file in the workspace',
    );
    expect(agent.systemPrompt.startsWith('Review files.\n\n')).toBe(true);
  });

  it('returns a frozen descriptor', () => {
    const agent = factory.createAgent({ name: 'A', role: 'r', basePrompt: 'p', toolNames: [], modelClient });

    expect(Object.isFrozen(agent)).toBe(true);
    expect(Object.isFrozen(agent.boundTools)).toBe(true);
    expect(agent.systemPrompt).toContain('Available tools: none');
  });

  it('fails fast on an unregistered tool and does not reserve the name', () => {
    // When requesting a tool the descriptor does not provide
    const create = () =>
      factory.createAgent({
        name: 'Scout',
        role: 'Searcher',
        basePrompt: 'Search.',
        toolNames: ['readFile', 'search'],
        modelClient,
      });

    // Then creation should fail and the name stay free
    expect(create).toThrow(CapabilityUnavailable);
    expect(
      factory.createAgent({
        name: 'Scout',
        role: 'Searcher',
        basePrompt: 'Search.',
        toolNames: ['readFile'],
        modelClient,
      }).name,
    ).toBe('Scout');
  });

  it('rejects duplicate agent names', () => {
    factory.createAgent({ name: 'Alice', role: 'r', basePrompt: 'p', modelClient });

    expect(() => factory.createAgent({ name: 'Alice', role: 'r2', basePrompt: 'p', modelClient })).toThrow(
      DuplicateAgentError,
    );
  });

  it('creates a team in preset order', () => {
    // Given a two-member preset
    const preset: TeamPreset = {
      id: 'pair',
      description: '',
      maxMessages: 4,
      members: [
        { name: 'Alice', role: 'Planner', basePrompt: 'Plan.', path: '/presets/alice.md' },
        {
          name: 'Bob',
          role: 'Builder',
          basePrompt: 'Build.',
          toolNames: ['writeFile'],
          path: '/presets/bob.md',
        },
      ],
    };

    // When creating the team
    const agents = factory.createTeam(preset, modelClient);

    // Then agents should follow the preset with their tool restrictions
    expect(agents.map((agent) => agent.name)).toEqual(['Alice', 'Bob']);
    expect(agents[0]?.boundTools).toHaveLength(3);
    expect(agents[1]?.boundTools.map((tool) => tool.name)).toEqual(['writeFile']);
  });
});
