import { describe, it, expect } from 'vitest';

import { COLLABORATION_INSTRUCTION, composePrompt, composeToolCatalog } from './prompt-composer.js';

const readFile = { usage: 'readFile(path)', description: 'Read the contents of a file in the workspace' };
const writeFile = { usage: 'writeFile(path, content)', description: 'Write a file' };

describe('composeToolCatalog', () => {
  it('numbers tools in binding order', () => {
    expect(composeToolCatalog([writeFile, readFile])).toBe(
      [
        'Available tools:',
        '1. writeFile(path, content): Write a file',
        '2. readFile(path): Read the contents of a file in the workspace',
      ].join('\n'),
    );
  });

  it('states when no tools are bound', () => {
    expect(composeToolCatalog([])).toBe('Available tools: none');
  });
});

describe('composePrompt', () => {
  it('joins base prompt, catalog and instruction with blank lines', () => {
    // Given a base prompt with surrounding whitespace
    const base = '\nYou are a research specialist.\n';

    // When composing with one tool
    const prompt = composePrompt(base, [readFile]);

    // Then the sections should appear in order
    expect(prompt.content).toBe(
      'You are a research specialist.\n\n' +
        'Available tools:\n1. readFile(path): Read the contents of a file in the workspace\n\n' +
        COLLABORATION_INSTRUCTION,
    );
    expect(prompt.parts.base).toBe('You are a research specialist.');
  });
});
