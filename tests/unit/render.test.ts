/**
 * Prompt Rendering Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { composePrompt, renderTemplate } from '../../src/engine/render';
import { techniques } from '../fixtures';
import { buildTechnique } from '../helpers/test-data';

const context = { intent: 'code', client: 'vscode', mode: 'free', args: {} };

describe('renderTemplate', () => {
  it('fills slots, tolerating inner whitespace', () => {
    expect(renderTemplate('Hi {{ name }}, {{greeting}}', { name: 'Ann', greeting: 'welcome' })).toBe(
      'Hi Ann, welcome',
    );
  });

  it('renders unknown slots as empty and reports them once', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(renderTemplate('A{{missing}}B', {}, 'render-test.unknown')).toBe('AB');
    expect(renderTemplate('A{{missing}}B', {}, 'render-test.unknown')).toBe('AB');

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('[RENDER] Unknown slot {{missing}} in render-test.unknown');
  });
});

describe('composePrompt', () => {
  it('returns the base text when no technique applies', () => {
    expect(composePrompt('fix it', [], context)).toEqual({ prompt: 'fix it', steps: [] });
  });

  it('feeds each technique the previous output', () => {
    const composed = composePrompt('fix it', [techniques.clarify, techniques.steps], context);

    expect(composed.steps).toEqual([
      { technique_id: 't.clarify', output: 'Goal: code\nfix it' },
      { technique_id: 't.steps', output: 'Goal: code\nfix it\nThink step by step.' },
    ]);
    expect(composed.prompt).toBe('Goal: code\nfix it\nThink step by step.');
  });

  it('exposes command arguments as slots', () => {
    const composed = composePrompt('hello', [techniques.tone], { ...context, args: { tone: 'formal' } });
    expect(composed.prompt).toBe('hello\nTone: formal');
  });

  it('does not let arguments shadow built-in slots', () => {
    const echo = buildTechnique({ id: 'echo', template: '{{input}}|{{client}}' });
    const composed = composePrompt('real', [echo], { ...context, args: { input: 'fake', client: 'fake' } });
    expect(composed.prompt).toBe('real|vscode');
  });

  it('keeps the original text available to later techniques', () => {
    const wrap = buildTechnique({ id: 'wrap', template: '[{{input}}]' });
    const recall = buildTechnique({ id: 'recall', template: '{{input}} from {{original}}' });

    expect(composePrompt('x', [wrap, recall], context).prompt).toBe('[x] from x');
  });
});
