/**
 * Prompt rendering
 *
 * Techniques are applied in order; each template's {{input}} is the output of
 * the previous technique (the base text for the first one).
 */

import type { Technique } from './types';

const SLOT = /\{\{\s*([\w.-]+)\s*\}\}/g;

const reportedUnknown = new Set<string>();

export interface RenderContext {
  intent: string;
  client: string;
  mode: string;
  /** Slash-command arguments */
  args: Record<string, string>;
}

export interface RenderStep {
  technique_id: string;
  output: string;
}

export interface ComposedPrompt {
  prompt: string;
  steps: RenderStep[];
}

/**
 * Replace {{slot}} placeholders. Unknown slots render as '' and are
 * reported once per template/slot pair.
 */
export function renderTemplate(template: string, slots: Record<string, string>, templateId = 'inline'): string {
  return template.replace(SLOT, (_match, name: string) => {
    if (Object.prototype.hasOwnProperty.call(slots, name)) {
      return slots[name];
    }
    const key = `${templateId}:${name}`;
    if (!reportedUnknown.has(key)) {
      reportedUnknown.add(key);
      console.warn(`[RENDER] Unknown slot {{${name}}} in ${templateId}`);
    }
    return '';
  });
}

export function composePrompt(base: string, techniques: readonly Technique[], context: RenderContext): ComposedPrompt {
  const steps: RenderStep[] = [];
  let input = base;

  for (const technique of techniques) {
    const slots: Record<string, string> = {
      ...context.args,
      input,
      original: base,
      intent: context.intent,
      client: context.client,
      mode: context.mode,
    };
    input = renderTemplate(technique.template, slots, technique.id).trim();
    steps.push({ technique_id: technique.id, output: input });
  }

  return { prompt: input, steps };
}
