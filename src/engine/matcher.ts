/**
 * Technique Matcher
 *
 * Scores each technique a pipeline declares and keeps those at or above the
 * pipeline threshold, in the pipeline's declared order (never re-sorted by
 * score: declaration order is composition order).
 */

import type { MatchRule, Pipeline, Technique } from './types';

export interface MatchFeatures {
  text: string;
  intent: string;
  /** Slash commands present on the input, lowercase, without "/" */
  commands: ReadonlySet<string>;
}

export type MatchPredicate = (features: MatchFeatures) => number;

export interface TechniqueScore {
  technique_id: string;
  score: number;
  included: boolean;
}

export interface MatchResult {
  techniques: Technique[];
  scores: TechniqueScore[];
}

interface CompiledTechnique {
  technique: Technique;
  predicate: MatchPredicate;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function round(score: number): number {
  return Math.round(score * 10_000) / 10_000;
}

/**
 * always → 1; an alias command on the input → 1; otherwise
 * intent_weight·[intent listed] + keyword_weight·(hits / keywords), clamped to [0,1].
 */
export function compilePredicate(rule: MatchRule): MatchPredicate {
  if (rule.always) return () => 1;

  const intents = new Set(rule.intents);
  const aliases = rule.aliases.map((alias) => alias.toLowerCase());
  const keywords = rule.keywords.map((keyword) => new RegExp(`\\b${escapeRegExp(keyword)}\\b`, 'i'));

  return ({ text, intent, commands }) => {
    if (aliases.some((alias) => commands.has(alias))) return 1;

    const intentScore = intents.has(intent) ? 1 : 0;
    const keywordScore =
      keywords.length > 0 ? keywords.filter((pattern) => pattern.test(text)).length / keywords.length : 0;

    const score = rule.weights.intent * intentScore + rule.weights.keyword * keywordScore;
    return round(Math.min(1, Math.max(0, score)));
  };
}

export class TechniqueMatcher {
  private readonly compiled = new Map<string, CompiledTechnique>();

  constructor(techniques: Iterable<Technique>) {
    for (const technique of techniques) {
      this.compiled.set(technique.id, { technique, predicate: compilePredicate(technique.match) });
    }
  }

  get(techniqueId: string): Technique | undefined {
    return this.compiled.get(techniqueId)?.technique;
  }

  match(text: string, intent: string, pipeline: Pipeline, commands: Iterable<string> = []): MatchResult {
    const features: MatchFeatures = { text, intent, commands: new Set(commands) };
    const techniques: Technique[] = [];
    const scores: TechniqueScore[] = [];

    for (const techniqueId of pipeline.technique_ids) {
      const entry = this.compiled.get(techniqueId);
      if (!entry) {
        // Catalog validation rejects unknown ids; a stale reference is skipped
        console.warn(`[MATCHER] Pipeline ${pipeline.id} references unknown technique ${techniqueId}`);
        continue;
      }

      const score = entry.predicate(features);
      const included = score >= pipeline.threshold;
      scores.push({ technique_id: techniqueId, score, included });
      if (included) techniques.push(entry.technique);
    }

    return { techniques, scores };
  }
}
