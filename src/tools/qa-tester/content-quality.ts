import type { ContentQuality, StoryContext, UiComponentSpec } from '../../contracts/schemas.js';
import { clamp, countKeywordMatches, getKeywordCatalog, round1 } from '../../scoring/keywords.js';

export function collectContentText(context: StoryContext, components: UiComponentSpec[]): string {
  return [
    context.feature_description,
    ...context.acceptance_criteria,
    ...context.learning_objectives,
    ...components.map(c => c.label),
  ].join('\n');
}

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/** Terminology density lifts tone from a neutral 4; each informal term costs half a point. */
export function professionalToneScore(text: string): number {
  const { professional, unprofessional } = getKeywordCatalog().content;
  const words = Math.max(1, wordCount(text));
  const density = countKeywordMatches(text, professional) / words;

  return round1(clamp(4 + Math.min(1, density * 5) - 0.5 * countKeywordMatches(text, unprofessional), 1, 5));
}

export function pedagogicalScore(text: string): number {
  const { learning, interactive, feedback } = getKeywordCatalog().content;

  const score =
    2 +
    Math.min(2, countKeywordMatches(text, learning) * 0.5) +
    (countKeywordMatches(text, interactive) > 0 ? 0.5 : 0) +
    (countKeywordMatches(text, feedback) > 0 ? 0.5 : 0);

  return round1(clamp(score, 1, 5));
}

export function policyRelevanceScore(text: string): number {
  const matches = countKeywordMatches(text, getKeywordCatalog().content.policy);
  return round1(clamp(2 + matches * 0.75, 1, 5));
}

export function assessContentQuality(context: StoryContext, components: UiComponentSpec[]): ContentQuality {
  const text = collectContentText(context, components);

  return {
    professional_tone_score: professionalToneScore(text),
    pedagogical_score: pedagogicalScore(text),
    policy_relevance_score: policyRelevanceScore(text),
  };
}
