import fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const KeywordMapSchema = z.record(z.string());

const KeywordCatalogSchema = z.object({
  dna: z.object({
    learning: z.array(z.string()),
    assessment: z.array(z.string()),
    application: z.array(z.string()),
    policy: z.array(z.string()),
    practice: z.array(z.string()),
    bridge: z.array(z.string()),
    efficiency: z.array(z.string()),
    time: z.array(z.string()),
    systems: z.array(z.string()),
    perspective: z.array(z.string()),
    impact: z.array(z.string()),
    organizational: z.array(z.string()),
    professional: z.array(z.string()),
    inclusive: z.array(z.string()),
    educational: z.array(z.string()),
    database_direct: z.array(z.string()),
    api: z.array(z.string()),
    session: z.array(z.string()),
    mixed_concerns: z.array(z.string()),
    simplicity: z.array(z.string()),
    complexity: z.array(z.string()),
  }),
  content: z.object({
    professional: z.array(z.string()),
    unprofessional: z.array(z.string()),
    learning: z.array(z.string()),
    interactive: z.array(z.string()),
    feedback: z.array(z.string()),
    policy: z.array(z.string()),
  }),
  test_optimizer: z.object({
    business_impact: z.array(z.string()),
    complexity_indicators: z.array(z.string()),
  }),
  story: z.object({
    components: KeywordMapSchema,
    animations: KeywordMapSchema,
    endpoints: KeywordMapSchema,
    business_logic: KeywordMapSchema,
    external_apis: KeywordMapSchema,
  }),
});

export type KeywordCatalog = z.infer<typeof KeywordCatalogSchema>;

const CATALOG_PATH = fileURLToPath(new URL('../../data/keywords.json', import.meta.url));

let catalog: KeywordCatalog | null = null;

export function getKeywordCatalog(): KeywordCatalog {
  if (!catalog) {
    const raw: unknown = JSON.parse(fs.readFileSync(CATALOG_PATH, 'utf-8'));
    catalog = KeywordCatalogSchema.parse(raw);
  }
  return catalog;
}

/** Number of keywords that occur in text (case-insensitive substring match). */
export function countKeywordMatches(text: string, keywords: readonly string[]): number {
  const haystack = text.toLowerCase();
  return keywords.filter(keyword => haystack.includes(keyword)).length;
}

export function containsAny(text: string, keywords: readonly string[]): boolean {
  return countKeywordMatches(text, keywords) > 0;
}

/** Values of a keyword map whose key occurs in text, first occurrence order, deduplicated. */
export function matchKeywordMap(text: string, map: Readonly<Record<string, string>>): string[] {
  const haystack = text.toLowerCase();
  const matched: string[] = [];
  for (const [keyword, value] of Object.entries(map)) {
    if (haystack.includes(keyword) && !matched.includes(value)) {
      matched.push(value);
    }
  }
  return matched;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function mean(values: readonly number[]): number {
  return values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;
}
