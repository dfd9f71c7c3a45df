import type {
  ApprovalDecision,
  ClientCommunication,
  DeploymentReadiness,
  QualityAnalysis,
  QualityIssue,
} from '../contracts/schemas.js';

const QUALITY_CATEGORIES: Record<string, string> = {
  test_coverage: 'Testtäckning',
  performance: 'Prestanda',
  accessibility: 'Tillgänglighet (WCAG)',
  user_experience: 'Användarvänlighet',
  code_quality: 'Kodkvalitet',
  dna_compliance: 'Pedagogisk effektivitet och principer',
  overall_quality: 'Övergripande kvalitet',
};

const CHECK_NAMES: Record<string, string> = {
  performance: 'Prestanda',
  security: 'Säkerhet',
  accessibility: 'Tillgänglighet',
  dna_compliance: 'DNA-efterlevnad',
  test_coverage: 'Testtäckning',
  compatibility: 'Kompatibilitet',
};

export const APPROVED_LABEL = 'approved';
export const REWORK_LABEL = 'needs-rework';

function humanize(name: string): string {
  return name
    .split('_')
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

function categoryName(category: string): string {
  return QUALITY_CATEGORIES[category] ?? humanize(category);
}

function checkName(check: string): string {
  return CHECK_NAMES[check] ?? humanize(check);
}

/** STORY-GH-42 → "Funktionalitet GH-42" */
export function featureName(storyId: string): string {
  return storyId.startsWith('STORY-') ? `Funktionalitet ${storyId.slice(6)}` : storyId;
}

export function scoreLabel(score: number): string {
  return `score-${Math.floor(score / 10) * 10}`;
}

export function executiveSummary(score: number): string {
  if (score >= 90) {
    return `Funktionen har uppnått utmärkt kvalitet (${score.toFixed(1)}/100) och är redo för driftsättning.`;
  }
  if (score >= 80) {
    return `Funktionen har god kvalitet (${score.toFixed(1)}/100) med mindre förbättringsområden.`;
  }
  return `Funktionen behöver betydande förbättringar (${score.toFixed(1)}/100) innan driftsättning.`;
}

/** Working days: two per blocking issue, half a day per other issue. */
export function estimateFixTime(issues: QualityIssue[]): string {
  const blocking = issues.filter(i => i.blocking).length;
  const days = blocking * 2 + (issues.length - blocking) * 0.5;

  if (days <= 1) return '1';
  if (days <= 3) return '2-3';
  if (days <= 5) return '3-5';
  return '5+';
}

export function stagingTitle(storyId: string, score: number): string {
  return `Testversion redo: ${featureName(storyId)} (Kvalitet: ${score.toFixed(1)}/100)`;
}

export const TEST_INSTRUCTIONS = [
  'Logga in med dina testuppgifter',
  'Testa grundläggande användarflöden',
  'Kontrollera att funktionen fungerar som förväntat',
  'Rapportera eventuella problem direkt i detta ärende',
];

function statusMark(score: number): string {
  if (score >= 85) return '✅';
  if (score >= 70) return '⚠️';
  return '❌';
}

export function formatApprovalRequest(
  storyId: string,
  quality: QualityAnalysis,
  readiness: DeploymentReadiness,
  stagingUrl?: string
): string {
  const sections: string[] = [];

  sections.push('# Godkännande Begärs - Funktionen är Klar för Driftsättning');
  sections.push('');
  sections.push(`**Story ID:** ${storyId}`);
  sections.push(`**Övergripande Kvalitetspoäng:** ${quality.overall_score.toFixed(1)}/100`);
  sections.push(`**Driftsättningsberedskap:** ${readiness.readiness_score.toFixed(1)}/100`);
  sections.push('');
  sections.push(executiveSummary(quality.overall_score));
  sections.push('');

  sections.push('## Kvalitetssammanfattning');
  for (const [dimension, score] of Object.entries(quality.dimension_scores)) {
    sections.push(`- **${categoryName(dimension)}:** ${score.toFixed(1)}/100 ${statusMark(score)}`);
  }
  sections.push('');

  sections.push('## Regelefterlevnad & Säkerhet');
  for (const [check, result] of Object.entries(readiness.readiness_checks)) {
    sections.push(`- **${checkName(check)}:** ${result.passed ? '✅' : '❌'}`);
  }
  sections.push('');

  if (stagingUrl) {
    sections.push('## Testmiljö');
    sections.push(`**Staging URL:** ${stagingUrl}`);
    sections.push('');
    sections.push('### Testinstruktioner:');
    TEST_INSTRUCTIONS.forEach((step, i) => sections.push(`${i + 1}. ${step}`));
    sections.push('');
  }

  sections.push('## Rekommendation');
  sections.push('Kvalitetsgranskningen rekommenderar **GODKÄNNANDE** för driftsättning.');
  sections.push('');
  sections.push('---');
  sections.push('_Automatiskt genererad kvalitetsgranskning_');

  return sections.join('\n');
}

export function formatRejectionFeedback(
  storyId: string,
  quality: QualityAnalysis,
  decision: ApprovalDecision
): string {
  const sections: string[] = [];

  sections.push('# Kvalitetsgranskning - Förbättringar Krävs');
  sections.push('');
  sections.push(`**Story ID:** ${storyId}`);
  sections.push(`**Granskningsdatum:** ${decision.decided_at.slice(0, 16).replace('T', ' ')}`);
  sections.push('');

  sections.push('## Orsak till Avslag');
  sections.push(executiveSummary(quality.overall_score));
  sections.push('');

  if (decision.blocking_issues.length > 0) {
    sections.push('### Kritiska Problem (måste åtgärdas):');
    decision.blocking_issues.forEach(issue => sections.push(`- ❌ ${issue}`));
    sections.push('');
  }

  if (quality.quality_issues.length > 0) {
    sections.push('### Kvalitetsproblem per Kategori:');
    const byCategory = new Map<string, QualityIssue[]>();
    for (const issue of quality.quality_issues) {
      byCategory.set(issue.category, [...(byCategory.get(issue.category) ?? []), issue]);
    }
    for (const [category, issues] of byCategory) {
      sections.push(`#### ${categoryName(category)}:`);
      issues.forEach(issue => sections.push(`- ${issue.blocking ? '🔴' : '🟡'} ${issue.message}`));
    }
    sections.push('');
  }

  if (decision.recommendations.length > 0) {
    sections.push('## Rekommendationer för Förbättring');
    decision.recommendations.forEach((rec, i) => sections.push(`${i + 1}. ${rec}`));
    sections.push('');
  }

  sections.push('## Nästa Steg');
  sections.push('1. **Utvecklingsteamet** åtgärdar identifierade problem');
  sections.push('2. **Ny kvalitetsgranskning** begärs när förbättringarna är klara');
  sections.push('3. **Automatisk testning** körs för att verifiera förbättringar');
  sections.push('');
  sections.push('### Uppskattad Förbättringstid:');
  sections.push(`**${estimateFixTime(quality.quality_issues)} arbetsdagar**`);
  sections.push('');
  sections.push('---');
  sections.push('_Automatiskt genererad kvalitetsgranskning_');

  return sections.join('\n');
}

export function buildClientCommunication(
  storyId: string,
  quality: QualityAnalysis,
  readiness: DeploymentReadiness,
  decision: ApprovalDecision
): ClientCommunication {
  const score = quality.overall_score;

  if (decision.approved) {
    return {
      title: `Godkännande begärs: ${featureName(storyId)} (Kvalitetspoäng: ${score.toFixed(1)}/100)`,
      body: formatApprovalRequest(storyId, quality, readiness),
      labels: [APPROVED_LABEL, scoreLabel(score)],
    };
  }

  return {
    title: `Kvalitetsgranskning - Förbättringar krävs: ${featureName(storyId)}`,
    body: formatRejectionFeedback(storyId, quality, decision),
    labels: [REWORK_LABEL, scoreLabel(score)],
  };
}
