import { ARCHITECTURE_PRINCIPLES, DESIGN_PRINCIPLES } from '../../contracts/schemas.js';
import type {
  ArchitectureCompliance,
  ArchitecturePrinciple,
  DesignPrinciple,
  DesignPrinciplesValidation,
  FeatureRequestPayload,
} from '../../contracts/schemas.js';
import { containsAny, countKeywordMatches, getKeywordCatalog, mean, round1 } from '../../scoring/keywords.js';
import type { ScoreResult } from '../../scoring/types.js';
import { DNAComplianceError, errorMessage } from '../../errors/types.js';
import { logger } from '../../observability/logger.js';

export type DnaFeatureInput = Pick<
  FeatureRequestPayload,
  'feature_description' | 'learning_objectives' | 'user_persona' | 'time_constraint_minutes' | 'acceptance_criteria'
>;

export interface DnaAnalysis {
  compliant: boolean;
  compliance_score: number;
  design_principles_analysis: Record<DesignPrinciple, ScoreResult<DesignPrinciple>>;
  architecture_principles_analysis: Record<ArchitecturePrinciple, ScoreResult<ArchitecturePrinciple>>;
  design_principles_validation: DesignPrinciplesValidation;
  architecture_compliance: ArchitectureCompliance;
  violations: string[];
  recommendations: string[];
  analyzed_at: string;
}

export const MINIMUM_COMPLIANCE_SCORE = 70;

const VIOLATION_RECOMMENDATIONS: Record<DesignPrinciple | ArchitecturePrinciple, string> = {
  pedagogical_value: 'Add explicit learning objectives and educational outcomes',
  policy_to_practice: 'Strengthen connection between theory and practical application',
  time_respect: 'Reduce scope or improve efficiency to meet 10-minute constraint',
  holistic_thinking: 'Consider broader organizational and systemic impacts',
  professional_tone: 'Adjust language for professional public sector audience',
  api_first: 'Ensure all data access goes through API endpoints',
  stateless_backend: 'Remove server-side state dependencies',
  separation_of_concerns: 'Clearly separate frontend and backend responsibilities',
  simplicity_first: 'Simplify feature scope and implementation approach',
};

function result<P extends string>(
  principle: P,
  score: number,
  threshold: number,
  evidence: string[],
  issues: string[],
  recommendation: string
): ScoreResult<P> {
  return { principle, score, compliant: score >= threshold, evidence, issues, recommendation };
}

// ─── Design principles ───────────────────────────────────

function validatePedagogicalValue(description: string, objectives: string[]): ScoreResult<'pedagogical_value'> {
  const { dna } = getKeywordCatalog();
  const evidence: string[] = [];
  const issues: string[] = [];
  let score = 0;

  const matches = countKeywordMatches(description, dna.learning);
  if (matches >= 3) {
    score += 30;
    evidence.push(`Contains ${matches} learning-related terms`);
  } else if (matches >= 1) {
    score += 15;
    evidence.push(`Contains ${matches} learning-related terms`);
  } else {
    issues.push('No clear learning-related terminology found');
  }

  if (objectives.length > 0) {
    score += 40;
    evidence.push(`Includes ${objectives.length} explicit learning objectives`);
  } else {
    issues.push('No explicit learning objectives specified');
  }

  if (containsAny(description, dna.assessment)) {
    score += 20;
    evidence.push('Includes assessment or evaluation elements');
  }

  if (containsAny(description, dna.application)) {
    score += 10;
    evidence.push('Includes practical application elements');
  }

  const recommendation =
    score >= 80
      ? 'Strong pedagogical value - maintain focus on learning outcomes'
      : score >= 60
        ? 'Good pedagogical foundation - consider adding more explicit learning objectives'
        : 'Strengthen pedagogical value by adding clear learning objectives and educational outcomes';

  return result('pedagogical_value', Math.min(score, 100), 60, evidence, issues, recommendation);
}

function validatePolicyToPractice(description: string, objectives: string[]): ScoreResult<'policy_to_practice'> {
  const { dna } = getKeywordCatalog();
  const evidence: string[] = [];
  const issues: string[] = [];
  let score = 0;

  const policyMatches = countKeywordMatches(description, dna.policy);
  if (policyMatches >= 2) {
    score += 25;
    evidence.push(`References ${policyMatches} policy/theory concepts`);
  } else if (policyMatches >= 1) {
    score += 15;
    evidence.push(`References ${policyMatches} policy/theory concepts`);
  }

  const practiceMatches = countKeywordMatches(description, dna.practice);
  if (practiceMatches >= 2) {
    score += 25;
    evidence.push(`Includes ${practiceMatches} practical application elements`);
  } else if (practiceMatches >= 1) {
    score += 15;
    evidence.push(`Includes ${practiceMatches} practical application elements`);
  }

  if (containsAny(description, dna.bridge)) {
    score += 30;
    evidence.push('Includes language that bridges theory and practice');
  }

  const objectivesText = objectives.join(' ');
  if (containsAny(objectivesText, dna.policy) && containsAny(objectivesText, dna.practice)) {
    score += 20;
    evidence.push('Learning objectives connect policy and practice');
  }

  if (score < 40) {
    issues.push('Limited connection between policy/theory and practical application');
  }

  const recommendation =
    score >= 80
      ? 'Excellent connection between policy and practice'
      : score >= 50
        ? 'Good policy-practice connection - consider adding more practical examples'
        : 'Strengthen connection between policy/theory and practical workplace application';

  return result('policy_to_practice', Math.min(score, 100), 50, evidence, issues, recommendation);
}

function validateTimeRespect(description: string, minutes: number): ScoreResult<'time_respect'> {
  const { dna } = getKeywordCatalog();
  const evidence: string[] = [];
  const issues: string[] = [];
  let score = 0;

  if (minutes <= 10) {
    score += 50;
    evidence.push(`Respects 10-minute constraint (${minutes} minutes)`);
  } else if (minutes <= 15) {
    score += 30;
    evidence.push(`Reasonable time constraint (${minutes} minutes)`);
    issues.push('Time constraint exceeds recommended 10 minutes');
  } else {
    score += 10;
    issues.push(`Time constraint too long (${minutes} minutes), exceeds recommended 10 minutes`);
  }

  const efficiencyMatches = countKeywordMatches(description, dna.efficiency);
  if (efficiencyMatches >= 2) {
    score += 30;
    evidence.push(`Emphasizes efficiency (${efficiencyMatches} related terms)`);
  } else if (efficiencyMatches >= 1) {
    score += 15;
    evidence.push(`Mentions efficiency (${efficiencyMatches} related terms)`);
  }

  if (containsAny(description, dna.time)) {
    score += 20;
    evidence.push('Shows awareness of time constraints');
  }

  const recommendation =
    minutes > 15
      ? `Reduce scope significantly - ${minutes} minutes exceeds 10-minute target`
      : minutes > 10
        ? `Consider reducing scope to meet 10-minute target (currently ${minutes} minutes)`
        : 'Good time management - maintain focus on efficiency';

  return result('time_respect', Math.min(score, 100), 70, evidence, issues, recommendation);
}

function validateHolisticThinking(description: string, criteria: string[]): ScoreResult<'holistic_thinking'> {
  const { dna } = getKeywordCatalog();
  const evidence: string[] = [];
  const issues: string[] = [];
  let score = 0;

  const systemsMatches = countKeywordMatches(description, dna.systems);
  if (systemsMatches >= 3) {
    score += 30;
    evidence.push(`Shows systems thinking (${systemsMatches} related terms)`);
  } else if (systemsMatches >= 1) {
    score += 15;
    evidence.push(`Some systems thinking (${systemsMatches} related terms)`);
  }

  if (containsAny(description, dna.perspective)) {
    score += 25;
    evidence.push('Considers multiple perspectives');
  }

  const impactMatches = countKeywordMatches(description, dna.impact);
  if (impactMatches >= 2) {
    score += 25;
    evidence.push(`Shows impact awareness (${impactMatches} related terms)`);
  } else if (impactMatches >= 1) {
    score += 15;
    evidence.push(`Some impact awareness (${impactMatches} related terms)`);
  }

  if (containsAny(description, dna.organizational)) {
    score += 20;
    evidence.push('Considers organizational context');
  }

  if (containsAny(criteria.join(' '), [...dna.systems, ...dna.perspective])) {
    score += 10;
    evidence.push('Acceptance criteria include holistic elements');
  }

  if (score < 50) {
    issues.push('Limited evidence of holistic thinking and systems perspective');
  }

  const recommendation =
    score >= 80
      ? 'Strong systems thinking and holistic perspective'
      : score >= 60
        ? 'Good holistic thinking - consider broader organizational impacts'
        : 'Expand perspective to include organizational context and systemic impacts';

  return result('holistic_thinking', Math.min(score, 100), 60, evidence, issues, recommendation);
}

function validateProfessionalTone(description: string, persona: string): ScoreResult<'professional_tone'> {
  const { dna } = getKeywordCatalog();
  const evidence: string[] = [];
  const issues: string[] = [];
  let score = 0;

  const professionalMatches = countKeywordMatches(description, dna.professional);
  if (professionalMatches >= 3) {
    score += 30;
    evidence.push(`Uses professional terminology (${professionalMatches} terms)`);
  } else if (professionalMatches >= 1) {
    score += 20;
    evidence.push(`Some professional terminology (${professionalMatches} terms)`);
  }

  if (persona.toLowerCase() === 'anna') {
    const words = description.split(/\s+/).filter(word => word.length > 0);
    if (words.length > 0) {
      const ratio = words.filter(word => word.length > 8).length / words.length;
      if (ratio >= 0.1 && ratio <= 0.3) {
        score += 25;
        evidence.push('Appropriate complexity level for Anna persona');
      } else if (ratio > 0.3) {
        score += 10;
        issues.push('May be too complex for target audience');
      } else {
        score += 15;
        evidence.push('Simple language appropriate for accessibility');
      }
    }
  }

  if (containsAny(description, dna.inclusive)) {
    score += 20;
    evidence.push('Uses inclusive language');
  }

  const educationalMatches = countKeywordMatches(description, dna.educational);
  if (educationalMatches >= 2) {
    score += 25;
    evidence.push(`Maintains educational tone (${educationalMatches} terms)`);
  } else if (educationalMatches >= 1) {
    score += 15;
    evidence.push(`Some educational tone (${educationalMatches} terms)`);
  }

  const recommendation =
    score >= 80
      ? 'Excellent professional tone for target audience'
      : score >= 70
        ? 'Good professional tone - ensure accessibility for all users'
        : 'Adjust language to be more professional and appropriate for public sector audience';

  return result('professional_tone', Math.min(score, 100), 70, evidence, issues, recommendation);
}

// ─── Architecture principles ─────────────────────────────

function validateApiFirst(description: string): ScoreResult<'api_first'> {
  const { dna } = getKeywordCatalog();
  const evidence = ['Feature will follow API-first architecture'];
  const issues: string[] = [];
  let score = 80;

  if (containsAny(description, dna.database_direct)) {
    score -= 30;
    issues.push('Feature may bypass API layer');
  }

  if (containsAny(description, dna.api)) {
    score += 20;
    evidence.push('Explicitly mentions API components');
  }

  return result('api_first', Math.min(score, 100), 70, evidence, issues, 'Ensure all data access goes through API layer');
}

function validateStatelessBackend(description: string): ScoreResult<'stateless_backend'> {
  const { dna } = getKeywordCatalog();
  const issues: string[] = [];
  let score = 80;

  const mentions = countKeywordMatches(description, dna.session);
  if (mentions >= 2) {
    score -= 20;
    issues.push('Feature may require server-side state management');
  } else if (mentions === 1) {
    score -= 10;
    issues.push('Consider stateless alternatives for any state management');
  }

  return result(
    'stateless_backend',
    score,
    70,
    ['Feature will follow stateless backend design'],
    issues,
    'Ensure all state is managed client-side or via API parameters'
  );
}

function validateSeparationOfConcerns(description: string): ScoreResult<'separation_of_concerns'> {
  const { dna } = getKeywordCatalog();
  const issues: string[] = [];
  let score = 80;

  if (containsAny(description, dna.mixed_concerns)) {
    score -= 20;
    issues.push('Feature may mix frontend and backend concerns');
  }

  return result(
    'separation_of_concerns',
    score,
    70,
    ['Feature will maintain separation between frontend and backend'],
    issues,
    'Keep frontend and backend completely separate'
  );
}

function validateSimplicityFirst(description: string, criteria: string[]): ScoreResult<'simplicity_first'> {
  const { dna } = getKeywordCatalog();
  const evidence: string[] = [];
  const issues: string[] = [];
  let score = 70;

  const simplicityMatches = countKeywordMatches(description, dna.simplicity);
  if (simplicityMatches >= 2) {
    score += 20;
    evidence.push(`Emphasizes simplicity (${simplicityMatches} terms)`);
  } else if (simplicityMatches >= 1) {
    score += 10;
    evidence.push(`Mentions simplicity (${simplicityMatches} terms)`);
  }

  const complexityMatches = countKeywordMatches(description, dna.complexity);
  if (complexityMatches >= 3) {
    score -= 30;
    issues.push(`High complexity indicators (${complexityMatches} terms)`);
  } else if (complexityMatches >= 1) {
    score -= 10;
    issues.push(`Some complexity indicators (${complexityMatches} terms)`);
  }

  if (criteria.length > 10) {
    score -= 15;
    issues.push('Large number of acceptance criteria may indicate complexity');
  } else if (criteria.length <= 5) {
    score += 10;
    evidence.push('Focused set of acceptance criteria');
  }

  const recommendation =
    score >= 80
      ? 'Good focus on simplicity - maintain lean approach'
      : score >= 60
        ? 'Consider simplifying scope and implementation approach'
        : 'Significantly reduce scope and complexity';

  return result('simplicity_first', score, 60, evidence, issues, recommendation);
}

// ─── Aggregation ─────────────────────────────────────────

/** 60% design average, 40% architecture average, one decimal. */
export function calculateComplianceScore(
  design: Record<DesignPrinciple, ScoreResult>,
  architecture: Record<ArchitecturePrinciple, ScoreResult>
): number {
  const designAverage = mean(DESIGN_PRINCIPLES.map(p => design[p].score));
  const architectureAverage = mean(ARCHITECTURE_PRINCIPLES.map(p => architecture[p].score));
  return round1(designAverage * 0.6 + architectureAverage * 0.4);
}

function identifyViolations(
  design: Record<DesignPrinciple, ScoreResult>,
  architecture: Record<ArchitecturePrinciple, ScoreResult>
): { violations: string[]; violated: (DesignPrinciple | ArchitecturePrinciple)[] } {
  const violations: string[] = [];
  const violated: (DesignPrinciple | ArchitecturePrinciple)[] = [];

  for (const principle of DESIGN_PRINCIPLES) {
    if (!design[principle].compliant) {
      violations.push(`Design principle violation: ${principle}`);
      violated.push(principle);
    }
  }
  for (const principle of ARCHITECTURE_PRINCIPLES) {
    if (!architecture[principle].compliant) {
      violations.push(`Architecture principle violation: ${principle}`);
      violated.push(principle);
    }
  }

  return { violations, violated };
}

function runAnalysis(feature: DnaFeatureInput): DnaAnalysis {
  const description = feature.feature_description.toLowerCase();
  const objectives = feature.learning_objectives;
  const criteria = feature.acceptance_criteria;

  const design: Record<DesignPrinciple, ScoreResult<DesignPrinciple>> = {
    pedagogical_value: validatePedagogicalValue(description, objectives),
    policy_to_practice: validatePolicyToPractice(description, objectives),
    time_respect: validateTimeRespect(description, feature.time_constraint_minutes),
    holistic_thinking: validateHolisticThinking(description, criteria),
    professional_tone: validateProfessionalTone(description, feature.user_persona),
  };

  const architecture: Record<ArchitecturePrinciple, ScoreResult<ArchitecturePrinciple>> = {
    api_first: validateApiFirst(description),
    stateless_backend: validateStatelessBackend(description),
    separation_of_concerns: validateSeparationOfConcerns(description),
    simplicity_first: validateSimplicityFirst(description, criteria),
  };

  const complianceScore = calculateComplianceScore(design, architecture);
  const { violations, violated } = identifyViolations(design, architecture);
  const recommendations =
    violated.length === 0
      ? ['Feature meets all DNA compliance requirements']
      : violated.map(principle => VIOLATION_RECOMMENDATIONS[principle]);

  return {
    compliant: violations.length === 0 && complianceScore >= MINIMUM_COMPLIANCE_SCORE,
    compliance_score: complianceScore,
    design_principles_analysis: design,
    architecture_principles_analysis: architecture,
    design_principles_validation: {
      pedagogical_value: design.pedagogical_value.compliant,
      policy_to_practice: design.policy_to_practice.compliant,
      time_respect: design.time_respect.compliant,
      holistic_thinking: design.holistic_thinking.compliant,
      professional_tone: design.professional_tone.compliant,
    },
    architecture_compliance: {
      api_first: architecture.api_first.compliant,
      stateless_backend: architecture.stateless_backend.compliant,
      separation_of_concerns: architecture.separation_of_concerns.compliant,
      simplicity_first: architecture.simplicity_first.compliant,
    },
    violations,
    recommendations,
    analyzed_at: new Date().toISOString(),
  };
}

/**
 * Scores a feature request against the five design and four architecture
 * principles. Design principles start at zero and earn points from
 * evidence; architecture principles start high and lose points on red flags.
 */
export function analyzeFeatureCompliance(feature: DnaFeatureInput): DnaAnalysis {
  try {
    const analysis = runAnalysis(feature);

    if (!analysis.compliant) {
      logger.warn('dna_analysis', `Feature failed DNA compliance: ${analysis.violations.length} violations`, {
        score: analysis.compliance_score,
        violations: analysis.violations,
      });
    }

    return analysis;
  } catch (error) {
    const message = errorMessage(error);
    logger.error('dna_analysis', 'DNA compliance analysis failed', { error: message });
    throw new DNAComplianceError(`Failed to analyze DNA compliance: ${message}`, 'project_manager', []);
  }
}
