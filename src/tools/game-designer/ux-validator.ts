import type {
  GameMechanics,
  InteractionFlow,
  StoryContext,
  UiComponentSpec,
  UxValidation,
} from '../../contracts/schemas.js';
import { clamp, countKeywordMatches, getKeywordCatalog, mean, round1 } from '../../scoring/keywords.js';

export const MAX_INTERACTION_MINUTES = 10;

interface UxDesign {
  context: StoryContext;
  gameMechanics: GameMechanics;
  uiComponents: UiComponentSpec[];
  interactionFlows: InteractionFlow[];
}

/** 0-5.5, lower is lighter. Component count and interaction steps both contribute. */
export function cognitiveLoad(components: UiComponentSpec[], flows: InteractionFlow[]): number {
  const steps = flows.reduce((sum, flow) => sum + flow.user_actions.length, 0);
  return Math.min(components.length / 5, 3) + Math.min(steps / 3, 2.5);
}

function complexityLevel(load: number): UxValidation['ui_complexity_level'] {
  if (load <= 4) return 'simple';
  if (load <= 5) return 'moderate';
  return 'complex';
}

/**
 * DNA review of a UX design on a 1-5 scale: time respect from interaction
 * time and cognitive load, pedagogical value from mechanic coverage,
 * tone from component wording.
 */
export function validateUxDesign(design: UxDesign): UxValidation {
  const issues: string[] = [];

  // Time respect
  const load = cognitiveLoad(design.uiComponents, design.interactionFlows);
  const level = complexityLevel(load);
  const minutes = round1(design.interactionFlows.reduce((sum, f) => sum + f.estimated_seconds, 0) / 60);
  const withinTime = minutes <= MAX_INTERACTION_MINUTES;

  if (!withinTime) {
    issues.push(`Estimated interaction time ${minutes} minutes exceeds ${MAX_INTERACTION_MINUTES} minutes`);
  }
  if (level === 'complex') {
    issues.push('UI complexity too high for the time budget');
  }
  const timeScore = withinTime ? 5 - load / 4 : 2;

  // Pedagogical value
  const covered = design.gameMechanics.learning_objectives_addressed.filter(objective =>
    design.gameMechanics.mechanics.some(m => m.objective === objective)
  );
  const coverage =
    design.gameMechanics.learning_objectives_addressed.length > 0
      ? covered.length / design.gameMechanics.learning_objectives_addressed.length
      : 0;
  const pedagogicalCompliant = coverage === 1 && design.gameMechanics.pedagogical_effectiveness_score >= 3;

  if (coverage < 1) {
    issues.push('Not every learning objective is addressed by a game mechanic');
  }

  // Professional tone
  const wording = design.uiComponents.map(c => `${c.label} ${c.purpose}`).join(' ');
  const unprofessional = countKeywordMatches(wording, getKeywordCatalog().content.unprofessional);
  const unlabeled = design.uiComponents.filter(c => c.label.trim().length === 0).length;
  const toneScore = clamp(5 - 2 * unprofessional - unlabeled, 1, 5);

  if (unprofessional > 0) {
    issues.push(`Component wording contains ${unprofessional} informal terms`);
  }
  if (unlabeled > 0) {
    issues.push(`${unlabeled} components have no label`);
  }

  const timeCompliant = withinTime && level !== 'complex';
  const toneCompliant = toneScore >= 4;

  return {
    overall_dna_compliant: timeCompliant && pedagogicalCompliant && toneCompliant,
    dna_compliance_score: round1(
      mean([timeScore, design.gameMechanics.pedagogical_effectiveness_score * coverage, toneScore])
    ),
    time_respect_compliant: timeCompliant,
    pedagogical_value_compliant: pedagogicalCompliant,
    professional_tone_compliant: toneCompliant,
    ui_complexity_level: level,
    estimated_interaction_minutes: minutes,
    issues,
  };
}
