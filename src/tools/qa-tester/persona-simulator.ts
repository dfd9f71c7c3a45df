import type { AccessibilityAudit, ContentQuality, FlowResult, PersonaResult } from '../../contracts/schemas.js';
import { clamp, round1 } from '../../scoring/keywords.js';

export const DEFAULT_PERSONA = 'Anna';

export interface PersonaSession {
  persona: string;
  flows: FlowResult[];
  completionMinutes: number;
  timeLimitMinutes: number;
  accessibility: AccessibilityAudit;
  content: ContentQuality;
}

const BASE_SATISFACTION = 3.5;
const CONFUSION_PENALTY = 0.8;

/** Points where the persona stalls: failed flows, accessibility gaps and informal wording. */
export function confusionPoints(session: PersonaSession): string[] {
  const points = [
    ...session.flows.filter(f => !f.completed).map(f => `Could not finish ${f.flow}`),
    ...session.accessibility.violations.map(v => `Accessibility barrier: ${v}`),
  ];
  if (session.content.professional_tone_score < 4) {
    points.push('Wording does not match a professional setting');
  }
  return points;
}

function timeAdjustment(minutes: number): number {
  if (minutes <= 5) return 1;
  if (minutes <= 8) return 0.5;
  if (minutes > 10) return -2;
  return 0;
}

function confidenceLevel(satisfaction: number, completionRate: number): PersonaResult['confidence'] {
  if (satisfaction >= 4 && completionRate === 100) return 'high';
  if (satisfaction >= 3) return 'medium';
  return 'low';
}

export function simulatePersona(session: PersonaSession): PersonaResult {
  const confusion = confusionPoints(session);
  const completed = session.flows.filter(f => f.completed).length;
  const completionRate = session.flows.length > 0 ? round1((completed / session.flows.length) * 100) : 0;

  let satisfaction = BASE_SATISFACTION + timeAdjustment(session.completionMinutes);
  satisfaction -= CONFUSION_PENALTY * confusion.length;
  if (session.accessibility.keyboard_accessible && confusion.length === 0) {
    satisfaction += 0.5;
  }
  satisfaction = round1(clamp(satisfaction, 1, 5));

  const feedback = [...confusion];
  if (session.completionMinutes <= session.timeLimitMinutes) {
    feedback.push(`Finished in ${session.completionMinutes} minutes, within the ${session.timeLimitMinutes}-minute limit`);
  } else {
    feedback.push(`Needed ${session.completionMinutes} minutes, over the ${session.timeLimitMinutes}-minute limit`);
  }

  return {
    persona: session.persona || DEFAULT_PERSONA,
    satisfaction_score: satisfaction,
    completion_rate_percent: completionRate,
    completion_minutes: session.completionMinutes,
    confidence: confidenceLevel(satisfaction, completionRate),
    feedback,
  };
}
