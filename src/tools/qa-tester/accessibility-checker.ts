import type { AccessibilityAudit, ComponentImplementation, UiComponentSpec } from '../../contracts/schemas.js';
import { round1 } from '../../scoring/keywords.js';

interface CheckTally {
  total: number;
  violations: string[];
}

const REGION_LABEL = /<section[^>]*aria-label="[^"]+"/;
const CLICKABLE_DIV = /<div[^>]*onClick/g;

function tags(source: string, element: string): string[] {
  return source.match(new RegExp(`<${element}\\b[^>]*>`, 'g')) ?? [];
}

function hasLabelFor(source: string, tag: string): boolean {
  const id = /\bid="([^"]+)"/.exec(tag);
  return id !== null && source.includes(`htmlFor="${id[1]}"`);
}

function auditComponent(component: ComponentImplementation, tally: CheckTally): void {
  const source = component.source_code;

  tally.total++;
  if (!REGION_LABEL.test(source)) {
    tally.violations.push(`${component.name}: region has no accessible name (WCAG 4.1.2)`);
  }

  for (const img of tags(source, 'img')) {
    tally.total++;
    if (!img.includes('alt=')) {
      tally.violations.push(`${component.name}: image without alt text (WCAG 1.1.1)`);
    }
  }

  for (const input of tags(source, 'input')) {
    tally.total++;
    if (!input.includes('aria-label=') && !hasLabelFor(source, input)) {
      tally.violations.push(`${component.name}: input without label (WCAG 1.3.1)`);
    }
  }

  for (const button of tags(source, 'button')) {
    tally.total++;
    if (!button.includes('aria-label=')) {
      tally.violations.push(`${component.name}: button without accessible name (WCAG 4.1.2)`);
    }
  }
}

function keyboardAccessible(components: ComponentImplementation[], specs: UiComponentSpec[]): boolean {
  const clickableDivs = components.some(c =>
    (c.source_code.match(CLICKABLE_DIV) ?? []).some(tag => !tag.includes('tabIndex'))
  );
  return !clickableDivs && specs.every(s => s.accessibility.keyboard_navigable);
}

/** WCAG AA audit over rendered markup: region names, alt text, input labels and button names. */
export function auditAccessibility(
  components: ComponentImplementation[],
  specs: UiComponentSpec[]
): AccessibilityAudit {
  const tally: CheckTally = { total: 0, violations: [] };
  for (const component of components) {
    auditComponent(component, tally);
  }

  const passed = tally.total - tally.violations.length;

  return {
    wcag_compliance_percent: tally.total > 0 ? round1((passed / tally.total) * 100) : 100,
    violations: tally.violations,
    keyboard_accessible: keyboardAccessible(components, specs),
  };
}
