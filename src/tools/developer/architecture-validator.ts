import type { ArchitectureCompliance, DesignSpecificationPayload } from '../../contracts/schemas.js';

export const MAX_UI_COMPONENTS = 12;
export const MAX_API_ENDPOINTS = 10;

export interface ArchitectureValidation {
  compliant: boolean;
  architecture_compliance: ArchitectureCompliance;
  violations: string[];
}

/**
 * Checks a design against the four architecture principles before any code
 * is generated from it.
 */
export function validateArchitecture(design: DesignSpecificationPayload): ArchitectureValidation {
  const violations: string[] = [];
  const endpointPaths = new Set(design.api_endpoints.map(e => e.path));

  const apiFirst = design.api_endpoints.length > 0 && design.api_endpoints.every(e => e.path.startsWith('/api/'));
  if (!apiFirst) {
    violations.push('api_first: every data access must go through an /api/ endpoint');
  }

  const stateless = design.api_endpoints.every(e => e.stateless);
  if (!stateless) {
    const stateful = design.api_endpoints.filter(e => !e.stateless).map(e => e.name);
    violations.push(`stateless_backend: endpoints keep server-side state (${stateful.join(', ')})`);
  }

  const unsynced = design.state_management.api_synced.filter(path => !endpointPaths.has(path));
  const dataInUi = design.ui_components.filter(c => c.purpose.includes('database'));
  const separated = unsynced.length === 0 && dataInUi.length === 0;
  if (unsynced.length > 0) {
    violations.push(`separation_of_concerns: synced state without endpoint (${unsynced.join(', ')})`);
  }
  if (dataInUi.length > 0) {
    violations.push(`separation_of_concerns: UI components reach into storage (${dataInUi.map(c => c.name).join(', ')})`);
  }

  const simple =
    design.ui_components.length <= MAX_UI_COMPONENTS && design.api_endpoints.length <= MAX_API_ENDPOINTS;
  if (!simple) {
    violations.push(
      `simplicity_first: ${design.ui_components.length} components and ${design.api_endpoints.length} endpoints exceed ${MAX_UI_COMPONENTS}/${MAX_API_ENDPOINTS}`
    );
  }

  const compliance: ArchitectureCompliance = {
    api_first: apiFirst,
    stateless_backend: stateless,
    separation_of_concerns: separated,
    simplicity_first: simple,
  };

  return {
    compliant: violations.length === 0,
    architecture_compliance: compliance,
    violations,
  };
}
