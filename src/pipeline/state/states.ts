export type StageState =
  | 'RECEIVED'
  | 'TOOLS_RUN'
  | 'QUALITY_GATES_CHECKED'
  | 'CONTRACT_BUILT'

  // Terminal states
  | 'HANDED_OFF'
  | 'REJECTED'
  | 'FAILED';

export interface StateMetadata {
  state: StageState;
  isTerminal: boolean;
  canTransitionTo: StageState[];
  description: string;
}

const STATE_DEFINITIONS: Record<StageState, Omit<StateMetadata, 'state'>> = {
  RECEIVED: {
    isTerminal: false,
    canTransitionTo: ['TOOLS_RUN', 'FAILED'],
    description: 'Input contract validated and payload extracted',
  },

  TOOLS_RUN: {
    isTerminal: false,
    canTransitionTo: ['QUALITY_GATES_CHECKED', 'FAILED'],
    description: 'Stage tools produced their deliverables',
  },

  QUALITY_GATES_CHECKED: {
    isTerminal: false,
    canTransitionTo: ['CONTRACT_BUILT', 'FAILED'],
    description: 'Every stage gate passed',
  },

  CONTRACT_BUILT: {
    isTerminal: false,
    canTransitionTo: ['HANDED_OFF', 'REJECTED', 'FAILED'],
    description: 'Output contract assembled, awaiting validation',
  },

  HANDED_OFF: {
    isTerminal: true,
    canTransitionTo: [],
    description: 'Output contract validated and handed to the next stage',
  },

  REJECTED: {
    isTerminal: true,
    canTransitionTo: [],
    description: 'Rework contract sent back to development',
  },

  FAILED: {
    isTerminal: true,
    canTransitionTo: [],
    description: 'Stage aborted with an error',
  },
};

export function getStateMetadata(state: StageState): StateMetadata {
  return {
    state,
    ...STATE_DEFINITIONS[state],
  };
}

export function isTerminalState(state: StageState): boolean {
  return STATE_DEFINITIONS[state].isTerminal;
}

export function canTransition(from: StageState, to: StageState): boolean {
  return STATE_DEFINITIONS[from].canTransitionTo.includes(to);
}

export function getAllStates(): StageState[] {
  return Object.keys(STATE_DEFINITIONS) as StageState[];
}

export function getTerminalStates(): StageState[] {
  return getAllStates().filter(isTerminalState);
}
