export type SessionState =
  | 'uninitialized'
  | 'initialized'
  | 'configuring'
  | 'running'
  | 'stopped'
  | 'terminated';

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  uninitialized: ['initialized', 'terminated'],
  initialized: ['configuring', 'terminated'],
  configuring: ['running', 'stopped', 'terminated'],
  running: ['stopped', 'terminated'],
  stopped: ['running', 'terminated'],
  terminated: [],
};

export function canTransition(from: SessionState, to: SessionState): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Commands accepted in each state; anything else is an illegal-state failure. */
const LEGAL_COMMANDS: Record<string, readonly SessionState[] | 'any'> = {
  initialize: ['uninitialized'],
  launch: ['initialized'],
  attach: ['initialized'],
  setBreakpoints: [
    'uninitialized',
    'initialized',
    'configuring',
    'running',
    'stopped',
  ],
  setFunctionBreakpoints: [
    'uninitialized',
    'initialized',
    'configuring',
    'running',
    'stopped',
  ],
  setExceptionBreakpoints: [
    'uninitialized',
    'initialized',
    'configuring',
    'running',
    'stopped',
  ],
  configurationDone: ['configuring'],
  threads: 'any',
  continue: ['stopped'],
  next: ['stopped'],
  stepIn: ['stopped'],
  stepOut: ['stopped'],
  pause: ['running', 'stopped'],
  stackTrace: ['stopped'],
  scopes: ['stopped'],
  variables: ['stopped'],
  evaluate: ['stopped'],
  setVariable: ['stopped'],
  inlineValues: ['stopped'],
  disconnect: 'any',
  terminate: 'any',
};

export function isKnownCommand(command: string): boolean {
  return Object.prototype.hasOwnProperty.call(LEGAL_COMMANDS, command);
}

export function isLegalIn(command: string, state: SessionState): boolean {
  if (!isKnownCommand(command)) {
    return false;
  }
  const legal = LEGAL_COMMANDS[command];
  return legal === 'any' || legal.includes(state);
}
