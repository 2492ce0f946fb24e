import { pino, type LevelWithSilent, type Logger } from 'pino';

// =============================================================================
// Structured Logger
// =============================================================================
//
// One base logger per state, one child per component:
//   log.scope.debug({ scopeId, laneId }, "opened")
//   log.state.fatal({ err }, "usage fault")
//
// The hit path never logs.
// =============================================================================

export interface ComponentLoggers {
  // Mark definitions
  registry: Logger;
  // Scope open/close and validation
  scope: Logger;
  // Lanes, faults and lifecycle
  state: Logger;
}

export function createBaseLogger(level: LevelWithSilent): Logger {
  return pino({
    name: 'covermark',
    level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function createComponentLoggers(base: Logger): ComponentLoggers {
  return {
    registry: base.child({ component: 'registry' }),
    scope: base.child({ component: 'scope' }),
    state: base.child({ component: 'state' }),
  };
}
