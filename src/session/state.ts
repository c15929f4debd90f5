import type { TargetHandle } from '../target/types.js';

/**
 * Whether spoken text and shortcuts are forwarded, or only wake phrases are heard.
 */
export enum Activation {
  SLEEPING = 'SLEEPING',
  ACTIVE = 'ACTIVE',
}

/**
 * Process-wide session state, owned by the command state machine.
 *
 * `buffer` is an optimistic mirror of the terminal input line: the machine has no
 * read-back channel, so edits made outside voice control are not reflected here.
 * It is non-empty only while ACTIVE.
 */
export interface SessionState {
  activation: Activation;
  buffer: string[];
  readonly target: TargetHandle;
}

/**
 * Read-only view of the session for status display and tests.
 */
export interface SessionSnapshot {
  activation: Activation;
  bufferText: string;
  target: TargetHandle;
}

export function createSessionState(target: TargetHandle): SessionState {
  return {
    activation: Activation.SLEEPING,
    buffer: [],
    target,
  };
}

export function bufferText(state: Pick<SessionState, 'buffer'>): string {
  return state.buffer.join(' ');
}
