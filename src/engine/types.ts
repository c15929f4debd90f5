import type { Classification } from '../grammar/types.js';
import type { DispatchResult } from '../inject/dispatcher.js';
import type { InjectionDirective } from '../inject/directives.js';
import type { InjectionError } from '../inject/errors.js';
import type { Transition, TransitionFeedback } from '../session/commandMachine.js';
import type { Activation } from '../session/state.js';
import type { TargetHandle } from '../target/types.js';

/**
 * One unit of recognized speech, consumed exactly once.
 */
export interface Fragment {
  readonly text: string;
  /** Recognizer confidence in [0, 1]. */
  readonly confidence: number;
  /** Arrival time in ms since epoch; must not decrease across the stream. */
  readonly timestamp: number;
}

export interface NormalizedFragment extends Fragment {
  readonly raw: string;
}

/**
 * Discrete events for the status display. Fire-and-forget.
 */
export type FeedbackEvent =
  | TransitionFeedback
  | { type: 'ignored'; text: string; activation: Activation }
  | { type: 'dispatched'; delivered: number; directives: InjectionDirective[] }
  | { type: 'dispatchFailed'; delivered: number; total: number; error: InjectionError }
  | { type: 'overflow'; text: string; capacity: number }
  | { type: 'outOfOrder'; text: string; timestamp: number; lastTimestamp: number }
  | { type: 'invalidTimestamp'; text: string; timestamp: number }
  | { type: 'retargeted'; target: TargetHandle };

/**
 * Everything the engine decided for one fragment.
 */
export interface ProcessedFragment {
  fragment: NormalizedFragment;
  classification: Classification;
  transition: Transition;
  /** Absent when the transition produced no directives. */
  result?: DispatchResult;
}
