import { EventEmitter } from 'events';
import { classify } from '../grammar/matcher.js';
import { describeDirective } from '../inject/directives.js';
import type { InjectionDispatcher } from '../inject/dispatcher.js';
import { CommandStateMachine } from '../session/commandMachine.js';
import type { SessionSnapshot } from '../session/state.js';
import type { TargetHandle } from '../target/types.js';
import { normalize } from '../text/normalizer.js';
import { BoundedQueue } from './fragmentQueue.js';
import type { FeedbackEvent, Fragment, NormalizedFragment, ProcessedFragment } from './types.js';

export interface EngineOptions {
  /** Fragments waiting behind an in-flight batch before new ones are refused. */
  queueCapacity?: number;
  debug?: boolean;
}

type QueueItem =
  | { kind: 'fragment'; fragment: Fragment }
  | { kind: 'retarget'; target: TargetHandle };

const DEFAULT_QUEUE_CAPACITY = 32;

export declare interface VoiceCommandEngine {
  on(event: 'feedback', listener: (event: FeedbackEvent) => void): this;
  on(event: 'processed', listener: (processed: ProcessedFragment) => void): this;
  once(event: 'feedback', listener: (event: FeedbackEvent) => void): this;
  once(event: 'processed', listener: (processed: ProcessedFragment) => void): this;
}

/**
 * Serialized fragment processing loop.
 *
 * Fragments are accepted synchronously into a bounded queue and processed one
 * at a time, strictly in arrival order: normalize, classify, transition, then
 * dispatch. A slow keystroke batch delays later fragments but never reorders
 * them, and an in-flight batch is never cancelled.
 */
export class VoiceCommandEngine extends EventEmitter {
  private machine: CommandStateMachine;
  private readonly queue: BoundedQueue<QueueItem>;
  private readonly debug: boolean;
  private loop: Promise<void> | null = null;
  private lastTimestamp = Number.NEGATIVE_INFINITY;
  private stopped = false;

  constructor(
    private readonly dispatcher: InjectionDispatcher,
    target: TargetHandle,
    options: EngineOptions = {}
  ) {
    super();
    this.machine = new CommandStateMachine(target);
    this.queue = new BoundedQueue<QueueItem>(options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY);
    this.debug = !!options.debug;
  }

  /**
   * Queues a fragment. Returns false when it was refused (queue full, engine
   * stopped, timestamp not a finite number or older than the last accepted fragment).
   */
  submit(fragment: Fragment): boolean {
    if (this.stopped) {
      return false;
    }

    if (!Number.isFinite(fragment.timestamp)) {
      this.report({ type: 'invalidTimestamp', text: fragment.text, timestamp: fragment.timestamp });
      return false;
    }

    if (fragment.timestamp < this.lastTimestamp) {
      this.report({
        type: 'outOfOrder',
        text: fragment.text,
        timestamp: fragment.timestamp,
        lastTimestamp: this.lastTimestamp,
      });
      return false;
    }

    if (!this.queue.push({ kind: 'fragment', fragment })) {
      this.report({ type: 'overflow', text: fragment.text, capacity: this.queue.capacity });
      return false;
    }

    this.lastTimestamp = fragment.timestamp;
    this.schedule();
    return true;
  }

  /**
   * Starts a fresh session against a newly captured window, after every
   * fragment queued so far. The new session starts SLEEPING with an empty buffer.
   */
  retarget(target: TargetHandle): boolean {
    if (this.stopped || !this.queue.push({ kind: 'retarget', target })) {
      return false;
    }
    this.schedule();
    return true;
  }

  snapshot(): SessionSnapshot {
    return this.machine.snapshot();
  }

  get pending(): number {
    return this.queue.size;
  }

  /**
   * Resolves once every queued fragment has been processed.
   */
  async drain(): Promise<void> {
    while (this.loop) {
      await this.loop;
    }
  }

  /**
   * Stops accepting fragments and finishes the ones already queued.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    await this.drain();
  }

  private schedule(): void {
    if (this.loop) {
      return;
    }

    this.loop = this.run().then(() => {
      this.loop = null;
      // An item may have been queued after the loop saw an empty queue.
      if (this.queue.size > 0) {
        this.schedule();
      }
    });
  }

  private async run(): Promise<void> {
    for (let item = this.queue.shift(); item; item = this.queue.shift()) {
      try {
        if (item.kind === 'fragment') {
          await this.process(item.fragment);
        } else {
          this.machine = new CommandStateMachine(item.target);
          this.report({ type: 'retargeted', target: item.target });
        }
      } catch (error) {
        console.error('❌ Failed to process fragment:', error);
      }
    }
  }

  private async process(fragment: Fragment): Promise<void> {
    const normalized: NormalizedFragment = {
      raw: fragment.text,
      text: normalize(fragment.text),
      confidence: fragment.confidence,
      timestamp: fragment.timestamp,
    };

    const activation = this.machine.activation;
    const classification = classify(normalized.text, activation);
    const transition = this.machine.handle(classification);

    if (this.debug) {
      console.log(
        `[engine] ${activation} "${normalized.text}" -> ${transition.action}` +
          (transition.directives.length > 0
            ? ` [${transition.directives.map(describeDirective).join(', ')}]`
            : '')
      );
    }

    if (transition.feedback) {
      this.report(transition.feedback);
    } else if (transition.action === 'ignore') {
      this.report({ type: 'ignored', text: normalized.text, activation });
    }

    const processed: ProcessedFragment = { fragment: normalized, classification, transition };

    if (transition.directives.length > 0) {
      const result = await this.dispatcher.dispatch(transition.directives, this.machine.target);
      processed.result = result;

      if (result.ok) {
        this.report({
          type: 'dispatched',
          delivered: result.delivered,
          directives: transition.directives,
        });
      } else {
        this.report({
          type: 'dispatchFailed',
          delivered: result.delivered,
          total: transition.directives.length,
          error: result.error,
        });
      }
    }

    this.notify('processed', processed);
  }

  private report(event: FeedbackEvent): void {
    this.notify('feedback', event);
  }

  /**
   * Listener failures are logged and never interrupt processing.
   */
  private notify(event: 'feedback' | 'processed', payload: FeedbackEvent | ProcessedFragment): void {
    try {
      this.emit(event, payload);
    } catch (error) {
      console.warn(`⚠️  ${event} listener failed:`, error);
    }
  }
}
