import type { Classification, ConfirmAnswer, ControlClassification, OptionNumber } from '../grammar/types.js';
import {
  CONFIRM_KEYS,
  type InjectionDirective,
  KEYS,
  optionKey,
  sendKeys,
  typeText,
} from '../inject/directives.js';
import type { TargetHandle } from '../target/types.js';
import {
  Activation,
  type SessionSnapshot,
  type SessionState,
  bufferText,
  createSessionState,
} from './state.js';

export type MachineAction =
  | 'ignore'
  | 'wake'
  | 'sleep'
  | 'append'
  | 'finalize'
  | 'removeWord'
  | 'clearBuffer'
  | 'sendShortcut';

/**
 * State-machine transitions surfaced to the feedback display.
 */
export type TransitionFeedback =
  | { type: 'activated' }
  | { type: 'deactivated'; discarded: string }
  | { type: 'accumulating'; text: string; buffer: string }
  | { type: 'finalized'; sent: string }
  | { type: 'edited'; edit: 'removeWord' | 'clearLine' | 'clearAll'; buffer: string }
  | { type: 'optionSelected'; option: OptionNumber }
  | { type: 'modeSwitched' }
  | { type: 'confirmed'; answer: ConfirmAnswer };

export interface Transition {
  action: MachineAction;
  directives: InjectionDirective[];
  feedback?: TransitionFeedback;
}

function ignore(): Transition {
  return { action: 'ignore', directives: [] };
}

/**
 * Activation and accumulation state machine.
 *
 * Literal text is typed as it arrives; the buffer only mirrors it for editing
 * and status display. `handle` is total: it never throws and never performs I/O.
 */
export class CommandStateMachine {
  private readonly state: SessionState;

  constructor(target: TargetHandle) {
    this.state = createSessionState(target);
  }

  get activation(): Activation {
    return this.state.activation;
  }

  get target(): TargetHandle {
    return this.state.target;
  }

  snapshot(): SessionSnapshot {
    return {
      activation: this.state.activation,
      bufferText: bufferText(this.state),
      target: this.state.target,
    };
  }

  handle(classification: Classification): Transition {
    if (this.state.activation === Activation.SLEEPING) {
      return this.handleSleeping(classification);
    }

    if (classification.kind === 'literal') {
      return this.appendLiteral(classification.text);
    }
    return this.handleControl(classification);
  }

  private handleSleeping(classification: Classification): Transition {
    if (classification.kind === 'control' && classification.category === 'activate') {
      this.state.activation = Activation.ACTIVE;
      return { action: 'wake', directives: [], feedback: { type: 'activated' } };
    }
    return ignore();
  }

  private appendLiteral(text: string): Transition {
    if (text.length === 0) {
      return ignore();
    }

    const continuing = this.state.buffer.length > 0;
    this.state.buffer.push(text);

    return {
      action: 'append',
      directives: [typeText(text, continuing)],
      feedback: { type: 'accumulating', text, buffer: bufferText(this.state) },
    };
  }

  private handleControl(control: ControlClassification): Transition {
    switch (control.category) {
      case 'activate':
        return ignore();

      case 'deactivate': {
        const discarded = this.clearBuffer();
        this.state.activation = Activation.SLEEPING;
        return { action: 'sleep', directives: [], feedback: { type: 'deactivated', discarded } };
      }

      case 'finalize': {
        const sent = this.clearBuffer();
        return {
          action: 'finalize',
          directives: [sendKeys(KEYS.enter)],
          feedback: { type: 'finalized', sent },
        };
      }

      case 'removeWord':
        this.dropLastWord();
        return {
          action: 'removeWord',
          directives: [sendKeys(KEYS.removeWord)],
          feedback: { type: 'edited', edit: 'removeWord', buffer: bufferText(this.state) },
        };

      case 'clearLine':
        this.clearBuffer();
        return {
          action: 'clearBuffer',
          directives: [sendKeys(KEYS.clearLine)],
          feedback: { type: 'edited', edit: 'clearLine', buffer: '' },
        };

      case 'clearAll':
        this.clearBuffer();
        return {
          action: 'clearBuffer',
          directives: [sendKeys(KEYS.selectAll, KEYS.delete)],
          feedback: { type: 'edited', edit: 'clearAll', buffer: '' },
        };

      case 'selectOption':
        return {
          action: 'sendShortcut',
          directives: [sendKeys(optionKey(control.option))],
          feedback: { type: 'optionSelected', option: control.option },
        };

      case 'modeSwitch':
        return {
          action: 'sendShortcut',
          directives: [sendKeys(KEYS.cycleMode)],
          feedback: { type: 'modeSwitched' },
        };

      case 'confirm':
        return {
          action: 'sendShortcut',
          directives: [sendKeys(CONFIRM_KEYS[control.answer])],
          feedback: { type: 'confirmed', answer: control.answer },
        };
    }
  }

  private clearBuffer(): string {
    const text = bufferText(this.state);
    this.state.buffer = [];
    return text;
  }

  /**
   * Best effort: the terminal deletes the word before the cursor, which is the
   * last word we typed only if nothing else edited the line.
   */
  private dropLastWord(): void {
    const last = this.state.buffer.pop();
    if (last === undefined) {
      return;
    }

    const words = last.split(/\s+/).filter((word) => word.length > 0);
    words.pop();
    if (words.length > 0) {
      this.state.buffer.push(words.join(' '));
    }
  }
}
