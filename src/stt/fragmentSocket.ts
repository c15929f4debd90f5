import type { EventEmitter } from 'events';
import WebSocket from 'ws';
import type { Fragment } from '../engine/types.js';

export interface FragmentSocketOptions {
  url: string;
  /** Committed transcripts below this confidence are dropped. */
  minConfidence: number;
  debug?: boolean;
  /** Opens the socket; defaults to a `ws` client. */
  createSocket?: SocketFactory;
}

/**
 * The part of a `ws` client the recognizer connection uses.
 */
export type RecognizerSocket = EventEmitter & { close(): void };
export type SocketFactory = (url: string) => RecognizerSocket;

export type TranscriptMessage =
  | { type: 'partial'; text: string }
  | { type: 'committed'; text: string; confidence: number; timestamp: number };

type FragmentHandler = (fragment: Fragment) => void;
type PartialHandler = (text: string) => void;
type LowConfidenceHandler = (fragment: Fragment) => void;
type CloseHandler = () => void;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses one recognizer message. Returns null for anything that is not a
 * partial or committed transcript.
 *
 * Missing confidence counts as 1; a missing timestamp is replaced by the
 * receive time.
 */
export function parseTranscriptMessage(raw: string, receivedAt: number): TranscriptMessage | null {
  let message: unknown;
  try {
    message = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(message)) {
    return null;
  }

  const messageType = message.message_type ?? message.type;
  const rawText = message.text;
  const text = typeof rawText === 'string' ? rawText.trim() : '';

  if (messageType === 'partial_transcript') {
    return { type: 'partial', text };
  }

  if (messageType !== 'committed_transcript' && messageType !== 'committed_transcript_with_timestamps') {
    return null;
  }

  const confidence = message.confidence === undefined ? 1 : message.confidence;
  if (typeof confidence !== 'number' || !(confidence >= 0 && confidence <= 1)) {
    return null;
  }

  const sentAt = message.timestamp;
  const timestamp = typeof sentAt === 'number' && Number.isFinite(sentAt) ? sentAt : receivedAt;

  return { type: 'committed', text, confidence, timestamp };
}

/**
 * Receives transcripts from an external speech recognizer over WebSocket and
 * turns committed ones into fragments.
 */
export class FragmentSocketClient {
  private ws: RecognizerSocket | null = null;
  private fragmentHandlers: FragmentHandler[] = [];
  private partialHandlers: PartialHandler[] = [];
  private lowConfidenceHandlers: LowConfidenceHandler[] = [];
  private closeHandlers: CloseHandler[] = [];

  constructor(private readonly options: FragmentSocketOptions) {}

  async connect(): Promise<void> {
    if (this.ws) {
      return;
    }

    const createSocket = this.options.createSocket ?? ((url: string) => new WebSocket(url));

    await new Promise<void>((resolve, reject) => {
      const ws = createSocket(this.options.url);
      this.ws = ws;
      let opened = false;

      ws.once('open', () => {
        opened = true;
        resolve();
      });
      ws.on('error', (err: Error) => {
        if (!opened) {
          reject(err);
          return;
        }
        console.error(`[stt:ws] error: ${err.message}`);
      });
      ws.on('message', (data: WebSocket.RawData) => this.handleMessage(data.toString()));
      ws.on('close', () => {
        this.ws = null;
        this.closeHandlers.forEach((cb) => cb());
      });
    });
  }

  onFragment(cb: FragmentHandler): void {
    this.fragmentHandlers.push(cb);
  }

  onPartial(cb: PartialHandler): void {
    this.partialHandlers.push(cb);
  }

  onLowConfidence(cb: LowConfidenceHandler): void {
    this.lowConfidenceHandlers.push(cb);
  }

  onClose(cb: CloseHandler): void {
    this.closeHandlers.push(cb);
  }

  async close(): Promise<void> {
    if (!this.ws) {
      return;
    }

    const ws = this.ws;
    let timer: NodeJS.Timeout | undefined;
    const closed = new Promise<void>((resolve) => {
      ws.once('close', () => resolve());
      timer = setTimeout(() => resolve(), 1000);
    });

    ws.close();
    await closed;
    clearTimeout(timer);
  }

  /**
   * Routes one raw message to the registered handlers.
   */
  handleMessage(raw: string, receivedAt: number = Date.now()): void {
    if (this.options.debug) {
      console.log(`[stt:ws] ${raw}`);
    }

    const message = parseTranscriptMessage(raw, receivedAt);
    if (!message) {
      return;
    }

    if (message.type === 'partial') {
      this.partialHandlers.forEach((cb) => cb(message.text));
      return;
    }

    if (!message.text) {
      return;
    }

    const fragment: Fragment = {
      text: message.text,
      confidence: message.confidence,
      timestamp: message.timestamp,
    };

    if (fragment.confidence < this.options.minConfidence) {
      this.lowConfidenceHandlers.forEach((cb) => cb(fragment));
      return;
    }
    this.fragmentHandlers.forEach((cb) => cb(fragment));
  }
}
