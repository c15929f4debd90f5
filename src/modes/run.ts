import { checkNumber, loadConfig, type VoxkeyConfig } from '../config/config.js';
import { VoiceCommandEngine } from '../engine/engine.js';
import { InjectionDispatcher } from '../inject/dispatcher.js';
import { DryRunSink } from '../inject/dryRunSink.js';
import type { KeystrokeSink } from '../inject/sink.js';
import { XdotoolSink } from '../inject/xdotoolSink.js';
import { FragmentSocketClient } from '../stt/fragmentSocket.js';
import { StdinFragmentSource, type SourceCommand } from '../stt/stdinSource.js';
import { captureFocusedWindow } from '../target/capture.js';
import type { TargetHandle } from '../target/types.js';
import { StatusLine } from '../ui/statusLine.js';

export type SourceKind = 'stdin' | 'socket';

export interface RunModeOptions {
  source?: SourceKind;
  url?: string;
  dryRun?: boolean;
  countdown?: string;
  minConfidence?: string;
  debug?: boolean;
}

const DRY_RUN_TARGET: TargetHandle = { id: 'dry-run', name: 'dry run (nothing is typed)' };

/**
 * Applies CLI flags on top of the environment configuration.
 */
export function resolveConfig(options: RunModeOptions, base: VoxkeyConfig = loadConfig()): VoxkeyConfig {
  const config = { ...base };

  if (options.url) {
    config.sttUrl = options.url;
  }
  if (options.countdown !== undefined) {
    config.focusCountdownSeconds = checkNumber('--countdown', Number(options.countdown), { integer: true });
  }
  if (options.minConfidence !== undefined) {
    config.minConfidence = checkNumber('--min-confidence', Number(options.minConfidence), { max: 1 });
  }
  if (options.debug) {
    config.debug = true;
  }

  return config;
}

async function captureTarget(config: VoxkeyConfig, status: StatusLine): Promise<TargetHandle> {
  console.log('\n' + '='.repeat(60));
  console.log('🎯 VOXKEY - TARGET WINDOW SETUP');
  console.log('='.repeat(60));
  console.log(`You have ${config.focusCountdownSeconds} seconds to focus the terminal where`);
  console.log('your assistant is running. Click into it and wait for the countdown.');
  console.log('');

  const target = await captureFocusedWindow({
    xdotoolPath: config.xdotoolPath,
    countdownSeconds: config.focusCountdownSeconds,
    onTick: (remaining) => status.showPartial(`⏰ Focus your target terminal now... ${remaining}s`),
  });
  status.showPartial('');

  console.log('✅ Target window captured!');
  console.log(`   Window ID: ${target.id}`);
  console.log(`   Window Name: '${target.name ?? 'Unknown'}'`);
  console.log(`   Window Class: '${target.windowClass ?? 'Unknown'}'`);
  console.log('='.repeat(60));
  return target;
}

/**
 * Long-running mode: capture the target, then feed fragments from the chosen
 * source into the engine until the source ends or the user quits.
 */
export async function runMode(options: RunModeOptions): Promise<void> {
  const config = resolveConfig(options);
  const status = new StatusLine(process.stdout, config.debug);
  const source: SourceKind = options.source ?? 'stdin';

  if (source === 'socket' && !config.sttUrl) {
    throw new Error('No recognizer URL. Set VOXKEY_STT_URL or pass --url.');
  }

  const target = options.dryRun ? DRY_RUN_TARGET : await captureTarget(config, status);
  const sink: KeystrokeSink = options.dryRun
    ? new DryRunSink((line) => status.print(line))
    : new XdotoolSink({
        xdotoolPath: config.xdotoolPath,
        typeDelayMs: config.typeDelayMs,
        keySettleMs: config.keySettleMs,
        commandTimeoutMs: config.directiveTimeoutMs,
        debug: config.debug,
      });

  const dispatcher = new InjectionDispatcher(sink, {
    directiveTimeoutMs: config.directiveTimeoutMs,
    // xdotool types one character every typeDelayMs; the deadline grows with the text.
    typingMsPerCharacter: options.dryRun ? 0 : config.typeDelayMs,
  });
  const engine = new VoiceCommandEngine(dispatcher, target, {
    queueCapacity: config.queueCapacity,
    debug: config.debug,
  });
  engine.on('feedback', (event) => status.render(event));

  console.log('\n🎤 voxkey is listening (sleeping).');
  console.log('   Say "activate voice commander" to start, "stop voice commander" to pause.');

  try {
    if (source === 'socket') {
      await runSocketSource(engine, config, status);
    } else {
      await runStdinSource(engine, config, status, !!options.dryRun);
    }
  } finally {
    await engine.stop();
    status.close();
    console.log('👋 voxkey stopped');
  }
}

async function runSocketSource(
  engine: VoiceCommandEngine,
  config: VoxkeyConfig,
  status: StatusLine
): Promise<void> {
  const client = new FragmentSocketClient({
    url: config.sttUrl ?? '',
    minConfidence: config.minConfidence,
    debug: config.debug,
  });

  const closed = new Promise<void>((resolve) => client.onClose(resolve));
  client.onFragment((fragment) => engine.submit(fragment));
  client.onPartial((text) => status.showPartial(text));
  client.onLowConfidence((fragment) => {
    if (config.debug) {
      status.print(`🔇 Low confidence (${fragment.confidence.toFixed(2)}): ${JSON.stringify(fragment.text)}`);
    }
  });

  await client.connect();
  console.log(`🔌 Connected to recognizer at ${config.sttUrl}`);

  const onSigint = () => {
    client.close().catch((error: unknown) => console.error('❌ Failed to close recognizer socket:', error));
  };
  process.once('SIGINT', onSigint);
  try {
    await closed;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

async function runStdinSource(
  engine: VoiceCommandEngine,
  config: VoxkeyConfig,
  status: StatusLine,
  dryRun: boolean
): Promise<void> {
  const stdinSource = new StdinFragmentSource();

  const recapture = async () => {
    const target = dryRun ? DRY_RUN_TARGET : await captureTarget(config, status);
    engine.retarget(target);
  };

  const handleCommand = (command: SourceCommand) => {
    switch (command) {
      case 'status': {
        const snapshot = engine.snapshot();
        status.print(
          `ℹ️  ${snapshot.activation} | target ${snapshot.target.name ?? snapshot.target.id} | ` +
            `buffer ${JSON.stringify(snapshot.bufferText)} | queued ${engine.pending}`
        );
        break;
      }
      case 'recapture':
        recapture().catch((error: unknown) =>
          console.error('❌ Recapture failed:', error instanceof Error ? error.message : error)
        );
        break;
      case 'quit':
        stdinSource.close();
        break;
    }
  };

  stdinSource.onFragment((fragment) => engine.submit(fragment));
  stdinSource.onCommand(handleCommand);
  stdinSource.onUnknownCommand((line) => status.print(`❓ Unknown command ${line} (try :status, :recapture, :quit)`));

  const onSigint = () => stdinSource.close();
  process.once('SIGINT', onSigint);
  try {
    await stdinSource.start();
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
