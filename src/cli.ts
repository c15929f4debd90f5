#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { ConfigError } from './config/config.js';
import { classifyText, formatGrammar } from './modes/inspect.js';
import { runMode, type RunModeOptions, type SourceKind } from './modes/run.js';
import { Activation } from './session/state.js';

const program = new Command();

program
  .name('voxkey')
  .description('Drive a terminal assistant by voice: speech becomes keystrokes in a captured window')
  .version('1.0.0');

program
  .command('run')
  .description('Capture the target terminal and inject recognized speech into it')
  .option('--source <kind>', 'Fragment source: stdin (one fragment per line) or socket (recognizer WebSocket)', 'stdin')
  .option('--url <ws-url>', 'Recognizer WebSocket URL (overrides VOXKEY_STT_URL)')
  .option('--dry-run', 'Print keystrokes instead of sending them (no window capture)')
  .option('--countdown <seconds>', 'Seconds to focus the target terminal (overrides VOXKEY_FOCUS_COUNTDOWN)')
  .option('--min-confidence <n>', 'Drop committed transcripts below this confidence (overrides VOXKEY_MIN_CONFIDENCE)')
  .option('--debug', 'Log every classification and xdotool call')
  .action(async (options: Omit<RunModeOptions, 'source'> & { source: string }) => {
    const source: SourceKind = options.source === 'socket' ? 'socket' : 'stdin';
    try {
      await runMode({ ...options, source });
    } catch (error) {
      if (error instanceof ConfigError) {
        console.error(`❌ Invalid configuration: ${error.message}`);
      } else {
        console.error('❌ Error:', error instanceof Error ? error.message : error);
      }
      process.exit(1);
    }
  });

program
  .command('classify')
  .description('Show how an utterance is normalized and classified')
  .argument('<words...>', 'Utterance to classify')
  .option('--active', 'Classify as if the engine were active (default: sleeping)')
  .action((words: string[], options: { active?: boolean }) => {
    const report = classifyText(words.join(' '), options.active ? Activation.ACTIVE : Activation.SLEEPING);
    console.log(`📝 Normalized: ${JSON.stringify(report.normalized)}`);
    console.log(JSON.stringify(report.classification, null, 2));
  });

program
  .command('grammar')
  .description('List keyphrases and spoken-text corrections')
  .action(() => {
    for (const line of formatGrammar()) {
      console.log(line);
    }
  });

await program.parseAsync(process.argv);
