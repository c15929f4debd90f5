import { describe, expect, it } from 'vitest';
import { ConfigError, DEFAULT_CONFIG, loadConfig } from '../../src/config/config.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
    expect(loadConfig({ VOXKEY_TYPE_DELAY_MS: '  ' }).typeDelayMs).toBe(12);
  });

  it('reads every setting', () => {
    const config = loadConfig({
      VOXKEY_XDOTOOL_PATH: '/opt/bin/xdotool',
      VOXKEY_TYPE_DELAY_MS: '20',
      VOXKEY_DIRECTIVE_TIMEOUT_MS: '2500',
      VOXKEY_KEY_SETTLE_MS: '0',
      VOXKEY_QUEUE_CAPACITY: '8',
      VOXKEY_FOCUS_COUNTDOWN: '3',
      VOXKEY_MIN_CONFIDENCE: '0.5',
      VOXKEY_STT_URL: ' ws://localhost:9000/stream ',
      VOXKEY_DEBUG: 'Yes',
    });

    expect(config).toEqual({
      xdotoolPath: '/opt/bin/xdotool',
      typeDelayMs: 20,
      directiveTimeoutMs: 2500,
      keySettleMs: 0,
      queueCapacity: 8,
      focusCountdownSeconds: 3,
      minConfidence: 0.5,
      sttUrl: 'ws://localhost:9000/stream',
      debug: true,
    });
  });

  it('rejects values out of range', () => {
    expect(() => loadConfig({ VOXKEY_QUEUE_CAPACITY: '0' })).toThrow(
      'VOXKEY_QUEUE_CAPACITY: must be at least 1, got 0'
    );
    expect(() => loadConfig({ VOXKEY_QUEUE_CAPACITY: '2.5' })).toThrow(
      'VOXKEY_QUEUE_CAPACITY: expected an integer, got 2.5'
    );
    expect(() => loadConfig({ VOXKEY_MIN_CONFIDENCE: '1.5' })).toThrow(
      'VOXKEY_MIN_CONFIDENCE: must be at most 1, got 1.5'
    );
    expect(() => loadConfig({ VOXKEY_TYPE_DELAY_MS: '-1' })).toThrow(
      'VOXKEY_TYPE_DELAY_MS: must be at least 0, got -1'
    );
  });

  it('rejects values that are not numbers or booleans', () => {
    expect(() => loadConfig({ VOXKEY_DIRECTIVE_TIMEOUT_MS: 'soon' })).toThrow(ConfigError);
    expect(() => loadConfig({ VOXKEY_DIRECTIVE_TIMEOUT_MS: 'soon' })).toThrow(
      'VOXKEY_DIRECTIVE_TIMEOUT_MS: expected a number, got "soon"'
    );
    expect(() => loadConfig({ VOXKEY_DEBUG: 'maybe' })).toThrow(
      'VOXKEY_DEBUG: expected true or false, got "maybe"'
    );
  });
});
