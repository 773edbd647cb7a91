import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConsoleLogProvider, formatLogLine } from '../../src/providers/ConsoleLogProvider.js';

describe('ConsoleLogProvider', () => {
  let provider: ConsoleLogProvider;

  beforeEach(() => {
    provider = new ConsoleLogProvider();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should keep events in arrival order', () => {
    provider.info('Verification completed', { verifier: 'argmap' });
    provider.warn('Solver returned unknown');

    expect(provider.events.map((e) => [e.level, e.message])).toEqual([
      ['info', 'Verification completed'],
      ['warn', 'Solver returned unknown'],
    ]);
    expect(provider.events[0].fields).toEqual({ verifier: 'argmap' });
  });

  it('should stamp events without a timestamp', () => {
    provider.log({ level: 'info', message: 'no ts' });
    provider.log({ level: 'info', message: 'with ts', timestamp: '2026-01-15T12:00:00.000Z' });

    const [stamped, kept] = provider.events;
    expect(new Date(String(stamped.timestamp)).toISOString()).toBe(stamped.timestamp);
    expect(kept.timestamp).toBe('2026-01-15T12:00:00.000Z');
  });

  it('should log each convenience method at its level', () => {
    provider.debug('a');
    provider.info('b');
    provider.warn('c');
    provider.error('d');

    expect(provider.events.map((e) => e.level)).toEqual(['debug', 'info', 'warn', 'error']);
    expect(provider.eventsAt('warn').map((e) => e.message)).toEqual(['c']);
  });

  it('should drop events below the minimum level', () => {
    const quiet = new ConsoleLogProvider({ minLevel: 'warn' });
    quiet.debug('noise');
    quiet.info('Verification completed');
    quiet.warn('careful');
    quiet.error('broken');

    expect(quiet.events.map((e) => e.message)).toEqual(['careful', 'broken']);
  });

  it('should stay silent by default', async () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});

    provider.info('silent');
    await provider.flush();

    expect(out).not.toHaveBeenCalled();
  });

  it('should print info to stdout and warnings to stderr', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});
    const loud = new ConsoleLogProvider({ outputToConsole: true });

    loud.info('hello console');
    loud.warn('Solver returned unknown', { timeoutMs: 50 });

    expect(out).toHaveBeenCalledWith('[INFO] hello console');
    expect(err).toHaveBeenCalledWith('[WARN] Solver returned unknown {"timeoutMs":50}');
  });

  it('should format one line per event', () => {
    expect(formatLogLine({ level: 'error', message: 'Handler failed', fields: { handler: 'argmap.checks' } })).toBe(
      '[ERROR] Handler failed {"handler":"argmap.checks"}'
    );
  });
});
