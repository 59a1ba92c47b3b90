import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Logger } from '../../src/services/logger';

describe('Logger', () => {
  beforeEach(() => {
    Logger.reset();
    Logger.setTimestamps(false);
  });

  it('buffers entries at every level', () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const log = Logger.create('BufferTest');

    log.debug('hidden');
    log.info('bound');
    log.warn('slow');

    expect(Logger.getBuffer().map(e => [e.level, e.message])).toEqual([
      ['DEBUG', 'hidden'],
      ['INFO', 'bound'],
      ['WARN', 'slow'],
    ]);
    expect(Logger.getBuffer('WARN').map(e => e.message)).toEqual(['slow']);
  });

  it('prints debug output only for enabled modules', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const executor = Logger.create('PipelineExecutor');
    const other = Logger.create('FrameScheduler');

    Logger.setLevel('DEBUG');
    Logger.enable('executor');
    executor.debug('visible');
    other.debug('invisible');

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith('[PipelineExecutor] DEBUG', 'visible');
  });

  it('always prints errors and keeps their stack', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    Logger.setLevel('ERROR');
    const failure = new Error('boom');

    Logger.create('ErrorTest').error('failed', failure);

    expect(error).toHaveBeenCalledWith('[ErrorTest] ERROR', 'failed', failure);
    const [entry] = Logger.errors();
    expect(entry.data).toEqual({ name: 'Error', message: 'boom' });
    expect(entry.stack).toBe(failure.stack);
  });

  it('respects the minimum level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    Logger.setLevel('WARN');
    Logger.create('LevelTest').info('quiet');
    expect(info).not.toHaveBeenCalled();
  });

  it('searches by message and module', () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    Logger.create('SearchTest').info('Bound 3 pipelines');

    expect(Logger.search('bound 3')).toHaveLength(1);
    expect(Logger.search('searchtest')).toHaveLength(1);
    expect(Logger.search('missing')).toHaveLength(0);
    expect(Logger.modules()).toContain('SearchTest');
  });

  it('persists its config', () => {
    Logger.enable('A, B');
    const stored = localStorage.getItem('upscale_logger_config');
    expect(JSON.parse(stored ?? '{}').enabled).toEqual(['A', 'B']);
  });
});
