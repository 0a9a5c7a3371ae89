import { describe, it, expect, vi, afterEach } from 'vitest';
import { Reporter } from '../reporter';

describe('Reporter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should mute progress output in silent mode but keep warnings and errors', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const reporter = new Reporter({ silent: true });

    reporter.header('Title');
    reporter.info('info');
    reporter.success('done');
    reporter.warning('careful');
    reporter.error('broken');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('⚠️  careful');
    expect(error).toHaveBeenCalledWith('❌ broken');
  });

  it('should prefix successes with a check mark', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    new Reporter().success('Saved profile.json');

    expect(log).toHaveBeenCalledWith('  ✓ Saved profile.json');
  });
});
