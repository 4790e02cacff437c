import { describe, it, expect, vi } from 'vitest';
import { ProbeLogger, type RemoteLogSink } from '../../src/services/probeLogger.js';
import { collectingLogger, LEVELS } from '../utils/logger.js';

function remoteSpy() {
  const emit = vi.fn<RemoteLogSink['emit']>(async () => undefined);
  return { emit };
}

describe('ProbeLogger', () => {
  it('mirrors each level to both sinks', async () => {
    const { logger, lines } = collectingLogger();
    const remote = remoteSpy();
    const handle = { logGroupName: 'g', streamName: 'execution-1' };
    const log = new ProbeLogger(logger, remote, handle);
    await log.info('one');
    await log.warn('two');
    await log.error('three', { kind: 'UnexpectedError' });
    expect(lines.map((l) => [l.level, l.msg])).toEqual([
      [LEVELS.info, 'one'],
      [LEVELS.warn, 'two'],
      [LEVELS.error, 'three'],
    ]);
    expect(lines[2]).toMatchObject({ kind: 'UnexpectedError', logStream: 'execution-1' });
    expect(remote.emit.mock.calls).toEqual([
      [handle, 'one', 'INFO'],
      [handle, 'two', 'WARN'],
      [handle, 'three', 'ERROR'],
    ]);
  });

  it('keeps debug output local', () => {
    const { logger, lines } = collectingLogger();
    const remote = remoteSpy();
    new ProbeLogger(logger, remote, undefined).debug('closed');
    expect(lines[0].msg).toBe('closed');
    expect(remote.emit).not.toHaveBeenCalled();
  });

  it('still reaches the remote sink when the local logger throws', async () => {
    const { logger } = collectingLogger();
    vi.spyOn(logger, 'info').mockImplementation(() => {
      throw new Error('destination closed');
    });
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    const remote = remoteSpy();
    const log = new ProbeLogger(logger, remote, undefined);
    await expect(log.info('still here')).resolves.toBeUndefined();
    expect(remote.emit).toHaveBeenCalledWith(undefined, 'still here', 'INFO');
    stderr.mockRestore();
  });
});
