import { describe, it, expect, vi } from 'vitest';
import { InhibitorLock } from './inhibitor.js';
import { FakeBroker, FakeHost, FakeSignals, RecordingLogger } from './testing/doubles.js';
import { ShutdownSignalWatcher } from './watcher.js';

const STATUS_TOPIC = 'system/command/preparing-for-shutdown';

function setup(reportTimeoutMs = 1000) {
  const calls: string[] = [];
  const host = new FakeHost(calls);
  const broker = new FakeBroker(calls);
  const signals = new FakeSignals();
  const logger = new RecordingLogger();
  const lock = new InhibitorLock(host, logger);
  const watcher = new ShutdownSignalWatcher({
    lock,
    signals,
    logger,
    reportTimeoutMs,
    report: (preparing) => broker.publish(STATUS_TOPIC, String(preparing), { qos: 1, retain: true }),
  });
  return { calls, host, broker, signals, logger, lock, watcher };
}

describe('ShutdownSignalWatcher', () => {
  it('releases on shutdown and re-acquires on cancel, one event at a time', async () => {
    const { calls, broker, signals, lock, watcher } = setup();
    await lock.acquire();
    const loop = watcher.run();
    signals.emit(true);
    signals.emit(false);

    await vi.waitFor(() => expect(calls).toHaveLength(5));
    expect(calls).toEqual([
      'inhibit',
      `publish ${STATUS_TOPIC}`,
      'releaseLock',
      `publish ${STATUS_TOPIC}`,
      'inhibit',
    ]);
    expect(broker.published.map((p) => [p.payload, p.retain])).toEqual([
      ['true', true],
      ['false', true],
    ]);
    expect(lock.held).toBe(true);

    watcher.stop();
    await loop;
  });

  it('releases only once per shutdown cycle', async () => {
    const { host, broker, logger, lock, watcher } = setup();
    await lock.acquire();
    await watcher.handle(true);
    await watcher.handle(true);
    expect(host.released).toEqual([10]);
    expect(broker.published).toHaveLength(1);
    expect(logger.messages('debug')).toContain('already preparing for shutdown, ignoring repeated signal');
  });

  it('bounds the report so release is never held up', async () => {
    const { host, broker, logger, lock, watcher } = setup(20);
    broker.hangPublishes = true;
    await lock.acquire();
    await watcher.handle(true);
    expect(host.released).toEqual([10]);
    expect(logger.messages('warn')).toEqual(['failed to report preparing-for-shutdown=true: shutdown report timed out after 20ms']);
  });

  it('still releases when the report fails', async () => {
    const { host, broker, logger, lock, watcher } = setup();
    broker.publishError = new Error('client disconnecting');
    await lock.acquire();
    await watcher.handle(true);
    expect(host.released).toEqual([10]);
    expect(logger.messages('warn')).toEqual(['failed to report preparing-for-shutdown=true: client disconnecting']);
  });

  it('works without a reporter', async () => {
    const host = new FakeHost();
    const logger = new RecordingLogger();
    const lock = new InhibitorLock(host, logger);
    const watcher = new ShutdownSignalWatcher({ lock, signals: new FakeSignals(), logger, reportTimeoutMs: 10 });
    await lock.acquire();
    await watcher.handle(true);
    await watcher.handle(false);
    expect(host.calls).toEqual(['inhibit', 'releaseLock', 'inhibit']);
    expect(logger.messages('info')).toEqual(['system preparing for shutdown', 'system shutdown cancelled']);
  });

  it('ends run() when stopped', async () => {
    const { signals, watcher } = setup();
    const loop = watcher.run();
    await vi.waitFor(() => expect(signals.subscribeCalls).toBe(1));
    watcher.stop();
    await loop;
    expect(signals.closed).toBe(true);
  });

  it('does not subscribe after stop()', async () => {
    const { signals, watcher } = setup();
    watcher.stop();
    await watcher.run();
    expect(signals.subscribeCalls).toBe(0);
  });
});
