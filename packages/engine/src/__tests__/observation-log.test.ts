import { describe, it, expect, beforeEach } from '@jest/globals';
import { DeterministicClock } from '@faultline/adapters';

import { ChaosError } from '../errors.js';
import { ObservationLog } from '../observation-log.js';

const EPOCH = Date.UTC(2026, 2, 1, 12, 0, 0);

let clock: DeterministicClock;
let log: ObservationLog;

beforeEach(() => {
  clock = new DeterministicClock(EPOCH);
  log = new ObservationLog(clock);
});

function events(): string[] {
  return log.snapshot().map((o) => `${o.target}:${o.event}`);
}

describe('ObservationLog.record', () => {
  it('stamps the observation with the clock time', () => {
    clock.advance(1_500);
    const obs = log.record('db', 'slow_query', { rows: 3 });

    expect(obs.timestamp.toISOString()).toBe('2026-03-01T12:00:01.500Z');
    expect(obs.details).toEqual({ rows: 3 });
    expect(log.size).toBe(1);
  });

  it('defaults details to an empty object', () => {
    expect(log.record('db', 'ping').details).toEqual({});
  });

  it('keeps record order', () => {
    log.record('a', 'one');
    log.record('b', 'two');
    log.record('a', 'three');
    expect(events()).toEqual(['a:one', 'b:two', 'a:three']);
  });
});

describe('ObservationLog.snapshot', () => {
  it('returns a copy that does not share state with the log', () => {
    log.record('db', 'ping', { attempt: 1 });

    const copy = log.snapshot();
    copy.pop();
    expect(log.size).toBe(1);

    const [first] = log.snapshot();
    if (!first) throw new Error('expected one observation');
    first.details['attempt'] = 99;
    expect(log.snapshot()[0]?.details).toEqual({ attempt: 1 });
  });
});

describe('ObservationLog.clear', () => {
  it('discards every observation', () => {
    log.record('a', 'one');
    log.record('b', 'two');
    log.clear();
    expect(log.size).toBe(0);
    expect(log.snapshot()).toEqual([]);
  });
});

describe('ObservationLog.scoped', () => {
  it('records start and end without a prefix and returns the value', async () => {
    const value = await log.scoped('llm', () => 'answer');
    expect(value).toBe('answer');
    expect(events()).toEqual(['llm:start', 'llm:end']);
  });

  it('joins the prefix with an underscore', async () => {
    await log.scoped('db', async () => 1, 'query');
    expect(events()).toEqual(['db:query_start', 'db:query_end']);
  });

  it('records the failure category and message, then rethrows the same error', async () => {
    const failure = new ChaosError(503, 'down');

    await expect(
      log.scoped(
        'db',
        async () => {
          throw failure;
        },
        'query',
      ),
    ).rejects.toBe(failure);

    const [, errorEvent] = log.snapshot();
    expect(errorEvent?.event).toBe('query_error');
    expect(errorEvent?.details).toEqual({
      errorType: 'ChaosError',
      category: 'application',
      message: '[503] down',
    });
    expect(log.size).toBe(2);
  });

  it('captures errors that are not simulated failures', async () => {
    await expect(
      log.scoped('parser', () => {
        throw new TypeError('bad input');
      }),
    ).rejects.toThrow(TypeError);

    expect(log.snapshot()[1]?.details).toEqual({
      errorType: 'TypeError',
      category: null,
      message: 'bad input',
    });
  });

  it('keeps a start before every end when scopes interleave', async () => {
    const targets = Array.from({ length: 20 }, (_, i) => `worker-${i}`);

    await Promise.all(
      targets.map((target) =>
        log.scoped(target, async () => {
          await Promise.resolve();
          log.record(target, 'work');
        }),
      ),
    );

    expect(log.size).toBe(60);
    const seen = events();
    for (const target of targets) {
      const start = seen.indexOf(`${target}:start`);
      const work = seen.indexOf(`${target}:work`);
      const end = seen.indexOf(`${target}:end`);
      expect(start).toBeLessThan(work);
      expect(work).toBeLessThan(end);
    }
    // Every start is recorded before the first scope resumes.
    expect(seen.slice(0, 20)).toEqual(targets.map((t) => `${t}:start`));
  });
});
