import { describe, it, expect } from 'vitest';
import {
  CancellationGate,
  CancellationSource,
  NEVER_CANCELLED,
  fromAbortSignal,
} from '../cancellation/cancellation.js';
import type { CancellationToken } from '../cancellation/cancellation.js';
import { DownloadError } from '../errors/index.js';

describe('CancellationSource', () => {
  it('should flip its token once cancelled', () => {
    const source = new CancellationSource();
    expect(source.token.isCancellationRequested()).toBe(false);

    source.cancel();

    expect(source.token.isCancellationRequested()).toBe(true);
    expect(source.isCancellationRequested).toBe(true);
  });
});

describe('fromAbortSignal', () => {
  it('should follow the signal', () => {
    const controller = new AbortController();
    const token = fromAbortSignal(controller.signal);
    expect(token.isCancellationRequested()).toBe(false);

    controller.abort();

    expect(token.isCancellationRequested()).toBe(true);
  });
});

describe('CancellationGate', () => {
  it('should pass while nothing is requested', () => {
    const gate = new CancellationGate(NEVER_CANCELLED);

    expect(gate.isCancelled()).toBe(false);
    expect(() => gate.check()).not.toThrow();
  });

  it('should throw CANCELLED with the given details', () => {
    const source = new CancellationSource();
    const gate = new CancellationGate(source.token);
    source.cancel();

    expect(() => gate.check({ path: 'a.txt' })).toThrow(DownloadError);
    let thrown: unknown;
    try {
      gate.check({ path: 'a.txt' });
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toMatchObject({ code: 'CANCELLED', details: { path: 'a.txt' } });
  });

  it('should stay closed once it has seen a request', () => {
    let requested = true;
    const token: CancellationToken = { isCancellationRequested: () => requested };
    const gate = new CancellationGate(token);

    expect(gate.isCancelled()).toBe(true);
    requested = false;

    expect(gate.isCancelled()).toBe(true);
  });

  it('should poll the token on every check', () => {
    let polls = 0;
    const gate = new CancellationGate({
      isCancellationRequested: () => {
        polls++;
        return false;
      },
    });

    gate.check();
    gate.check();
    gate.isCancelled();

    expect(polls).toBe(3);
  });
});
