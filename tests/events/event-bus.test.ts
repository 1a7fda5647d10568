import { describe, it, expect, vi, afterEach } from 'vitest';
import { eventBus, SIMULATION_EVENTS } from '../../src/events/event-bus';

afterEach(() => {
  eventBus.removeAllListeners();
});

describe('eventBus', () => {
  it('delivers payloads to listeners of the event', () => {
    const started = vi.fn();
    const completed = vi.fn();
    eventBus.on('run-started', started);
    eventBus.on('run-completed', completed);

    const payload = { runId: 'r1', tournamentName: 'T', numEntrants: 4, trials: 10, seed: 1, parallel: false };
    eventBus.emit('run-started', payload);

    expect(started).toHaveBeenCalledWith(payload);
    expect(completed).not.toHaveBeenCalled();
  });

  it('stops delivering after off', () => {
    const listener = vi.fn();
    eventBus.on('model-range-warning', listener);
    eventBus.off('model-range-warning', listener);
    eventBus.emit('model-range-warning', {
      runId: 'r1',
      warning: { player1: 'A', player2: 'B', round: 1, ratingDiff: 1, rawProbability: 1.2, occurrences: 1 },
    });
    expect(listener).not.toHaveBeenCalled();
  });

  it('lists every relayed event', () => {
    expect(SIMULATION_EVENTS).toEqual(['run-started', 'run-completed', 'model-range-warning']);
  });
});
