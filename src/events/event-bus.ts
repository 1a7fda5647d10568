import { EventEmitter } from 'events';
import { ModelRangeWarning } from '../core/types';

// === Typed Event Payloads ===

export interface RunStartedPayload {
  runId: string;
  tournamentName: string;
  numEntrants: number;
  trials: number;
  seed: number | null;
  parallel: boolean;
}

export interface RunCompletedPayload {
  runId: string;
  tournamentName: string;
  totalTrials: number;
  durationMs: number;
  favourite: string | null;
  favouriteProbability: number;
}

export interface ModelRangeWarningPayload {
  runId: string;
  warning: ModelRangeWarning;
}

// === Event Map ===

export interface SimulationEventMap {
  'run-started': RunStartedPayload;
  'run-completed': RunCompletedPayload;
  'model-range-warning': ModelRangeWarningPayload;
}

export type SimulationEventName = keyof SimulationEventMap;

export const SIMULATION_EVENTS: readonly SimulationEventName[] = [
  'run-started',
  'run-completed',
  'model-range-warning',
];

// === Typed Event Bus ===

class TypedEventBus {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  on<K extends SimulationEventName>(
    event: K,
    listener: (payload: SimulationEventMap[K]) => void,
  ): void {
    this.emitter.on(event, listener);
  }

  off<K extends SimulationEventName>(
    event: K,
    listener: (payload: SimulationEventMap[K]) => void,
  ): void {
    this.emitter.off(event, listener);
  }

  emit<K extends SimulationEventName>(
    event: K,
    payload: SimulationEventMap[K],
  ): void {
    this.emitter.emit(event, payload);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}

// Singleton export
export const eventBus = new TypedEventBus();
