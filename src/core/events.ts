import { EventEmitter } from 'eventemitter3';
import type { BenchEvents } from './types.js';

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof BenchEvents>(event: K, listener: (data: BenchEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof BenchEvents>(event: K, listener: (data: BenchEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof BenchEvents>(event: K, listener: (data: BenchEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof BenchEvents>(event: K, data: BenchEvents[K]): void {
    this.emitter.emit(event, data);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
