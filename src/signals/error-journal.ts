import { CircularBuffer } from '../utils/circular-buffer.js';
import type { SignalBoard } from './signal-board.js';

/**
 * Keeps the messages of errors accepted by a SignalBoard, newest last,
 * for the final result. Oldest entries are dropped past `capacity`.
 */
export class ErrorJournal {
  private entries: CircularBuffer<string>;

  constructor(capacity: number) {
    this.entries = new CircularBuffer(capacity);
  }

  attach(board: SignalBoard): () => void {
    const listener = (error: Error) => this.record(error);
    board.on('error', listener);
    return () => {
      board.off('error', listener);
    };
  }

  record(error: Error): void {
    this.entries.push(error.message);
  }

  messages(): string[] {
    return this.entries.toArray();
  }

  get dropped(): number {
    return this.entries.overwritten;
  }
}
