import type { Writable } from 'stream';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('output');

export interface LineSink {
  write(line: string): void | Promise<void>;
  /** True once nothing more can be written. */
  readonly closed: boolean;
}

function isBrokenPipe(error: Error): boolean {
  return 'code' in error && error.code === 'EPIPE';
}

/**
 * Newline-terminated lines onto a stream, waiting out backpressure. A reader
 * that goes away (EPIPE) closes the writer; any other stream error is kept
 * for `throwIfFailed`.
 */
export class StreamLineWriter implements LineSink {
  private readonly stream: Writable;
  private ended = false;
  private failure: Error | null = null;

  constructor(stream: Writable) {
    this.stream = stream;
    stream.on('error', (error: Error) => this.handleError(error));
  }

  get closed(): boolean {
    return this.ended;
  }

  async write(line: string): Promise<void> {
    if (this.ended) return;
    if (!this.stream.write(`${line}\n`)) {
      await this.waitForDrain();
    }
  }

  throwIfFailed(): void {
    if (this.failure) {
      throw this.failure;
    }
  }

  private waitForDrain(): Promise<void> {
    return new Promise((resolve) => {
      const settle = (): void => {
        this.stream.off('drain', settle);
        this.stream.off('error', settle);
        this.stream.off('close', settle);
        resolve();
      };
      this.stream.on('drain', settle);
      this.stream.on('error', settle);
      this.stream.on('close', settle);
    });
  }

  private handleError(error: Error): void {
    this.ended = true;
    if (isBrokenPipe(error)) {
      logger.info('Output closed by its reader');
      return;
    }
    this.failure = error;
  }
}
