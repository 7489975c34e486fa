/**
 * Secret - a credential held in a zero-fillable buffer
 *
 * The value is only turned back into a string by reveal(), right before it is
 * serialized into a request body. dispose() overwrites the buffer.
 */

import { inspect } from 'node:util';
import { BirdDogArgumentError } from './errors.js';

const REDACTED = '[Secret]';

export class Secret {
  private buffer: Buffer;
  private disposed = false;

  private constructor(buffer: Buffer) {
    this.buffer = buffer;
  }

  static from(value: string): Secret {
    return new Secret(Buffer.from(value, 'utf8'));
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  reveal(): string {
    if (this.disposed) {
      throw new BirdDogArgumentError('Secret has already been disposed');
    }
    return this.buffer.toString('utf8');
  }

  dispose(): void {
    this.buffer.fill(0);
    this.buffer = Buffer.alloc(0);
    this.disposed = true;
  }

  // Keep the value out of logs and JSON dumps
  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [inspect.custom](): string {
    return REDACTED;
  }
}
