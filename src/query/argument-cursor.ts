import { TooFewArgumentsError } from '../errors.js';

/**
 * Single-pass, in-order view over the runtime arguments of one invocation.
 * A fresh cursor is allocated for every call.
 */
export class ArgumentCursor {
  private position = 0;

  constructor(
    private readonly args: readonly unknown[],
    private readonly methodName: string,
  ) {}

  next(): unknown {
    if (this.position >= this.args.length) {
      throw new TooFewArgumentsError(this.methodName);
    }
    const value = this.args[this.position];
    this.position += 1;
    return value;
  }
}
