import type { MessageSink, TapMessage } from '@tap-nomad/shared';

export interface WritableLike {
  write(chunk: string): unknown;
}

/**
 * Writes one JSON document per line. stdout is reserved for this stream;
 * logs go to stderr.
 */
export class JsonLinesSink implements MessageSink {
  private readonly out: WritableLike;

  constructor(out: WritableLike = process.stdout) {
    this.out = out;
  }

  write(message: TapMessage): void {
    this.out.write(`${JSON.stringify(message)}\n`);
  }
}
