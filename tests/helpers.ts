import { Readable, Writable } from 'node:stream';

export interface Capture {
  stream: Writable;
  text(): string;
}

export function capture(): Capture {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

export function input(...lines: string[]): Readable {
  return Readable.from(lines);
}
