import { writeSync } from 'fs';
import type { TerminalOutput } from './canvas.js';

/**
 * Synchronous writer for a file descriptor (stdout by default). Loops until
 * every byte is out; any write error throws straight to the caller.
 */
export function createFdOutput(fd: number = process.stdout.fd): TerminalOutput {
  return {
    write(data: string): void {
      const bytes = Buffer.from(data, 'utf-8');
      let offset = 0;
      while (offset < bytes.length) {
        offset += writeSync(fd, bytes, offset, bytes.length - offset);
      }
    },
  };
}
