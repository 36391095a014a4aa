/**
 * Parse command - run the request parser over a file or stdin
 */

import { Command } from 'commander';
import * as fs from 'node:fs/promises';
import { PersonaError, parseMessage } from 'persona';
import { describeMessage } from '../format.js';

async function readStdin(): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return new Uint8Array(Buffer.concat(chunks));
}

export const parseCommand = new Command('parse')
  .description('Parse a raw HTTP request and print its structure')
  .argument('[file]', 'File holding the raw request (default: stdin)')
  .action(async (file: string | undefined) => {
    const raw = file ? new Uint8Array(await fs.readFile(file)) : await readStdin();

    try {
      for (const line of describeMessage(parseMessage(raw))) {
        console.log(line);
      }
    } catch (err) {
      if (err instanceof PersonaError) {
        console.error(err.message);
        process.exit(1);
      }
      throw err;
    }
  });
