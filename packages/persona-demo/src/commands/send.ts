/**
 * Send command - build one request, send it, print the raw reply
 */

import { Command } from 'commander';
import { RequestBuilder, parseMethod, sendRequest } from 'persona';

interface SendOptions {
  method: string;
  target: string;
  header: string[];
  data?: string;
  timeout: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export const sendCommand = new Command('send')
  .description('Send a single request and print the response')
  .argument('<address>', 'Address to connect to (host:port)')
  .option('-X, --method <method>', 'Request method', 'GET')
  .option('-t, --target <target>', 'Request target', '/')
  .option('-H, --header <name:value>', 'Add a header (repeatable)', collect, [])
  .option('-d, --data <body>', 'Request body; a matching Content-Length is added')
  .option('--timeout <ms>', 'Give up after this many milliseconds', '10000')
  .action(async (address: string, options: SendOptions) => {
    const method = parseMethod(options.method);
    if (method === null) {
      console.error(`Unknown method: ${options.method}`);
      process.exit(1);
    }

    let builder = RequestBuilder.create().method(method).target(options.target);

    try {
      for (const raw of options.header) {
        const colon = raw.indexOf(':');
        if (colon === -1) {
          throw new Error(`Header must look like name:value, got "${raw}"`);
        }
        builder = builder.header(raw.slice(0, colon).trim(), raw.slice(colon + 1).trim());
      }
    } catch (err) {
      console.error(err instanceof Error ? err.message : err);
      process.exit(1);
    }

    if (options.data !== undefined) {
      builder = builder.body(options.data).contentLength();
    }

    try {
      const reply = await sendRequest(address, builder.build(), {
        timeout: parseInt(options.timeout, 10),
      });
      process.stdout.write(Buffer.from(reply));
      process.stdout.write('\n');
    } catch (err) {
      console.error('Request failed:', err instanceof Error ? err.message : err);
      process.exit(1);
    }
  });
