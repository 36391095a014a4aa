/**
 * Serve command - answer every connection with the fixed hello page
 */

import React from 'react';
import { Command } from 'commander';
import { render } from 'ink';
import { Server, formatLocator, getHeaders } from 'persona';
import { config } from '../config.js';
import { formatExchange } from '../format.js';
import { ServerView } from '../components/ServerView.js';

interface ServeOptions {
  host: string;
  idleTimeout: string;
  verbose: boolean;
  tui: boolean;
}

export const serveCommand = new Command('serve')
  .description('Serve the hello page, one connection at a time')
  .argument('[port]', 'Port to listen on', String(config.port))
  .option('--host <host>', 'Host to bind to', config.host)
  .option('--idle-timeout <ms>', 'Stop reading a request after this long without data', String(config.idleTimeoutMs))
  .option('-v, --verbose', 'Print the headers of each request', false)
  .option('--tui', 'Show a live view instead of log lines', false)
  .action(async (port: string, options: ServeOptions) => {
    const portNum = parseInt(port, 10);
    if (isNaN(portNum) || portNum < 0 || portNum > 65535) {
      console.error('Invalid port number');
      process.exit(1);
    }

    const idleTimeoutMs = parseInt(options.idleTimeout, 10);
    if (isNaN(idleTimeoutMs) || idleTimeoutMs < 1) {
      console.error('Invalid idle timeout');
      process.exit(1);
    }

    if (options.tui && !process.stdin.isTTY) {
      console.error('Error: --tui requires an interactive terminal (TTY).');
      process.exit(1);
    }

    let server: Server;
    try {
      server = await Server.bind({ port: portNum, host: options.host, idleTimeoutMs });
    } catch (err) {
      console.error('Failed to start server:', err instanceof Error ? err.message : err);
      process.exit(1);
    }

    // Ink patches console, so these lines land above the live view in --tui mode.
    server.on('error', (err) => {
      console.error('Connection error:', err.message);
    });

    const serving = server.serve();

    if (options.tui) {
      const { waitUntilExit } = render(<ServerView server={server} />);
      await waitUntilExit();
      await server.close();
      await serving;
      return;
    }

    const address = server.address ? formatLocator(server.address) : `${options.host}:${portNum}`;
    console.log(`Listening on ${address}`);
    console.log('Waiting for connections... (Ctrl+C to stop)');
    console.log('');

    server.on('exchange', (exchange) => {
      console.log(formatExchange(exchange));
      if (options.verbose && exchange.outcome.ok) {
        for (const header of getHeaders(exchange.outcome.request)) {
          console.log(`  ${header.name}: ${header.value}`);
        }
      }
    });

    process.on('SIGINT', async () => {
      console.log('\nShutting down...');
      await server.close();
      process.exit(0);
    });

    await serving;
  });
