/**
 * ServerView - live Ink display of a running server
 *
 * Shows the bound address, a counter and the most recent exchanges.
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useApp, useInput } from 'ink';
import { type Exchange, type Server, formatLocator } from 'persona';
import { formatExchange } from '../format.js';

interface ServerViewProps {
  server: Server;
  /** How many exchanges to keep on screen */
  history?: number;
}

export const ServerView: React.FC<ServerViewProps> = ({ server, history = 10 }) => {
  const { exit } = useApp();
  const [exchanges, setExchanges] = useState<Exchange[]>([]);
  const [handled, setHandled] = useState(0);
  const [lastError, setLastError] = useState('');

  useEffect(() => {
    const onExchange = (exchange: Exchange) => {
      setHandled((count) => count + 1);
      setExchanges((previous) => [...previous, exchange].slice(-history));
    };
    const onError = (err: Error) => {
      setLastError(err.message);
    };

    server.on('exchange', onExchange);
    server.on('error', onError);
    return () => {
      server.off('exchange', onExchange);
      server.off('error', onError);
    };
  }, [server, history]);

  useInput((input) => {
    if (input === 'q') {
      exit();
    }
  });

  const address = server.address ? formatLocator(server.address) : 'not bound';

  return (
    <Box flexDirection="column">
      <Box>
        <Text color="green">Listening on {address}</Text>
        <Text color="gray">  ({handled} handled, q to quit)</Text>
      </Box>
      <Box flexDirection="column" marginTop={1}>
        {exchanges.length === 0 ? (
          <Text color="gray">Waiting for connections...</Text>
        ) : (
          exchanges.map((exchange, index) => (
            <Text key={index} color={exchange.outcome.ok ? undefined : 'yellow'}>
              {formatExchange(exchange)}
            </Text>
          ))
        )}
      </Box>
      {lastError !== '' ? (
        <Box marginTop={1}>
          <Text color="red">Last error: {lastError}</Text>
        </Box>
      ) : null}
    </Box>
  );
};
