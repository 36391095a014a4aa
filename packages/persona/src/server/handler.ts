/**
 * Request handlers: turn the outcome of parsing one connection's bytes into a response
 */

import { MessageBuilder } from '../builder/message-builder.js';
import type { PersonaError } from '../types/errors.js';
import type { RequestMessage, ResponseMessage } from '../types/message.js';

export type ParseOutcome =
  | { readonly ok: true; readonly request: RequestMessage }
  | { readonly ok: false; readonly error: PersonaError };

export type RequestHandler = (outcome: ParseOutcome) => ResponseMessage;

export const SERVER_NAME = 'Persona';
export const SERVER_VERSION = '0.1';

export const HELLO_PAGE = `<html>
    <p>Hello, world!</p>
</html>
`;

/**
 * Answer every connection, well-formed or not, with the same HTML page
 */
export const helloHandler: RequestHandler = () => {
  return MessageBuilder.create()
    .header('Server', `${SERVER_NAME}/${SERVER_VERSION}`)
    .header('Content-type', 'text/html')
    .header('Content-Length', String(Buffer.byteLength(HELLO_PAGE, 'utf8')))
    .body(HELLO_PAGE)
    .build();
};
