/**
 * Persona - minimal HTTP/1.1 message codec and single-connection server
 *
 * Parses the bytes of one request into a structured message and serializes
 * structured messages back into wire bytes.
 */

// Message model
export * from './types/index.js';

// Wire format
export * from './wire/index.js';

// Builders
export * from './builder/index.js';

// Server shell and client
export * from './server/index.js';
