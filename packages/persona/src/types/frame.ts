/**
 * Frames are the structural units of a message after its start line:
 * a block of headers or a block of payload bytes.
 */

import type { Header } from './header.js';

export enum FrameType {
  HEADERS = 'headers',
  DATA = 'data',
}

export interface HeadersFrame {
  readonly type: FrameType.HEADERS;
  readonly headers: readonly Header[];
}

export interface DataFrame {
  readonly type: FrameType.DATA;
  readonly payload: Uint8Array;
}

export type Frame = HeadersFrame | DataFrame;

export function headersFrame(headers: readonly Header[]): HeadersFrame {
  return { type: FrameType.HEADERS, headers: [...headers] };
}

export function dataFrame(payload: Uint8Array): DataFrame {
  return { type: FrameType.DATA, payload: payload.slice() };
}
