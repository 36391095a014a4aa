/**
 * Response status codes.
 *
 * Each member maps to its numeric value and reason phrase through STATUS_TABLE;
 * adding a status means adding a member and a table row.
 */

export enum StatusCode {
  SUCCESS = 'SUCCESS',
}

interface StatusInfo {
  readonly value: number;
  readonly reason: string;
}

const STATUS_TABLE: Record<StatusCode, StatusInfo> = {
  [StatusCode.SUCCESS]: { value: 200, reason: 'Success' },
};

/**
 * Numeric status code sent on the wire
 */
export function statusValue(code: StatusCode): number {
  return STATUS_TABLE[code].value;
}

/**
 * Reason phrase following the numeric code on the status line
 */
export function statusReason(code: StatusCode): string {
  return STATUS_TABLE[code].reason;
}
