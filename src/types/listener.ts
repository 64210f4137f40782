/**
 * Listener Configuration Types
 */

export type ListenerTransport =
  | { kind: 'tcp'; host: string; port: number }
  | { kind: 'unix'; path: string };

/**
 * Chosen once at startup and applied to every accepted connection.
 * A timeout of 0 disables that deadline.
 */
export interface ListenerConfig {
  readonly transport: ListenerTransport;
  readonly readTimeoutMs: number;
  readonly writeTimeoutMs: number;
}

/**
 * Listener error codes
 */
export const LISTENER_ERROR = {
  ADDRESS_IN_USE: 'ADDRESS_IN_USE',
  BIND_FAILURE: 'BIND_FAILURE',
} as const;
