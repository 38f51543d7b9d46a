/**
 * Denoise Transport Interface
 *
 * Bidirectional byte stream to a remote denoising endpoint. Sending and
 * receiving may run concurrently on the same transport.
 */

export interface IDenoiseTransport {
  /**
   * Whether the underlying connection is open for writing
   */
  readonly isOpen: boolean;

  /**
   * Write one payload of raw PCM bytes
   */
  send(data: Buffer): Promise<void>;

  /**
   * Wait for the next payload from the endpoint
   * @param signal - Aborting rejects the pending wait
   * @returns The payload, or null once the connection has closed
   */
  receive(signal?: AbortSignal): Promise<Buffer | null>;

  /**
   * Close the connection; safe to call more than once
   */
  close(): Promise<void>;
}

/**
 * Opens a transport to the given URL; rejects when the handshake fails
 */
export type DenoiseTransportFactory = (url: string) => Promise<IDenoiseTransport>;
