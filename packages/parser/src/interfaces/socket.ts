/**
 * Abstract Socket Interface
 *
 * The parser owns no I/O. Transports that want to drive it from a
 * connection adapt their socket to this shape (Node's net.Socket, a
 * test double, anything that delivers bytes in order).
 */

export interface ITcpSocket {
  /** Send data to the remote peer. */
  send(data: Uint8Array): void;

  /** Register a callback for incoming data. */
  onData(cb: (data: Uint8Array) => void): void;

  /** Register a callback for connection close. */
  onClose(cb: (hadError: boolean) => void): void;

  /** Register a callback for errors. */
  onError(cb: (err: Error) => void): void;

  /** Close the connection. */
  close(): void;
}
