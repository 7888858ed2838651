/**
 * Transport Contracts
 *
 * The command protocol and the instrument controllers only ever talk to
 * these interfaces; concrete drivers live next to them.
 */

/**
 * Line-oriented byte stream, e.g. the MCU's UART.
 */
export interface TransportChannel {
  /** Port path or resource name, also the key for exclusive ownership */
  readonly path: string;

  isOpen(): boolean;
  open(): Promise<void>;
  close(): Promise<void>;

  /** Write raw text; the caller supplies the line terminator */
  write(data: string): Promise<void>;

  /**
   * Next complete line with its terminator stripped, or null when none
   * arrives within `timeoutMs`.
   */
  readLine(timeoutMs: number): Promise<string | null>;

  /** Drop buffered lines and any partial line not yet consumed */
  discardPendingInput(): Promise<void>;
}

/**
 * Query/response instrument link, e.g. a SCPI socket.
 */
export interface InstrumentTransport {
  readonly resource: string;

  isOpen(): boolean;
  open(): Promise<void>;
  close(): Promise<void>;

  /** Send a command that produces no reply */
  write(command: string): Promise<void>;

  /**
   * Send a query and return its reply line.
   * Rejects with CommunicationTimeoutError when no reply arrives in time.
   */
  query(command: string, timeoutMs: number): Promise<string>;

  /** Send a query whose reply is an IEEE 488.2 definite-length block */
  queryBinary(command: string, timeoutMs: number): Promise<Buffer>;
}
