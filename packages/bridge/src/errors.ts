/** Raised inside the client for a failed bridge round-trip; never escapes it. */
export class BridgeTransportError extends Error {
  readonly method: string;

  constructor(message: string, method: string) {
    super(message);
    this.name = "BridgeTransportError";
    this.method = method;
  }
}
