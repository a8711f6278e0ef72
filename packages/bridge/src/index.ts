export { BridgeClient, DEFAULT_BRIDGE_URL } from "./bridge-client.js";
export type { BridgeClientOptions } from "./bridge-client.js";
export { BridgeTransportError } from "./errors.js";
export { readSnapshot } from "./snapshot.js";
