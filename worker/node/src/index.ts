/**
 * Firewall worker: config loading, endpoint bootstrap, NATS remote server.
 */

export { loadConfig } from "./config.js";
export type { WorkerProcessConfig } from "./config.js";
export { prepareEndpoints, registerEndpoints, registerPrepared } from "./bootstrap.js";
export {
  registerCallback,
  getCallback,
  registerGate,
  getGate,
  clearHandlers,
} from "./handler-registry.js";
export { registerExampleHandlers, createBanListGate } from "./example-handlers.js";
export type { PurchaseReceipt } from "./example-handlers.js";
export { handleMessage, handleAdminQuery } from "./worker.js";
export type { HandleMessageParams } from "./worker.js";
export { RemoteServer } from "./remote-server.js";
export type { RemoteServerParams } from "./remote-server.js";
export { createNodeJSLogger } from "./logger.js";
