/**
 * Registry of application callbacks and middleware gates, by name.
 *
 * Endpoint definitions loaded from JSON refer to their callback by endpoint
 * name and to their gates by gate name; both are resolved here at bootstrap.
 */

import type { Gate, RemoteCallback } from "@remote-firewall/common";

const callbacks = new Map<string, RemoteCallback>();
const gates = new Map<string, Gate>();

/**
 * Register the callback for an endpoint (by endpoint name, e.g. "shop.purchase").
 */
export function registerCallback(endpoint: string, callback: RemoteCallback): void {
  callbacks.set(endpoint, callback);
}

export function getCallback(endpoint: string): RemoteCallback | undefined {
  return callbacks.get(endpoint);
}

/**
 * Register a named gate that endpoint definitions can list under `middleware`.
 */
export function registerGate(name: string, gate: Gate): void {
  gates.set(name, gate);
}

export function getGate(name: string): Gate | undefined {
  return gates.get(name);
}

/**
 * Clear all registered callbacks and gates (e.g. on reload).
 */
export function clearHandlers(): void {
  callbacks.clear();
  gates.clear();
}
