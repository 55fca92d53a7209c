/**
 * Per-endpoint middleware gates.
 *
 * Gates run strictly in the order they were added and the first reject
 * stops the chain. A gate that throws counts as a reject and leaves an
 * error sub-event on the call's log entry.
 */

import { errorMessage, type CallerId, type EndpointKind, type LogIndex } from "@remote-firewall/core";
import type { EventLog } from "./event-log.js";
import { resolveLogger, type Logger, type LoggerFactory } from "./logger.js";

const SERVICE_NAME = "firewall-common:middleware-chain";

/** What a gate sees of the call it is judging. */
export interface GateCall {
  callerId: CallerId;
  /** Undefined when the call was not sampled for logging */
  logIndex: LogIndex | undefined;
  endpoint: EndpointRef;
  args: readonly unknown[];
}

/** Read-only view of the endpoint a gate is attached to. */
export interface EndpointRef {
  name: string;
  kind: EndpointKind;
}

export type Gate = (call: GateCall) => boolean;

export type GateOutcome =
  | { accepted: true }
  | { accepted: false; gateIndex: number; threw: boolean; message: string };

export class MiddlewareChain {
  private chains = new Map<string, Gate[]>();
  private eventLog: EventLog;
  private log: Logger;

  constructor(params: { eventLog: EventLog; loggerFactory?: LoggerFactory }) {
    this.eventLog = params.eventLog;
    this.log = resolveLogger(params.loggerFactory, SERVICE_NAME);
  }

  add(endpoint: string, gate: Gate): void {
    const chain = this.chains.get(endpoint);
    if (chain) {
      chain.push(gate);
    } else {
      this.chains.set(endpoint, [gate]);
    }
  }

  run(call: GateCall): GateOutcome {
    const chain = this.chains.get(call.endpoint.name);
    if (!chain) return { accepted: true };

    // Snapshot so a gate that adds middleware does not extend the running chain.
    const gates = [...chain];
    for (let gateIndex = 0; gateIndex < gates.length; gateIndex++) {
      let accepted: boolean;
      try {
        accepted = gates[gateIndex](call) === true;
      } catch (err) {
        const message = `gate #${gateIndex + 1} threw: ${errorMessage(err)}`;
        this.eventLog.error(call.logIndex, message, "MIDDLEWARE_REJECTED");
        this.log.warn?.(
          { endpoint: call.endpoint.name, callerId: call.callerId, gateIndex, error: errorMessage(err) },
          `${SERVICE_NAME}:run - Gate threw`
        );
        return { accepted: false, gateIndex, threw: true, message };
      }
      if (!accepted) {
        return { accepted: false, gateIndex, threw: false, message: `rejected by gate #${gateIndex + 1}` };
      }
    }
    return { accepted: true };
  }

  size(endpoint: string): number {
    return this.chains.get(endpoint)?.length ?? 0;
  }
}
