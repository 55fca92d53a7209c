/**
 * Remote server: connects to NATS, subscribes one queue-group subscription per
 * registered endpoint plus the admin subject, and runs every message through
 * the firewall.
 */

import { connect, StringCodec, type Msg, type NatsConnection, type Subscription } from "nats";
import { adminSubject, callSubject, errorMessage } from "@remote-firewall/core";
import type { Logger, RemoteHandler } from "@remote-firewall/common";
import type { WorkerProcessConfig } from "./config.js";
import { prepareEndpoints, registerEndpoints, registerPrepared } from "./bootstrap.js";
import { handleAdminQuery, handleMessage } from "./worker.js";

const LOG_PREFIX = "firewall-worker:remote-server";
const sc = StringCodec();

export interface RemoteServerParams {
  config: WorkerProcessConfig;
  handler: RemoteHandler;
  log?: Logger;
}

export class RemoteServer {
  private config: WorkerProcessConfig;
  private handler: RemoteHandler;
  private log: Logger;
  private connection: NatsConnection | null = null;
  private subscriptions = new Map<string, Subscription>();

  constructor(params: RemoteServerParams) {
    const fallback: Logger = console;
    this.config = params.config;
    this.handler = params.handler;
    this.log = params.log ?? fallback;
  }

  /**
   * Apply firewall options, register endpoints, connect and subscribe.
   */
  async start(): Promise<void> {
    this.handler.configure(this.config.firewall);
    registerEndpoints({ handler: this.handler, definitions: this.config.endpoints, log: this.log });

    this.log.info?.(
      { natsUrl: this.config.natsUrl, connectionName: this.config.connectionName },
      `${LOG_PREFIX}:start - Connecting`
    );
    this.connection = await connect({
      servers: this.config.natsUrl,
      name: this.config.connectionName,
    });
    this.log.info?.({}, `${LOG_PREFIX}:start - Connected`);

    this.subscribeAll(this.connection);
    this.handler.start();
  }

  /**
   * Subscribe every registered endpoint (and the admin subject) not yet subscribed.
   */
  private subscribeAll(connection: NatsConnection): void {
    const admin = adminSubject(this.config.subjectPrefix);
    if (!this.subscriptions.has(admin)) {
      const sub = connection.subscribe(admin);
      this.subscriptions.set(admin, sub);
      this.runSubscription(sub, async (msg) => {
        if (!msg.reply) return;
        const reply = handleAdminQuery({ body: msg.data, handler: this.handler, log: this.log });
        msg.respond(sc.encode(JSON.stringify(reply)));
      });
    }

    for (const endpoint of this.handler.endpointNames()) {
      const subject = callSubject(this.config.subjectPrefix, endpoint);
      if (this.subscriptions.has(subject)) continue;
      const sub = connection.subscribe(subject, { queue: this.config.queueGroup });
      this.subscriptions.set(subject, sub);
      this.runSubscription(sub, async (msg) => {
        const reply = await handleMessage({ body: msg.data, endpoint, handler: this.handler, log: this.log });
        if (reply !== undefined && msg.reply) {
          msg.respond(sc.encode(JSON.stringify(reply)));
        }
      });
    }

    this.log.info?.(
      { subscriptions: this.subscriptions.size, queueGroup: this.config.queueGroup },
      `${LOG_PREFIX}:subscribeAll - Subscribed`
    );
  }

  /**
   * Consume one subscription. Messages are handled concurrently; a failure in one
   * never stops the loop.
   */
  private runSubscription(sub: Subscription, onMessage: (msg: Msg) => Promise<void>): void {
    (async () => {
      for await (const msg of sub) {
        onMessage(msg).catch((err: unknown) => {
          this.log.error?.(
            { subject: msg.subject, error: errorMessage(err) },
            `${LOG_PREFIX}:runSubscription - Handle failed`
          );
          if (msg.reply) {
            msg.respond(
              sc.encode(
                JSON.stringify({
                  ok: false,
                  error: { code: "INTERNAL_ERROR", message: "Worker error" },
                })
              )
            );
          }
        });
      }
    })().catch((err: unknown) => {
      this.log.error?.(
        { subject: sub.getSubject(), error: errorMessage(err) },
        `${LOG_PREFIX}:runSubscription - Subscription loop error`
      );
    });
  }

  /**
   * Reload: reapply firewall options while calls are in flight, register and
   * subscribe endpoints that are new in the config. All-or-nothing: the firewall
   * options and every new definition are checked first, and a failure leaves the
   * running configuration untouched.
   */
  async reload(newConfig: WorkerProcessConfig): Promise<void> {
    this.log.info?.({}, `${LOG_PREFIX}:reload - Reloading`);
    const next = { ...newConfig, subjectPrefix: this.config.subjectPrefix, queueGroup: this.config.queueGroup };
    this.handler.config.preview(next.firewall);
    const registrations = prepareEndpoints({ handler: this.handler, definitions: next.endpoints, log: this.log });

    this.config = next;
    this.handler.configure(next.firewall);
    registerPrepared({ handler: this.handler, registrations, log: this.log });
    if (this.connection) {
      this.subscribeAll(this.connection);
    }
    this.log.info?.({}, `${LOG_PREFIX}:reload - Reload complete`);
  }

  /**
   * Stop: drain subscriptions, close connection, stop log compaction.
   */
  async stop(): Promise<void> {
    this.log.info?.({}, `${LOG_PREFIX}:stop - Stopping`);
    for (const sub of this.subscriptions.values()) {
      await sub.drain();
    }
    this.subscriptions.clear();
    if (this.connection) {
      await this.connection.close();
      this.connection = null;
    }
    this.handler.stop();
    this.log.info?.({}, `${LOG_PREFIX}:stop - Stopped`);
  }
}
