/**
 * Example endpoint callbacks and gates, wired by main.ts and described in
 * config.example.json.
 */

import type { Gate, RemoteHandler } from "@remote-firewall/common";
import type { CallerId } from "@remote-firewall/core";
import { registerCallback, registerGate } from "./handler-registry.js";

const ITEM_PATTERN = /^[a-z][a-z0-9_]{2,31}$/;
const ITEM_PRICES: Record<string, number> = {
  iron_sword: 120,
  wooden_shield: 45,
  health_potion: 15,
};
const CHAT_CHANNELS = ["global", "team", "trade"];
const EQUIP_SLOTS = ["head", "body", "weapon", "offhand"];

export interface PurchaseReceipt {
  itemId: string;
  qty: number;
  total: number;
}

/** Rejects every call from a caller in `banned`. */
export function createBanListGate(banned: Iterable<CallerId>): Gate {
  const set = new Set(banned);
  return (call) => !set.has(call.callerId);
}

/**
 * Register the example callbacks against a handler's assertions and log.
 */
export function registerExampleHandlers(params: {
  handler: RemoteHandler;
  bannedCallers?: Iterable<CallerId>;
}): void {
  const { handler, bannedCallers = [] } = params;
  const { assertions, eventLog } = handler;

  registerGate("notBanned", createBanListGate(bannedCallers));

  // shop.purchase(itemId: string, qty: range[1,10]) -> PurchaseReceipt | nothing
  registerCallback("shop.purchase", (_callerId, logIndex, itemId, qty): PurchaseReceipt | undefined => {
    if (!assertions.assertStringPattern(logIndex, itemId, ITEM_PATTERN, "itemId")) return undefined;
    if (typeof itemId !== "string" || typeof qty !== "number") return undefined;
    const price = ITEM_PRICES[itemId];
    if (!assertions.assertNotNil(logIndex, price, "price")) return undefined;
    eventLog.info(logIndex, `purchased ${qty} x ${itemId}`);
    return { itemId, qty, total: price * qty };
  });

  // chat.send(message: string, channel: string?)
  registerCallback("chat.send", (callerId, logIndex, message, channel) => {
    const target = channel ?? "global";
    const ok =
      assertions.assertStringLength(logIndex, message, 1, 200, "message") &&
      assertions.assertInList(logIndex, target, CHAT_CHANNELS, "channel");
    if (ok) eventLog.info(logIndex, `${callerId} -> #${String(target)}`);
  });

  // inventory.equip(slot: string, itemId: string|integer)
  registerCallback("inventory.equip", (_callerId, logIndex, slot, itemId) => {
    if (!assertions.assertInList(logIndex, slot, EQUIP_SLOTS, "slot")) return false;
    if (!assertions.assertType(logIndex, itemId, "string|integer", "itemId")) return false;
    eventLog.info(logIndex, `equipped ${String(itemId)} in ${String(slot)}`);
    return true;
  });
}
