/**
 * OSC responder descriptors.
 *
 * Every converted project listens on the standard source, speaker, reverb
 * and master addresses; `spat5.osc.route` boxes add their own addresses.
 */

import { tokenize } from "../core/object-kind.js";
import { int, scObject, symbol, type ScObject } from "./sc-object.js";
import type { MaxPatch } from "../types.js";

export interface OscRoute {
  address: string;
  /** Id of the routing box that handles the address. */
  boxId: string;
}

export const OSC_RECEIVE_PORT = 57120;

const ROUTE_OBJECT = "spat5.osc.route";

const STANDARD_ROUTES: ReadonlyArray<{ address: string; handler: string }> = [
  { address: "/source/*/xyz", handler: "handle_source_position" },
  { address: "/speaker/*/gain", handler: "handle_speaker_gain" },
  { address: "/reverb/*", handler: "handle_reverb" },
  { address: "/master/*", handler: "handle_master" },
];

/**
 * Collect the addresses of every `spat5.osc.route` box in patch order. When
 * two boxes route the same address the later box handles it.
 */
export function extractOscRoutes(patch: MaxPatch): OscRoute[] {
  const routes = new Map<string, string>();

  for (const box of patch.boxes) {
    const [name, ...args] = tokenize(box.text ?? "");
    if (name !== ROUTE_OBJECT) continue;
    for (const arg of args) {
      if (arg.startsWith("/")) routes.set(arg, box.id);
    }
  }

  return [...routes].map(([address, boxId]) => ({ address, boxId }));
}

/** Standard responders first, then one per patch route. */
export function generateOscResponders(routes: readonly OscRoute[]): ScObject[] {
  const standard = STANDARD_ROUTES.map(({ address, handler }) =>
    responder(address, handler, "Standard spatial control"),
  );
  const custom = routes.map(({ address, boxId }) =>
    responder(address, `handle_${sanitizeId(boxId)}`, `Route from ${boxId}`),
  );
  return [...standard, ...custom];
}

function responder(address: string, handler: string, comment: string): ScObject {
  return scObject("OSCdef")
    .method("new")
    .arg(symbol(responderKey(address)))
    .arg(symbol(handler))
    .arg(address)
    .prop("recvPort", int(OSC_RECEIVE_PORT))
    .prop("comment", comment)
    .build();
}

// "/source/*/xyz" → "osc_source_xyz"
export function responderKey(address: string): string {
  return `osc${address.replace(/[^A-Za-z0-9]+/g, "_")}`.replace(/_+$/, "");
}

function sanitizeId(id: string): string {
  return id.replace(/[- ]/g, "_");
}
