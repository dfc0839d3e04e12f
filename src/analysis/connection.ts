/**
 * Connection classification.
 *
 * Infers what a cable carries from the kinds of its two endpoints.
 */

import { isAudioBearing, type ObjectKind } from "../core/object-kind.js";

export type ConnectionType = "audio" | "control" | "message" | "unknown";

/** The part of a node the classifier looks at. */
export interface ClassifiableNode {
  kind: ObjectKind;
}

/**
 * Classify the cable from `source` to `dest`.
 *
 * Control widgets on either end always give "control". Two audio-bearing
 * ends give "audio". A ramp source gives "control". A cable with exactly one
 * audio-bearing end is "control", since a control object cannot be driven by
 * a signal. Anything else is "message".
 */
export function classifyConnection(
  source: ClassifiableNode,
  dest: ClassifiableNode,
): ConnectionType {
  if (source.kind.kind === "control-widget" || dest.kind.kind === "control-widget") {
    return "control";
  }

  const sourceAudio = isAudioBearing(source.kind);
  const destAudio = isAudioBearing(dest.kind);

  if (sourceAudio && destAudio) return "audio";
  if (source.kind.kind === "ramp") return "control";
  if (sourceAudio !== destAudio) return "control";
  return "message";
}
