/**
 * Type definitions for the patch tree and speaker geometry.
 *
 * A .maxpat file is decoded into a MaxPatch: an ordered list of boxes and an
 * ordered list of patch cables. Speaker geometry arrives separately as
 * SpeakerArrayRecord values.
 */

// ---------------------------------------------------------------------------
// Patch tree
// ---------------------------------------------------------------------------

/** Layout rectangle: x, y, width, height in patcher pixels. */
export type Rect = [number, number, number, number];

export interface MaxBox {
  /** Box id as written in the patch (e.g. "obj-3"). Unique within a patch. */
  id: string;
  /** The box class (e.g. "newobj", "flonum", "message", "comment"). */
  maxclass: string;
  /** Object name plus arguments for "newobj" and message boxes. */
  text?: string;
  numInlets: number;
  numOutlets: number;
  rect?: Rect;
}

export interface MaxLine {
  /**
   * `[boxId, outletIndex]` as found in the file. Left unvalidated here;
   * the graph builder checks the shape.
   */
  source: unknown;
  /** `[boxId, inletIndex]`, unvalidated. */
  destination: unknown;
}

export interface MaxPatch {
  boxes: MaxBox[];
  lines: MaxLine[];
  rect?: Rect;
  fileVersion?: number;
}

// ---------------------------------------------------------------------------
// Geometry and formats
// ---------------------------------------------------------------------------

export interface SphericalCoord {
  /** Degrees, counter-clockwise from front. */
  azimuth: number;
  /** Degrees above the horizontal plane. */
  elevation: number;
  /** Metres from the listening position. */
  distance: number;
}

export type AudioFormat =
  | { type: "mono" }
  | { type: "stereo" }
  | { type: "multichannel"; channels: number }
  | { type: "ambisonic"; order: number; dimension: number };

// ---------------------------------------------------------------------------
// Speaker geometry records (produced by the speaker-config reader)
// ---------------------------------------------------------------------------

export interface SpeakerRecord {
  id: number;
  azimuth: number;
  elevation: number;
  distance: number;
  /** Seconds. */
  delay: number;
  gain: number;
}

export interface SpeakerArrayRecord {
  /** Output bus the array is routed to. */
  bus: number;
  /** Declared format label, e.g. "wfs", "ring", "dome". */
  format: string;
  name: string;
  speakers: SpeakerRecord[];
}
