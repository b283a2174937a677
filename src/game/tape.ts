/**
 * Round tapes: a seed plus one intent byte per frame, enough to rebuild a
 * round exactly. All integers are little-endian.
 *
 *   offset  size  field
 *   0       4     magic "RKTP" (0x50544B52)
 *   4       1     format version
 *   5       1     rules tag
 *   6       2     config tag (0 = default round config)
 *   8       4     seed
 *   12      4     frame count N
 *   16      N     intent bytes: bit 0 left, bit 1 right, bit 2 thrust, bit 3 fire
 *   16+N    4     final score
 *   20+N    4     final RNG state
 *   24+N    4     CRC-32 over bytes [0, 16+N)
 */

import { RULES_TAG } from "./constants";
import { TapeFormatError } from "./errors";
import type { FrameIntents } from "./types";

export const TAPE_MAGIC = 0x50544b52;
export const TAPE_VERSION = 1;

export const TAPE_HEADER_SIZE = 16;
export const TAPE_FOOTER_SIZE = 12;

const INTENT_BITS = {
  left: 0x01,
  right: 0x02,
  thrust: 0x04,
  fire: 0x08,
} as const satisfies Record<keyof FrameIntents, number>;

const RESERVED_INTENT_BITS = 0xf0;

export interface TapeHeader {
  magic: number;
  version: number;
  rulesTag: number;
  configTag: number;
  seed: number;
  frameCount: number;
}

export interface TapeFooter {
  finalScore: number;
  finalRngState: number;
  checksum: number;
}

export interface Tape {
  header: TapeHeader;
  inputs: Uint8Array;
  footer: TapeFooter;
}

export function encodeInputByte(intents: FrameIntents): number {
  let byte = 0;
  if (intents.left) byte |= INTENT_BITS.left;
  if (intents.right) byte |= INTENT_BITS.right;
  if (intents.thrust) byte |= INTENT_BITS.thrust;
  if (intents.fire) byte |= INTENT_BITS.fire;
  return byte;
}

export function decodeInputByte(byte: number): FrameIntents {
  const has = (bit: number) => (byte & bit) === bit;
  return {
    left: has(INTENT_BITS.left),
    right: has(INTENT_BITS.right),
    thrust: has(INTENT_BITS.thrust),
    fire: has(INTENT_BITS.fire),
  };
}

// About five minutes of play at 40 fps before the first resize.
const DEFAULT_RECORDER_CAPACITY = 12_000;

/** Append-only intent log kept while a round runs. */
export class TapeRecorder {
  private bytes: Uint8Array;
  private length = 0;

  constructor(initialCapacity = DEFAULT_RECORDER_CAPACITY) {
    this.bytes = new Uint8Array(Math.max(1, initialCapacity));
  }

  record(intents: FrameIntents): void {
    if (this.length === this.bytes.length) {
      const grown = new Uint8Array(this.bytes.length * 2);
      grown.set(this.bytes);
      this.bytes = grown;
    }
    this.bytes[this.length] = encodeInputByte(intents);
    this.length += 1;
  }

  /** View over the recorded bytes; copies nothing. */
  getInputs(): Uint8Array {
    return this.bytes.subarray(0, this.length);
  }

  getFrameCount(): number {
    return this.length;
  }
}

export function serializeTape(
  seed: number,
  inputs: Uint8Array,
  finalScore: number,
  finalRngState: number,
  configTag = 0,
): Uint8Array {
  const bodyEnd = TAPE_HEADER_SIZE + inputs.length;
  const out = new Uint8Array(bodyEnd + TAPE_FOOTER_SIZE);
  const view = new DataView(out.buffer);

  view.setUint32(0, TAPE_MAGIC, true);
  out[4] = TAPE_VERSION;
  out[5] = RULES_TAG;
  view.setUint16(6, configTag & 0xffff, true);
  view.setUint32(8, seed >>> 0, true);
  view.setUint32(12, inputs.length, true);
  out.set(inputs, TAPE_HEADER_SIZE);

  view.setUint32(bodyEnd, finalScore >>> 0, true);
  view.setUint32(bodyEnd + 4, finalRngState >>> 0, true);
  view.setUint32(bodyEnd + 8, crc32(out.subarray(0, bodyEnd)), true);

  return out;
}

function readHeader(view: DataView, maxFrames: number | undefined): TapeHeader {
  const header: TapeHeader = {
    magic: view.getUint32(0, true),
    version: view.getUint8(4),
    rulesTag: view.getUint8(5),
    configTag: view.getUint16(6, true),
    seed: view.getUint32(8, true),
    frameCount: view.getUint32(12, true),
  };

  if (header.magic !== TAPE_MAGIC) {
    throw new TapeFormatError(`Invalid tape magic: 0x${header.magic.toString(16)}`);
  }
  if (header.version !== TAPE_VERSION) {
    throw new TapeFormatError(`Unsupported tape version: ${header.version}`);
  }
  if (header.rulesTag !== RULES_TAG) {
    throw new TapeFormatError(`Unknown rules tag: ${header.rulesTag}`);
  }

  const tooMany = maxFrames !== undefined && header.frameCount > maxFrames;
  if (header.frameCount === 0 || tooMany) {
    const limit = maxFrames === undefined ? "" : ` (max ${maxFrames})`;
    throw new TapeFormatError(`Frame count out of range: ${header.frameCount}${limit}`);
  }

  return header;
}

/**
 * Parse and validate a tape. Structural problems, reserved intent bits and
 * checksum mismatches all raise `TapeFormatError`; the footer's score and
 * RNG state are returned as claimed, not checked.
 */
export function deserializeTape(data: Uint8Array, maxFrames?: number): Tape {
  if (data.length < TAPE_HEADER_SIZE + TAPE_FOOTER_SIZE) {
    throw new TapeFormatError("Tape too short");
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const header = readHeader(view, maxFrames);

  const bodyEnd = TAPE_HEADER_SIZE + header.frameCount;
  const expectedLength = bodyEnd + TAPE_FOOTER_SIZE;
  if (data.length !== expectedLength) {
    throw new TapeFormatError(
      `Tape length mismatch: expected ${expectedLength} bytes, got ${data.length}`,
    );
  }

  const inputs = data.subarray(TAPE_HEADER_SIZE, bodyEnd);
  const reserved = inputs.findIndex((byte) => (byte & RESERVED_INTENT_BITS) !== 0);
  if (reserved !== -1) {
    const byte = inputs[reserved] ?? 0;
    throw new TapeFormatError(
      `Input byte reserved bits set at frame ${reserved}: 0x${byte.toString(16).padStart(2, "0")}`,
    );
  }

  const footer: TapeFooter = {
    finalScore: view.getUint32(bodyEnd, true),
    finalRngState: view.getUint32(bodyEnd + 4, true),
    checksum: view.getUint32(bodyEnd + 8, true),
  };

  const computed = crc32(data.subarray(0, bodyEnd));
  if (computed !== footer.checksum) {
    throw new TapeFormatError(
      `CRC mismatch: stored=0x${footer.checksum.toString(16)}, computed=0x${computed.toString(16)}`,
    );
  }

  return { header, inputs, footer };
}

// Reflected CRC-32, polynomial 0xEDB88320 (zlib, PNG).
const CRC_TABLE = Uint32Array.from({ length: 256 }, (_, index) => {
  let crc = index;
  for (let bit = 0; bit < 8; bit++) {
    crc = crc & 1 ? (crc >>> 1) ^ 0xedb88320 : crc >>> 1;
  }
  return crc >>> 0;
});

export function crc32(data: Uint8Array): number {
  let crc = ~0;
  for (const byte of data) {
    crc = (CRC_TABLE[(crc ^ byte) & 0xff] ?? 0) ^ (crc >>> 8);
  }
  return ~crc >>> 0;
}
