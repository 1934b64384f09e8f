import { ComponentName } from './types';

/*
 * V3C sample stream (ISO/IEC 23090-5 Annex C) as written by the V-PCC encoder:
 *
 * - 1 byte header: bits 7..5 = unit size precision in bytes, minus 1
 * - repeated: size (big-endian, precision bytes) + unit payload
 *
 * The unit type lives in bits 7..3 of the first payload byte.
 */

export const V3C_VPS = 0; // parameter set
export const V3C_AD = 1; // atlas data
export const V3C_OVD = 2; // occupancy video
export const V3C_GVD = 3; // geometry video
export const V3C_AVD = 4; // attribute video
export const V3C_PVD = 5; // packed video
export const V3C_CAD = 6; // common atlas data

export type V3cUnit = {
  type: number;
  payload: Buffer;
};

export type SampleStream = {
  header: number;
  precision: number;
  units: V3cUnit[];
};

export const COMPONENT_ORDER: readonly ComponentName[] = ['atlas', 'occp', 'geom', 'attr'];

export class SampleStreamError extends Error {
  constructor(message: string, readonly offset: number) {
    super(`${message} at byte ${offset}`);
    this.name = 'SampleStreamError';
  }
}

export function precisionOf(header: number): number {
  return (header >> 5) + 1;
}

export function unitTypeOf(payload: Buffer): number {
  return (payload[0] >> 3) & 0x1f;
}

export function parseSampleStream(bytes: Buffer): SampleStream {
  if (bytes.length === 0) {
    throw new SampleStreamError('empty sample stream', 0);
  }
  const header = bytes[0];
  const precision = precisionOf(header);
  const units: V3cUnit[] = [];

  let offset = 1;
  while (offset < bytes.length) {
    if (offset + precision > bytes.length) {
      throw new SampleStreamError('truncated unit size field', offset);
    }
    let size = 0;
    for (let i = 0; i < precision; i++) size = size * 256 + bytes[offset + i];
    const start = offset + precision;
    const end = start + size;
    if (size === 0) {
      throw new SampleStreamError('zero-length unit', offset);
    }
    if (end > bytes.length) {
      throw new SampleStreamError(`truncated unit (declared ${size} bytes)`, offset);
    }
    const payload = bytes.subarray(start, end);
    const type = unitTypeOf(payload);
    if (type > V3C_CAD) {
      throw new SampleStreamError(`unrecognised V3C unit type ${type}`, offset);
    }
    units.push({ type, payload });
    offset = end;
  }

  return { header, precision, units };
}

// Framing is regenerated from the header's precision
export function writeSampleStream(header: number, units: readonly V3cUnit[]): Buffer {
  const precision = precisionOf(header);
  const limit = 2 ** (8 * precision);
  let total = 1;
  for (const unit of units) {
    if (unit.payload.length >= limit) {
      throw new Error(`unit of ${unit.payload.length} bytes does not fit a ${precision}-byte size field`);
    }
    total += precision + unit.payload.length;
  }

  const out = Buffer.alloc(total);
  out[0] = header;
  let offset = 1;
  for (const unit of units) {
    let size = unit.payload.length;
    for (let i = precision - 1; i >= 0; i--) {
      out[offset + i] = size % 256;
      size = Math.floor(size / 256);
    }
    offset += precision;
    unit.payload.copy(out, offset);
    offset += unit.payload.length;
  }
  return out;
}

export function componentOf(type: number): ComponentName | undefined {
  switch (type) {
    case V3C_AD:
    case V3C_CAD:
      return 'atlas';
    case V3C_OVD:
      return 'occp';
    case V3C_GVD:
      return 'geom';
    case V3C_AVD:
      return 'attr';
    default:
      return undefined;
  }
}

export function isParameterSet(unit: V3cUnit): boolean {
  return unit.type === V3C_VPS;
}

// Keeps the first occurrence of byte-identical units
export function distinctUnits(units: readonly V3cUnit[]): V3cUnit[] {
  const out: V3cUnit[] = [];
  for (const unit of units) {
    if (!out.some((u) => u.payload.equals(unit.payload))) out.push(unit);
  }
  return out;
}
