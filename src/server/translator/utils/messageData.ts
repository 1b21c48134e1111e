/**
 * Composite message-data field codec
 *
 * The upstream carries a message's identity as one opaque string: a small
 * protobuf message (field 1 = uuid string, field 3 = Timestamp{seconds, nanos})
 * serialized and encoded as URL-safe base64 without padding.
 */

import { BridgeError } from "../../../shared/errors.js";

export interface MessageData {
  uuid?: string;
  seconds?: number;
  nanos?: number;
}

const WIRE_VARINT = 0;
const WIRE_FIXED64 = 1;
const WIRE_LENGTH_DELIMITED = 2;
const WIRE_FIXED32 = 5;

const FIELD_UUID = 1;
const FIELD_TIMESTAMP = 3;
const FIELD_SECONDS = 1;
const FIELD_NANOS = 2;

const MAX_NANOS = 999_999_999;

function invalid(message: string): BridgeError {
  return new BridgeError("translation_error", `Invalid message data: ${message}`);
}

// Arithmetic instead of bit operators: seconds may exceed 32 bits
function writeVarint(value: number, out: number[]): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw invalid(`${value} is not a non-negative integer`);
  }
  let remaining = value;
  while (remaining >= 0x80) {
    out.push((remaining % 0x80) | 0x80);
    remaining = Math.floor(remaining / 0x80);
  }
  out.push(remaining);
}

function readVarint(buf: Uint8Array, offset: number): { value: number; next: number } {
  let value = 0;
  let multiplier = 1;
  let i = offset;

  while (i < buf.length) {
    const byte = buf[i];
    i++;
    value += (byte & 0x7f) * multiplier;
    if ((byte & 0x80) === 0) {
      return { value, next: i };
    }
    multiplier *= 0x80;
    if (multiplier > Number.MAX_SAFE_INTEGER) {
      break;
    }
  }

  throw invalid("truncated or oversized varint");
}

function writeKey(field: number, wireType: number, out: number[]): void {
  writeVarint(field * 8 + wireType, out);
}

function skipField(buf: Uint8Array, offset: number, wireType: number): number {
  switch (wireType) {
    case WIRE_VARINT:
      return readVarint(buf, offset).next;
    case WIRE_FIXED64:
      return offset + 8;
    case WIRE_FIXED32:
      return offset + 4;
    case WIRE_LENGTH_DELIMITED: {
      const { value, next } = readVarint(buf, offset);
      return next + value;
    }
    default:
      throw invalid(`unsupported wire type ${wireType}`);
  }
}

function encodeTimestamp(seconds: number | undefined, nanos: number | undefined): number[] {
  const out: number[] = [];
  if (seconds !== undefined) {
    writeKey(FIELD_SECONDS, WIRE_VARINT, out);
    writeVarint(seconds, out);
  }
  if (nanos !== undefined) {
    if (nanos > MAX_NANOS) {
      throw invalid(`nanos ${nanos} out of range`);
    }
    writeKey(FIELD_NANOS, WIRE_VARINT, out);
    writeVarint(nanos, out);
  }
  return out;
}

function decodeTimestamp(buf: Uint8Array): { seconds?: number; nanos?: number } {
  const result: { seconds?: number; nanos?: number } = {};
  let i = 0;
  while (i < buf.length) {
    const key = readVarint(buf, i);
    const field = Math.floor(key.value / 8);
    const wireType = key.value % 8;
    i = key.next;

    if (wireType === WIRE_VARINT && (field === FIELD_SECONDS || field === FIELD_NANOS)) {
      const { value, next } = readVarint(buf, i);
      i = next;
      if (field === FIELD_SECONDS) result.seconds = value;
      else result.nanos = value;
    } else {
      i = skipField(buf, i, wireType);
    }
  }
  if (i > buf.length) {
    throw invalid("truncated timestamp");
  }
  return result;
}

export function encodeMessageData(data: MessageData): string {
  const out: number[] = [];

  if (data.uuid !== undefined) {
    const bytes = Buffer.from(data.uuid, "utf-8");
    writeKey(FIELD_UUID, WIRE_LENGTH_DELIMITED, out);
    writeVarint(bytes.length, out);
    out.push(...bytes);
  }

  if (data.seconds !== undefined || data.nanos !== undefined) {
    const timestamp = encodeTimestamp(data.seconds, data.nanos);
    writeKey(FIELD_TIMESTAMP, WIRE_LENGTH_DELIMITED, out);
    writeVarint(timestamp.length, out);
    out.push(...timestamp);
  }

  return Buffer.from(out).toString("base64url");
}

export function decodeMessageData(value: string): MessageData {
  const normalized = value.trim().replace(/-/g, "+").replace(/_/g, "/");
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(normalized)) {
    throw invalid("not base64");
  }
  const unpadded = normalized.replace(/=+$/, "");
  if (unpadded.length % 4 === 1) {
    throw invalid("impossible base64 length");
  }
  const padded = unpadded + "=".repeat((4 - (unpadded.length % 4)) % 4);
  const buf = Buffer.from(padded, "base64");

  const result: MessageData = {};
  let i = 0;
  while (i < buf.length) {
    const key = readVarint(buf, i);
    const field = Math.floor(key.value / 8);
    const wireType = key.value % 8;
    i = key.next;

    if (wireType === WIRE_LENGTH_DELIMITED && (field === FIELD_UUID || field === FIELD_TIMESTAMP)) {
      const length = readVarint(buf, i);
      const end = length.next + length.value;
      if (end > buf.length) {
        throw invalid("truncated field");
      }
      const slice = buf.subarray(length.next, end);
      i = end;

      if (field === FIELD_UUID) {
        result.uuid = slice.toString("utf-8");
      } else {
        Object.assign(result, decodeTimestamp(slice));
      }
    } else {
      i = skipField(buf, i, wireType);
    }
  }

  if (i > buf.length) {
    throw invalid("truncated field");
  }
  return result;
}

export function messageDataFromDate(uuid: string, date: Date): MessageData {
  const ms = date.getTime();
  return {
    uuid,
    seconds: Math.floor(ms / 1000),
    nanos: (ms % 1000) * 1_000_000,
  };
}
