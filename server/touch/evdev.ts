import type { Axis } from "./gesture-classifier";

// struct input_event on 64-bit Linux: timeval (2 x int64), u16 type, u16 code, s32 value
export const INPUT_EVENT_SIZE = 24;

export const EV_KEY = 0x01;
export const EV_ABS = 0x03;
export const ABS_X = 0x00;
export const ABS_Y = 0x01;
export const BTN_TOUCH = 0x14a;

export type TouchInputEvent =
  | { kind: "sample"; axis: Axis; value: number }
  | { kind: "down" }
  | { kind: "up" };

export const decodeInputEvent = (type: number, code: number, value: number): TouchInputEvent | null => {
  if (type === EV_ABS) {
    if (code === ABS_X) return { kind: "sample", axis: "x", value };
    if (code === ABS_Y) return { kind: "sample", axis: "y", value };
    return null;
  }
  if (type === EV_KEY && code === BTN_TOUCH) {
    if (value === 1) return { kind: "down" };
    if (value === 0) return { kind: "up" };
  }
  return null;
};

/** Reassembles `input_event` records from arbitrarily split stream chunks. */
export class EvdevDecoder {
  private pending: Buffer = Buffer.alloc(0);

  push(chunk: Buffer): TouchInputEvent[] {
    const buffer = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
    const events: TouchInputEvent[] = [];
    let offset = 0;
    while (offset + INPUT_EVENT_SIZE <= buffer.length) {
      const type = buffer.readUInt16LE(offset + 16);
      const code = buffer.readUInt16LE(offset + 18);
      const value = buffer.readInt32LE(offset + 20);
      const event = decodeInputEvent(type, code, value);
      if (event) events.push(event);
      offset += INPUT_EVENT_SIZE;
    }
    this.pending = Buffer.from(buffer.subarray(offset));
    return events;
  }
}

export const encodeInputEvent = (type: number, code: number, value: number, timeMs = 0): Buffer => {
  const record = Buffer.alloc(INPUT_EVENT_SIZE);
  record.writeBigInt64LE(BigInt(Math.floor(timeMs / 1000)), 0);
  record.writeBigInt64LE(BigInt(Math.floor((timeMs % 1000) * 1000)), 8);
  record.writeUInt16LE(type, 16);
  record.writeUInt16LE(code, 18);
  record.writeInt32LE(value, 20);
  return record;
};
