"use strict";

export type ByteSource = Uint8Array | ArrayBufferLike;

export const toDataView = (source: ByteSource): DataView =>
  ArrayBuffer.isView(source)
    ? new DataView(source.buffer, source.byteOffset, source.byteLength)
    : new DataView(source);

export const toHex32 = (value: number, width = 0): string => {
  const masked = Number(value >>> 0);
  return "0x" + masked.toString(16).padStart(width, "0");
};

export const matchesBytes = (dataView: DataView, offset: number, expected: Uint8Array): boolean => {
  if (offset < 0 || offset + expected.length > dataView.byteLength) return false;
  return expected.every((byteValue, index) => dataView.getUint8(offset + index) === byteValue);
};
