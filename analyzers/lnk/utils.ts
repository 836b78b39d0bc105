"use strict";

import { toHex32 } from "../../binary-utils.js";
import { MalformedLnkError } from "./errors.js";

export const SHELL_LINK_HEADER_SIZE = 0x4c;
// Anything shorter cannot hold a header plus a LinkInfo with a path.
export const SHELL_LINK_MIN_SIZE = 0xff;
export const SHELL_LINK_CLSID_OFFSET = 0x04;
export const SHELL_LINK_CLSID_BYTES = Uint8Array.of(
  0x01, 0x14, 0x02, 0x00, 0x00, 0x00, 0x00, 0x00,
  0xc0, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x46
);

export const LINK_FLAGS_OFFSET = 0x14;
export const FILE_ATTRIBUTES_OFFSET = 0x18;

export const HAS_LINK_TARGET_ID_LIST = 0x01;
export const IS_UNICODE = 0x80;
export const FILE_ATTRIBUTE_DIRECTORY = 0x10;

export const LINK_INFO_HEADER_SIZE = 0x1c;
export const LINK_INFO_UNICODE_HEADER_SIZE = 0x24;

export const linkFlag = (flags: number, mask: number): boolean => (flags & mask) !== 0;

export const readGuid = (dv: DataView, offset: number): string | null => {
  if (offset + 16 > dv.byteLength) return null;
  const data1 = dv.getUint32(offset, true).toString(16).padStart(8, "0");
  const data2 = dv.getUint16(offset + 4, true).toString(16).padStart(4, "0");
  const data3 = dv.getUint16(offset + 6, true).toString(16).padStart(4, "0");
  const b: string[] = [];
  for (let i = 0; i < 8; i += 1) {
    b.push(dv.getUint8(offset + 8 + i).toString(16).padStart(2, "0"));
  }
  return `${data1}-${data2}-${data3}-${b.slice(0, 2).join("")}-${b.slice(2).join("")}`.toLowerCase();
};

/**
 * Reads a NUL-terminated string of 8-bit or UTF-16LE code units starting at `offset`.
 * The terminator is not part of the result. Throws when the scan leaves the buffer.
 */
export const readNullTerminatedString = (
  dv: DataView,
  offset: number,
  isUnicode: boolean,
  label: string
): string => {
  if (offset < 0 || offset >= dv.byteLength) {
    throw new MalformedLnkError(
      `${label} offset ${toHex32(offset)} is outside the data (${dv.byteLength} bytes).`
    );
  }
  // Code units are kept as read, unpaired surrogates included.
  const unitSize = isUnicode ? 2 : 1;
  const codes: number[] = [];
  for (let i = offset; i + unitSize <= dv.byteLength; i += unitSize) {
    const code = isUnicode ? dv.getUint16(i, true) : dv.getUint8(i);
    if (code === 0) return String.fromCharCode(...codes);
    codes.push(code);
  }
  throw new MalformedLnkError(`${label} at ${toHex32(offset)} is not terminated before the end of the data.`);
};
