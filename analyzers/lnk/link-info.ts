"use strict";

import { toHex32 } from "../../binary-utils.js";
import { MalformedLnkError } from "./errors.js";
import type { LnkLinkInfoLocation, LnkTargetStrings } from "./types.js";
import {
  HAS_LINK_TARGET_ID_LIST,
  IS_UNICODE,
  LINK_INFO_HEADER_SIZE,
  LINK_INFO_UNICODE_HEADER_SIZE,
  SHELL_LINK_HEADER_SIZE,
  linkFlag,
  readNullTerminatedString
} from "./utils.js";

const LOCAL_BASE_PATH_OFFSET = 0x10;
const COMMON_PATH_SUFFIX_OFFSET = 0x18;
const LOCAL_BASE_PATH_OFFSET_UNICODE = 0x1c;
const COMMON_PATH_SUFFIX_OFFSET_UNICODE = 0x20;

type TargetPathStrings = Pick<LnkTargetStrings, "basePath" | "pathSuffix">;

export const locateLinkInfo = (dv: DataView, linkFlags: number): LnkLinkInfoLocation => {
  const hasIdList = linkFlag(linkFlags, HAS_LINK_TARGET_ID_LIST);
  // IDListSize does not count its own two bytes.
  const idListLength = hasIdList ? dv.getUint16(SHELL_LINK_HEADER_SIZE, true) + 2 : 0;
  const offset = SHELL_LINK_HEADER_SIZE + idListLength;
  if (offset + LINK_INFO_HEADER_SIZE > dv.byteLength) {
    throw new MalformedLnkError(
      `LinkInfo at ${toHex32(offset)} extends beyond the data (${dv.byteLength} bytes).`
    );
  }
  return { hasIdList, idListLength, offset };
};

const readAnsiTarget = (dv: DataView, offset: number): TargetPathStrings => ({
  basePath: readNullTerminatedString(
    dv,
    offset + dv.getUint8(offset + LOCAL_BASE_PATH_OFFSET),
    false,
    "LocalBasePath"
  ),
  pathSuffix: readNullTerminatedString(
    dv,
    offset + dv.getUint8(offset + COMMON_PATH_SUFFIX_OFFSET),
    false,
    "CommonPathSuffix"
  )
});

const readUnicodeTarget = (dv: DataView, offset: number): TargetPathStrings => {
  if (offset + LINK_INFO_UNICODE_HEADER_SIZE > dv.byteLength) {
    throw new MalformedLnkError("LinkInfo Unicode offsets are truncated.");
  }
  return {
    basePath: readNullTerminatedString(
      dv,
      offset + dv.getUint32(offset + LOCAL_BASE_PATH_OFFSET_UNICODE, true),
      true,
      "LocalBasePathUnicode"
    ),
    pathSuffix: readNullTerminatedString(
      dv,
      offset + dv.getUint32(offset + COMMON_PATH_SUFFIX_OFFSET_UNICODE, true),
      true,
      "CommonPathSuffixUnicode"
    )
  };
};

/**
 * Reads the local base path and common path suffix from the LinkInfo at `offset`.
 *
 * The Unicode offsets are only used when the link is flagged IsUnicode and the LinkInfo
 * header is larger than the 28-byte form, which stands in for the format's own rule of
 * a header size of at least 0x24.
 */
export const readLinkInfoTarget = (dv: DataView, offset: number, linkFlags: number): LnkTargetStrings => {
  const headerSize = dv.getUint32(offset + 0x04, true);
  const isUnicode = linkFlag(linkFlags, IS_UNICODE) && headerSize > LINK_INFO_HEADER_SIZE;
  const strings = isUnicode ? readUnicodeTarget(dv, offset) : readAnsiTarget(dv, offset);
  return { headerSize, isUnicode, ...strings };
};
