"use strict";

import { matchesBytes } from "../../binary-utils.js";
import { LnkTargetTypeMismatchError, MalformedLnkError } from "./errors.js";
import type { LnkHeaderFields, LnkTargetType } from "./types.js";
import {
  FILE_ATTRIBUTES_OFFSET,
  FILE_ATTRIBUTE_DIRECTORY,
  LINK_FLAGS_OFFSET,
  SHELL_LINK_CLSID_BYTES,
  SHELL_LINK_CLSID_OFFSET,
  SHELL_LINK_MIN_SIZE,
  linkFlag,
  readGuid
} from "./utils.js";

export const hasShellLinkSignature = (dv: DataView): boolean =>
  dv.byteLength >= SHELL_LINK_MIN_SIZE &&
  matchesBytes(dv, SHELL_LINK_CLSID_OFFSET, SHELL_LINK_CLSID_BYTES);

export const readLinkHeader = (dv: DataView): LnkHeaderFields => {
  if (dv.byteLength < SHELL_LINK_MIN_SIZE) {
    throw new MalformedLnkError(
      `More data needed to attempt path resolution (${dv.byteLength} bytes, need ${SHELL_LINK_MIN_SIZE}).`
    );
  }
  if (!matchesBytes(dv, SHELL_LINK_CLSID_OFFSET, SHELL_LINK_CLSID_BYTES)) {
    const clsid = readGuid(dv, SHELL_LINK_CLSID_OFFSET) ?? "unknown";
    throw new MalformedLnkError(`LinkCLSID ${clsid} does not match the Shell Link format.`);
  }
  const linkFlags = dv.getUint8(LINK_FLAGS_OFFSET);
  const fileAttributes = dv.getUint8(FILE_ATTRIBUTES_OFFSET);
  return {
    linkFlags,
    fileAttributes,
    linksToDirectory: linkFlag(fileAttributes, FILE_ATTRIBUTE_DIRECTORY)
  };
};

export const assertTargetType = (header: LnkHeaderFields, targetType: LnkTargetType): void => {
  if (targetType === "any") return;
  const actual = header.linksToDirectory ? "directory" : "file";
  if (actual !== targetType) throw new LnkTargetTypeMismatchError(targetType, actual);
};
