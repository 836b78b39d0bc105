"use strict";

import { toDataView } from "../../binary-utils.js";
import type { ByteSource } from "../../binary-utils.js";
import { MalformedLnkError } from "./errors.js";
import { assertTargetType, hasShellLinkSignature as hasSignature, readLinkHeader } from "./header.js";
import { locateLinkInfo, readLinkInfoTarget } from "./link-info.js";
import type { LnkHeaderFields, LnkTargetInfo, LnkTargetType } from "./types.js";

export {
  LnkResolveError,
  LnkTargetTypeMismatchError,
  MalformedLnkError
} from "./errors.js";
export type { LnkTargetInfo, LnkTargetKind, LnkTargetType } from "./types.js";

const decodeTarget = (dv: DataView, header: LnkHeaderFields): LnkTargetInfo => {
  const location = locateLinkInfo(dv, header.linkFlags);
  const strings = readLinkInfoTarget(dv, location.offset, header.linkFlags);
  const path = strings.basePath + strings.pathSuffix;
  if (!path) throw new MalformedLnkError("LinkInfo does not contain a target path.");
  return {
    ...header,
    hasIdList: location.hasIdList,
    idListLength: location.idListLength,
    linkInfoOffset: location.offset,
    linkInfoHeaderSize: strings.headerSize,
    isUnicode: strings.isUnicode,
    basePath: strings.basePath,
    pathSuffix: strings.pathSuffix,
    path
  };
};

export const hasShellLinkSignature = (bytes: ByteSource): boolean => hasSignature(toDataView(bytes));

/**
 * Decodes every field involved in locating the target, without a target type constraint.
 */
export const inspectLnkTarget = (bytes: ByteSource): LnkTargetInfo => {
  const dv = toDataView(bytes);
  return decodeTarget(dv, readLinkHeader(dv));
};

/**
 * Resolves the target path linked by a Shell Link (Windows shortcut).
 *
 * `targetType` restricts which kind of entity the link may point to; the check runs
 * before any LinkInfo offset is followed.
 *
 * @throws MalformedLnkError when the bytes are not a usable Shell Link
 * @throws LnkTargetTypeMismatchError when the link points to the other kind of entity
 */
export const resolveLnkTarget = (bytes: ByteSource, targetType: LnkTargetType = "any"): string => {
  const dv = toDataView(bytes);
  const header = readLinkHeader(dv);
  assertTargetType(header, targetType);
  return decodeTarget(dv, header).path;
};
