"use strict";

export {
  LnkResolveError,
  LnkTargetTypeMismatchError,
  MalformedLnkError,
  hasShellLinkSignature,
  inspectLnkTarget,
  resolveLnkTarget
} from "./analyzers/lnk/index.js";
export type { LnkTargetInfo, LnkTargetKind, LnkTargetType } from "./analyzers/lnk/index.js";
export { hasSubDirectory, listWithResolvedShortcuts } from "./fs/directory-listing.js";
export type { ListOptions, ResolvedEntry } from "./fs/directory-listing.js";
export {
  SHORTCUT_EXTENSION,
  isShortcutPath,
  resolveShortcutFile,
  resolveShortcutFileSync
} from "./fs/shortcut-files.js";
