"use strict";

import { readFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { resolveLnkTarget } from "../analyzers/lnk/index.js";
import type { LnkTargetType } from "../analyzers/lnk/index.js";

export const SHORTCUT_EXTENSION = ".lnk";

export const isShortcutPath = (path: string): boolean =>
  extname(path).toLowerCase() === SHORTCUT_EXTENSION;

export const resolveShortcutFile = async (
  path: string,
  targetType: LnkTargetType = "any"
): Promise<string> => resolveLnkTarget(await readFile(path), targetType);

export const resolveShortcutFileSync = (path: string, targetType: LnkTargetType = "any"): string =>
  resolveLnkTarget(readFileSync(path), targetType);
