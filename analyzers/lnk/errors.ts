"use strict";

import type { LnkTargetKind } from "./types.js";

export class LnkResolveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LnkResolveError";
  }
}

/**
 * The bytes are not a Shell Link, or an offset inside them points outside the data.
 */
export class MalformedLnkError extends LnkResolveError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedLnkError";
  }
}

/**
 * The shortcut decoded fine but points at the other kind of entity than the caller asked for.
 */
export class LnkTargetTypeMismatchError extends LnkResolveError {
  readonly expected: LnkTargetKind;
  readonly actual: LnkTargetKind;

  constructor(expected: LnkTargetKind, actual: LnkTargetKind) {
    super(`Link points to a ${actual}. Expected: ${expected}`);
    this.name = "LnkTargetTypeMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}
