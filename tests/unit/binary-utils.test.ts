"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { matchesBytes, toDataView, toHex32 } from "../../binary-utils.js";

void test("toDataView keeps the byte offset of typed array views", () => {
  const backing = Uint8Array.of(1, 2, 3, 4, 5);
  const dv = toDataView(backing.subarray(2));
  assert.strictEqual(dv.byteLength, 3);
  assert.strictEqual(dv.getUint8(0), 3);
});

void test("toDataView wraps a whole ArrayBuffer", () => {
  const dv = toDataView(Uint8Array.of(9, 8).buffer);
  assert.strictEqual(dv.byteLength, 2);
  assert.strictEqual(dv.getUint8(1), 8);
});

void test("toHex32 formats unsigned values", () => {
  assert.strictEqual(toHex32(0xfc), "0xfc");
  assert.strictEqual(toHex32(-1), "0xffffffff");
  assert.strictEqual(toHex32(0x1c, 4), "0x001c");
});

void test("matchesBytes compares a run of bytes at an offset", () => {
  const dv = toDataView(Uint8Array.of(0, 0xaa, 0xbb, 0xcc));
  assert.strictEqual(matchesBytes(dv, 1, Uint8Array.of(0xaa, 0xbb)), true);
  assert.strictEqual(matchesBytes(dv, 2, Uint8Array.of(0xaa, 0xbb)), false);
  assert.strictEqual(matchesBytes(dv, 3, Uint8Array.of(0xcc, 0xdd)), false);
  assert.strictEqual(matchesBytes(dv, -1, Uint8Array.of(0)), false);
});
