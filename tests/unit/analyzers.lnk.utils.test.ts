"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { MalformedLnkError } from "../../analyzers/lnk/errors.js";
import { linkFlag, readGuid, readNullTerminatedString } from "../../analyzers/lnk/utils.js";
import { makeNullTerminatedUnicode, viewOf, writeGuid } from "../fixtures/lnk-fixture-helpers.js";

const SHELL_LINK_CLSID = "00021401-0000-0000-c000-000000000046";

void test("readNullTerminatedString stops at the first NUL byte", () => {
  const dv = viewOf(Uint8Array.of(0x41, 0x42, 0x00, 0x43, 0x00));
  assert.strictEqual(readNullTerminatedString(dv, 0, false, "Text"), "AB");
  assert.strictEqual(readNullTerminatedString(dv, 2, false, "Text"), "");
  assert.strictEqual(readNullTerminatedString(dv, 3, false, "Text"), "C");
});

void test("readNullTerminatedString stops at the first zero UTF-16 unit", () => {
  // 0x0100 has a zero high byte but is not a terminator.
  const dv = viewOf(Uint8Array.of(0x00, 0x01, 0x06, 0x26, 0x00, 0x00, 0x41, 0x00));
  assert.strictEqual(readNullTerminatedString(dv, 0, true, "Text"), "Ā☆");
});

void test("readNullTerminatedString decodes a UTF-16 string written by the fixtures", () => {
  const dv = viewOf(makeNullTerminatedUnicode("C:\\ノート"));
  assert.strictEqual(readNullTerminatedString(dv, 0, true, "Text"), "C:\\ノート");
});

void test("readNullTerminatedString rejects offsets outside the data", () => {
  const dv = viewOf(Uint8Array.of(0x41, 0x00));
  assert.throws(() => readNullTerminatedString(dv, 2, false, "LocalBasePath"), {
    name: "MalformedLnkError",
    message: "LocalBasePath offset 0x2 is outside the data (2 bytes)."
  });
  assert.throws(() => readNullTerminatedString(dv, -1, false, "LocalBasePath"), MalformedLnkError);
});

void test("readNullTerminatedString rejects a UTF-16 string cut by the end of the data", () => {
  const dv = viewOf(Uint8Array.of(0x41, 0x00, 0x42));
  assert.throws(() => readNullTerminatedString(dv, 0, true, "CommonPathSuffixUnicode"), {
    name: "MalformedLnkError",
    message: "CommonPathSuffixUnicode at 0x0 is not terminated before the end of the data."
  });
});

void test("readNullTerminatedString keeps unpaired surrogates", () => {
  const dv = viewOf(Uint8Array.of(0x41, 0x00, 0x00, 0xdc, 0x00, 0x00));
  assert.strictEqual(readNullTerminatedString(dv, 0, true, "Text"), "A\uDC00");
});

void test("readGuid formats the Shell Link class identifier", () => {
  const bytes = new Uint8Array(20);
  writeGuid(bytes, 4, SHELL_LINK_CLSID);
  assert.strictEqual(readGuid(viewOf(bytes), 4), SHELL_LINK_CLSID);
  assert.strictEqual(readGuid(viewOf(bytes), 5), null);
});

void test("linkFlag tests a single mask", () => {
  assert.strictEqual(linkFlag(0x81, 0x80), true);
  assert.strictEqual(linkFlag(0x81, 0x02), false);
});
