import assert from "node:assert/strict";
import { test } from "node:test";
import { parseStrictFloat, roundHalfEven, roundToInt32 } from "./numbers.js";

test("decimal literals parse in full", () => {
  assert.equal(parseStrictFloat("21"), 21);
  assert.equal(parseStrictFloat("-3.5"), -3.5);
  assert.equal(parseStrictFloat("+.25"), 0.25);
  assert.equal(parseStrictFloat("7."), 7);
  assert.equal(parseStrictFloat("1.5e2"), 150);
  assert.equal(parseStrictFloat("2E-1"), 0.2);
});

test("leading whitespace is skipped but trailing text is rejected", () => {
  assert.equal(parseStrictFloat("  \t42"), 42);
  assert.equal(parseStrictFloat("42 "), null);
  assert.equal(parseStrictFloat("42abc"), null);
  assert.equal(parseStrictFloat("1e"), null);
  assert.equal(parseStrictFloat("1e+"), null);
  assert.equal(parseStrictFloat("."), null);
});

test("empty and non-numeric strings are rejected", () => {
  assert.equal(parseStrictFloat(""), null);
  assert.equal(parseStrictFloat("   "), null);
  assert.equal(parseStrictFloat("abc"), null);
  assert.equal(parseStrictFloat("0b101"), null);
  assert.equal(parseStrictFloat("1,5"), null);
});

test("hexadecimal literals use a binary exponent", () => {
  assert.equal(parseStrictFloat("0x10"), 16);
  assert.equal(parseStrictFloat("0x1.8p3"), 12);
  assert.equal(parseStrictFloat("-0X.8"), -0.5);
  assert.equal(parseStrictFloat("0x1p-2"), 0.25);
  assert.equal(parseStrictFloat("0x"), null);
  assert.equal(parseStrictFloat("0x1p"), null);
});

test("infinity and nan spellings are recognized", () => {
  assert.equal(parseStrictFloat("inf"), Infinity);
  assert.equal(parseStrictFloat("-Infinity"), -Infinity);
  assert.ok(Number.isNaN(parseStrictFloat("NaN")));
  assert.ok(Number.isNaN(parseStrictFloat("nan(0x7f)")));
  assert.equal(parseStrictFloat("infin"), null);
});

test("rounding goes to the nearest integer with ties to even", () => {
  assert.equal(roundHalfEven(9.26), 9);
  assert.equal(roundHalfEven(50.51), 51);
  assert.equal(roundHalfEven(-12.79), -13);
  assert.equal(roundHalfEven(0.5), 0);
  assert.equal(roundHalfEven(1.5), 2);
  assert.equal(roundHalfEven(2.5), 2);
  assert.equal(roundHalfEven(-2.5), -2);
  assert.equal(roundHalfEven(-3.5), -4);
});

test("rounding never produces negative zero", () => {
  assert.ok(Object.is(roundHalfEven(-0.3), 0));
  assert.ok(Object.is(roundHalfEven(-0.5), 0));
  assert.ok(Object.is(roundHalfEven(-0), 0));
});

test("int32 rounding rejects values a plain integer cannot print", () => {
  assert.equal(roundToInt32(50.51), 51);
  assert.equal(roundToInt32(2147483646.6), 2147483647);
  assert.equal(roundToInt32(-2147483648.4), -2147483648);
  assert.equal(roundToInt32(2147483647.6), null);
  assert.equal(roundToInt32(-2147483648.6), null);
  assert.equal(roundToInt32(1e22), null);
  assert.equal(roundToInt32(Infinity), null);
  assert.equal(roundToInt32(NaN), null);
});
