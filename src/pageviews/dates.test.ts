import assert from "node:assert/strict";
import test from "node:test";

import { alignToBucket, enumerateBuckets, formatApiTimestamp, parseApiTimestamp } from "./dates.js";

const utc = (...parts: [number, number, number, number?]): Date =>
  new Date(Date.UTC(parts[0], parts[1] - 1, parts[2], parts[3] ?? 0));

test("parseApiTimestamp reads day and hour stamps as UTC", () => {
  assert.deepEqual(parseApiTimestamp("20240229"), utc(2024, 2, 29));
  assert.deepEqual(parseApiTimestamp("2024022912"), utc(2024, 2, 29, 12));
});

test("parseApiTimestamp rejects impossible or differently shaped stamps", () => {
  assert.equal(parseApiTimestamp("20230229"), null);
  assert.equal(parseApiTimestamp("2024010124"), null);
  assert.equal(parseApiTimestamp("2024-01-01"), null);
  assert.equal(parseApiTimestamp("2024011"), null);
});

test("formatApiTimestamp pads every field", () => {
  assert.equal(formatApiTimestamp(utc(2016, 1, 5, 7)), "2016010507");
  assert.equal(formatApiTimestamp(utc(2024, 12, 31)), "2024123100");
});

test("enumerateBuckets includes both ends of a daily range", () => {
  const buckets = enumerateBuckets(new Date(Date.UTC(2024, 0, 30, 15)), utc(2024, 2, 2), "daily");

  assert.deepEqual(buckets, [utc(2024, 1, 30), utc(2024, 1, 31), utc(2024, 2, 1), utc(2024, 2, 2)]);
});

test("enumerateBuckets steps monthly buckets across a year boundary", () => {
  const buckets = enumerateBuckets(utc(2023, 11, 15), utc(2024, 2, 1), "monthly");

  assert.deepEqual(buckets, [utc(2023, 11, 1), utc(2023, 12, 1), utc(2024, 1, 1), utc(2024, 2, 1)]);
});

test("enumerateBuckets walks hours across midnight", () => {
  const start = new Date(Date.UTC(2024, 0, 1, 22, 30));
  const buckets = enumerateBuckets(start, utc(2024, 1, 2, 1), "hourly");

  assert.deepEqual(buckets.map(formatApiTimestamp), ["2024010122", "2024010123", "2024010200", "2024010201"]);
});

test("alignToBucket drops sub-bucket precision", () => {
  const moment = new Date(Date.UTC(2024, 4, 17, 9, 45, 12));

  assert.equal(formatApiTimestamp(alignToBucket(moment, "hourly")), "2024051709");
  assert.equal(formatApiTimestamp(alignToBucket(moment, "daily")), "2024051700");
  assert.equal(formatApiTimestamp(alignToBucket(moment, "monthly")), "2024050100");
});
