import { test } from "node:test";
import assert from "node:assert/strict";
import { digestOf, ResultCache } from "../src/services/ocr/resultCache.js";

test("put evicts the oldest insertion once capacity is exceeded", () => {
  const cache = new ResultCache<string>(2);
  cache.put("a", "first");
  cache.put("b", "second");
  cache.put("c", "third");

  assert.equal(cache.size, 2);
  assert.equal(cache.has("a"), false);
  assert.equal(cache.get("b"), "second");
  assert.equal(cache.get("c"), "third");
});

test("reads do not refresh an entry's position", () => {
  const cache = new ResultCache<string>(2);
  cache.put("a", "first");
  cache.put("b", "second");
  assert.equal(cache.get("a"), "first");
  cache.put("c", "third");

  assert.equal(cache.get("a"), undefined);
  assert.equal(cache.get("b"), "second");
});

test("overwriting a key keeps its slot and does not grow the cache", () => {
  const cache = new ResultCache<string>(2);
  cache.put("a", "first");
  cache.put("b", "second");
  cache.put("a", "updated");

  assert.equal(cache.size, 2);
  assert.equal(cache.get("a"), "updated");

  cache.put("c", "third");
  assert.equal(cache.has("a"), false);
  assert.equal(cache.get("b"), "second");
});

test("size never exceeds capacity across many inserts", () => {
  const cache = new ResultCache<number>(3);
  for (let i = 0; i < 50; i += 1) {
    cache.put(`key-${i}`, i);
    assert.ok(cache.size <= 3);
  }
  assert.deepEqual(
    ["key-47", "key-48", "key-49"].map((key) => cache.get(key)),
    [47, 48, 49]
  );
});

test("digestOf is the hex SHA-256 of the bytes", () => {
  assert.equal(digestOf(Buffer.from("abc")), "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  assert.equal(digestOf(Buffer.from("abc")), digestOf(Buffer.from("abc")));
  assert.notEqual(digestOf(Buffer.from("abc")), digestOf(Buffer.from("abd")));
});
