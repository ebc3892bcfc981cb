import test from "node:test";
import assert from "node:assert/strict";
import { createCooldown } from "../src/cooldown.js";

test("a label never triggered is eligible", () => {
  const cd = createCooldown(10_000);
  assert.equal(cd.isEligible("Alice", 0), true);
  assert.equal(cd.lastTriggered("Alice"), undefined);
});

test("a label is held back inside the window and eligible at its end", () => {
  const cd = createCooldown(10_000);
  cd.stamp("Alice", 1_000);

  assert.equal(cd.isEligible("Alice", 1_000), false);
  assert.equal(cd.isEligible("Alice", 10_999), false);
  assert.equal(cd.isEligible("Alice", 11_000), true);
  assert.equal(cd.isEligible("Alice", 50_000), true);
});

test("labels cool down independently", () => {
  const cd = createCooldown(10_000);
  cd.stamp("Alice", 0);

  assert.equal(cd.isEligible("Bob", 1), true);
  cd.stamp("Bob", 5_000);
  assert.equal(cd.isEligible("Alice", 10_000), true);
  assert.equal(cd.isEligible("Bob", 10_000), false);
  assert.equal(cd.lastTriggered("Bob"), 5_000);
});
