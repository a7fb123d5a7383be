import test from "node:test";
import assert from "node:assert/strict";
import { KeyedLock, RoomLock } from "./roomLock.ts";
import { sleep } from "../utils.ts";

test("RoomLock never lets two holders overlap", async () => {
  const lock = new RoomLock();
  let active = 0;
  let maxActive = 0;
  const order: number[] = [];

  await Promise.all(
    [1, 2, 3].map((id) =>
      lock.runExclusive(async () => {
        active += 1;
        maxActive = Math.max(maxActive, active);
        await sleep(5);
        order.push(id);
        active -= 1;
      })
    )
  );

  assert.equal(maxActive, 1);
  assert.deepEqual(order, [1, 2, 3]);
  assert.equal(lock.isLocked, false);
});

test("RoomLock releases after a rejected holder", async () => {
  const lock = new RoomLock();
  await assert.rejects(
    lock.runExclusive(async () => {
      throw new Error("boom");
    }),
    /boom/
  );
  assert.equal(lock.isLocked, false);
  assert.equal(await lock.runExclusive(async () => "next"), "next");
});

test("KeyedLock serializes per key and runs different keys in parallel", async () => {
  const locks = new KeyedLock();
  const events: string[] = [];
  const hold = (key: string, label: string, ms: number) =>
    locks.run(key, async () => {
      events.push(`start:${label}`);
      await sleep(ms);
      events.push(`end:${label}`);
    });

  await Promise.all([hold("room-1", "a", 20), hold("room-1", "b", 1), hold("room-2", "c", 1)]);

  assert.ok(events.indexOf("end:a") < events.indexOf("start:b"));
  assert.ok(events.indexOf("start:c") < events.indexOf("end:a"));
  assert.equal(locks.isLocked("room-1"), false);
});
