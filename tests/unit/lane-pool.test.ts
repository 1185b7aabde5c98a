import { createLanePool, type Lane } from "../../src/shared/concurrency/lanePool";

const delay = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe("createLanePool", () => {
  it("never runs two tasks on the same lane at once", async () => {
    const pool = createLanePool(2, 3);
    const busy = new Set<number>();
    const used = new Set<number>();
    let overlap = false;
    let maxBusy = 0;

    await pool.runAll(
      Array.from({ length: 7 }, () => async (lane: Lane) => {
        if (busy.has(lane.id)) overlap = true;
        busy.add(lane.id);
        used.add(lane.id);
        maxBusy = Math.max(maxBusy, busy.size);
        await delay(10);
        busy.delete(lane.id);
      })
    );

    expect(overlap).toBe(false);
    expect(maxBusy).toBe(2);
    expect(Array.from(used).sort()).toEqual([0, 1]);
  });

  it("gives each lane its own bounded call pool", async () => {
    const pool = createLanePool(2, 3);
    const poolsByLane = new Map<number, unknown>();
    let maxCallsPerLane = 0;

    await pool.runAll(
      Array.from({ length: 4 }, () => async (lane: Lane) => {
        poolsByLane.set(lane.id, lane.calls);
        let active = 0;
        await Promise.all(
          Array.from({ length: 8 }, () =>
            lane.calls.submit(async () => {
              active += 1;
              maxCallsPerLane = Math.max(maxCallsPerLane, active);
              await delay(5);
              active -= 1;
            })
          )
        );
      })
    );

    expect(maxCallsPerLane).toBe(3);
    expect(poolsByLane.size).toBe(2);
    expect(poolsByLane.get(0)).not.toBe(poolsByLane.get(1));
  });
});
