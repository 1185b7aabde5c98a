import { createWorkerPool, type SettledHandler, type SettledTask, type WorkerPool } from "./workerPool";

/**
 * Two-tier pool: `lanes` outer slots, each owning one inner call pool that
 * lives as long as the lane pool does. A task borrows a whole lane.
 */
export type Lane = {
  id: number;
  calls: WorkerPool;
};

export type LaneTask<T> = (lane: Lane) => Promise<T>;

export type LanePool = {
  runAll<T>(tasks: Array<LaneTask<T>>, onSettled?: SettledHandler<T>): Promise<Array<SettledTask<T>>>;
};

export const createLanePool = (lanes: number, threadsPerLane: number): LanePool => {
  const outer = createWorkerPool("lanes", lanes);
  const idle: Lane[] = Array.from({ length: lanes }, (_, id) => ({
    id,
    calls: createWorkerPool(`lane-${id}-calls`, threadsPerLane)
  }));

  const onLane = <T>(task: LaneTask<T>) => async (): Promise<T> => {
    const lane = idle.pop();
    if (!lane) {
      throw new Error("no idle lane available");
    }
    try {
      return await task(lane);
    } finally {
      idle.push(lane);
    }
  };

  return {
    runAll: <T>(tasks: Array<LaneTask<T>>, onSettled?: SettledHandler<T>) =>
      outer.runAll(tasks.map((task) => onLane(task)), onSettled)
  };
};
