/**
 * Bounded worker pool with submit / await-all semantics.
 * Usage:
 *   const pool = createWorkerPool("calls", 20);
 *   const settled = await pool.runAll(items.map((i) => () => call(i)));
 * `runAll` resolves once every task settled; entries are in completion order.
 */
export type PoolTask<T> = () => Promise<T>;

export type SettledTask<T> =
  | { status: "fulfilled"; index: number; value: T }
  | { status: "rejected"; index: number; reason: unknown };

export type SettledHandler<T> = (settled: SettledTask<T>) => void | Promise<void>;

export type WorkerPool = {
  submit<T>(task: PoolTask<T>): Promise<T>;
  runAll<T>(tasks: Array<PoolTask<T>>, onSettled?: SettledHandler<T>): Promise<Array<SettledTask<T>>>;
};

export const createWorkerPool = (name: string, size: number): WorkerPool => {
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`${name} pool size must be an integer >= 1`);
  }

  let active = 0;
  const queue: Array<() => Promise<void>> = [];

  const next = () => {
    if (active >= size) return;
    const run = queue.shift();
    if (!run) return;
    active += 1;
    void run();
  };

  const submit = <T>(task: PoolTask<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      queue.push(async () => {
        try {
          resolve(await task());
        } catch (err) {
          reject(err);
        } finally {
          active -= 1;
          next();
        }
      });
      next();
    });

  const runAll = async <T>(
    tasks: Array<PoolTask<T>>,
    onSettled?: SettledHandler<T>
  ): Promise<Array<SettledTask<T>>> => {
    const settled: Array<SettledTask<T>> = [];
    // Handlers run one at a time, in completion order.
    let handled: Promise<void> = Promise.resolve();
    let handlerFailure: { error: unknown } | undefined;

    const record = (entry: SettledTask<T>) => {
      settled.push(entry);
      if (!onSettled) return;
      handled = handled
        .then(() => onSettled(entry))
        .catch((error: unknown) => {
          handlerFailure ??= { error };
        });
    };

    await Promise.all(
      tasks.map((task, index) =>
        submit(task).then(
          (value) => record({ status: "fulfilled", index, value }),
          (reason: unknown) => record({ status: "rejected", index, reason })
        )
      )
    );
    await handled;

    if (handlerFailure) throw handlerFailure.error;
    return settled;
  };

  return { submit, runAll };
};
