/**
 * Runs `worker` over `items` with at most `concurrency` tasks in flight.
 *
 * Each result is written to the slot of its input index, so the returned
 * array follows input order regardless of completion order. The first
 * rejection rejects the whole call and stops new tasks from starting;
 * tasks already running are left to settle on their own.
 */
export const mapWithConcurrency = <T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> => {
  const slots = new Array<R>(items.length);
  if (items.length === 0) return Promise.resolve(slots);

  const limit = Math.max(1, Math.min(Math.floor(concurrency), items.length));

  return new Promise<R[]>((resolve, reject) => {
    let next = 0;
    let completed = 0;
    let failed = false;

    const launch = () => {
      if (failed || next >= items.length) return;
      const index = next++;

      worker(items[index], index).then(
        result => {
          slots[index] = result;
          completed++;
          if (completed === items.length) {
            resolve(slots);
          } else {
            launch();
          }
        },
        (error: unknown) => {
          if (failed) return;
          failed = true;
          reject(error);
        }
      );
    };

    for (let i = 0; i < limit; i++) launch();
  });
};
