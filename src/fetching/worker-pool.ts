export type TaskOutcome<T> =
  | { index: number; status: 'fulfilled'; value: T }
  | { index: number; status: 'rejected'; reason: unknown }

/**
 * Run tasks with at most `concurrency` in flight. Tasks start in array order;
 * `onSettled` is called once per task in completion order. Resolves after
 * every task has settled; a failing task never stops the others.
 */
export const runWithConcurrency = async <T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  concurrency: number,
  onSettled: (outcome: TaskOutcome<T>) => void,
): Promise<void> => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(
      `Concurrency must be a positive integer, got ${concurrency}`,
    )
  }

  let currentIndex = 0

  const worker = async (): Promise<void> => {
    while (currentIndex < tasks.length) {
      const index = currentIndex++
      const task = tasks[index]
      if (!task) break

      let outcome: TaskOutcome<T>
      try {
        outcome = { index, status: 'fulfilled', value: await task() }
      } catch (reason) {
        outcome = { index, status: 'rejected', reason }
      }
      onSettled(outcome)
    }
  }

  const workers: Array<Promise<void>> = []
  for (let i = 0; i < Math.min(concurrency, tasks.length); i++) {
    workers.push(worker())
  }

  await Promise.all(workers)
}
