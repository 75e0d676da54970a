import { availableParallelism } from 'node:os'

export function defaultWorkerCount(): number {
  return Math.max(4, availableParallelism() * 2)
}

/**
 * Run `tasks` on a pool of `workers`. Results keep task order no matter which task
 * finishes first. A rejected task stops new tasks from starting and rejects the run once
 * in-flight tasks settle, so tasks that must not abort their siblings resolve to a
 * result value instead of throwing.
 */
export async function runWithConcurrency<T>(
  tasks: Array<() => Promise<T>>,
  workers: number,
  onProgress?: ((completed: number, total: number) => void) | null
): Promise<T[]> {
  if (tasks.length === 0) return []
  const concurrency = Math.max(1, Math.round(workers))
  const slots: Array<{ value: T } | undefined> = new Array(tasks.length)
  const errors: unknown[] = []
  const total = tasks.length
  let completed = 0
  let nextIndex = 0

  const worker = async () => {
    while (errors.length === 0) {
      const current = nextIndex
      const task = tasks[current]
      if (!task) return
      nextIndex += 1
      try {
        slots[current] = { value: await task() }
      } catch (error) {
        errors.push(error)
      } finally {
        completed += 1
        onProgress?.(completed, total)
      }
    }
  }

  const runners = Array.from({ length: Math.min(concurrency, tasks.length) }, () => worker())
  await Promise.all(runners)
  if (errors.length > 0) throw errors[0]
  return slots.flatMap((slot) => (slot ? [slot.value] : []))
}
