import type { RecordFailure, RecordResult, RecordSuccess } from "./@types/Pipeline"
import type { BatchPolicy } from "./config"
import { BatchProcessingError, type PipelineError } from "./errors"
import type { Logger } from "./logger"

export interface RecordHandler {
  process(raw: unknown): Promise<RecordResult>
}

export type BatchOutcome =
  | { ok: true, statusCode: 200, processedCount: number, successes: RecordSuccess[] }
  | { ok: false, attempted: number, failures: RecordFailure[], error: PipelineError | BatchProcessingError }

/**
 * Runs records one after another, in delivery order.
 *
 * `halt-on-first-failure` stops at the first failed record and leaves the
 * rest of the batch for the invoker's redrive. `continue` attempts every
 * record and fails the batch if any of them failed.
 */
export class BatchCoordinator {
  constructor(
    private readonly processor: RecordHandler,
    private readonly policy: BatchPolicy,
    private readonly logger: Logger,
  ) {}

  async run(records: readonly unknown[]): Promise<BatchOutcome> {
    const successes: RecordSuccess[] = []
    const failures: RecordFailure[] = []
    let attempted = 0

    for (const record of records) {
      attempted++
      const result = await this.processor.process(record)
      if (result.ok) {
        successes.push(result.value)
        continue
      }

      failures.push(result.error)
      if (this.policy === "halt-on-first-failure") {
        const skipped = records.length - attempted
        if (skipped > 0) {
          this.logger.warn(`Halting batch after record ${attempted} of ${records.length}, ${skipped} left unprocessed`)
        }
        return { ok: false, attempted, failures, error: result.error.error }
      }
    }

    if (failures.length > 0) {
      return {
        ok: false,
        attempted,
        failures,
        error: new BatchProcessingError(failures.map(failure => failure.error), attempted),
      }
    }

    return { ok: true, statusCode: 200, processedCount: successes.length, successes }
  }
}
