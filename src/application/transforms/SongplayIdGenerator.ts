/**
 * Songplay ID Generator — Two-Part Monotonic Keys
 * Layer: Application (transforms)
 *
 * Every source file is a partition of the log dataset. An id is built the
 * same way a distributed engine builds monotonically increasing ids: the
 * partition index in the upper bits and a per-partition sequence in the
 * lower 33 bits.
 *
 *   id = partition × 2^33 + sequence
 *
 * As long as records arrive in scan order (partitions non-decreasing,
 * sequence restarting at 0 for each new partition) ids are unique and
 * strictly increasing, though not contiguous: the first play of file #1 is
 * 8589934592. Partitions are capped at 2^20 so ids stay exact JS integers.
 *
 * A generator is created per run; ids are never carried across runs.
 */
import { AppError } from '@shared/errors/AppError';

const SEQUENCE_BITS = 33;
const SEQUENCE_SPAN = 2 ** SEQUENCE_BITS;
const MAX_PARTITIONS = 2 ** 20;

export class SongplayIdGenerator {
  private partition = -1;
  private sequence = 0;

  next(partition: number): number {
    if (!Number.isInteger(partition) || partition < 0 || partition >= MAX_PARTITIONS) {
      throw new AppError(`Partition index out of range: ${partition}`);
    }
    if (partition < this.partition) {
      throw new AppError(
        `Partition ${partition} arrived after partition ${this.partition}; ids would not be monotonic`,
      );
    }
    if (partition > this.partition) {
      this.partition = partition;
      this.sequence = 0;
    }
    if (this.sequence >= SEQUENCE_SPAN) {
      throw new AppError(`Partition ${partition} exceeded ${SEQUENCE_SPAN} records`);
    }
    return partition * SEQUENCE_SPAN + this.sequence++;
  }
}
