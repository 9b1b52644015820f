/**
 * Holds the currently accepted model. One writer at a time; readers take the snapshot as-is.
 */
import { Mutex } from 'async-mutex';
import type { TrainedModelRecord } from '../../../domain/models/TrainingHistory';
import type { DestinationModel } from './DestinationModel';

export interface ModelSnapshot {
  readonly model: DestinationModel;
  readonly record: TrainedModelRecord;
}

class ModelSlot {
  private snapshot: ModelSnapshot | null = null;
  private writeMutex = new Mutex();

  current(): ModelSnapshot | null {
    return this.snapshot;
  }

  /**
   * Swap in a new snapshot. The reference assignment is the only point readers can observe.
   */
  async replace(next: ModelSnapshot): Promise<void> {
    await this.writeMutex.runExclusive(() => {
      this.snapshot = Object.freeze({ ...next });
    });
  }
}

export default ModelSlot;
