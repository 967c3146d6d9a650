/**
 * Storage for a slot's cancellation flag, shared by the slot and every
 * holder of its handle
 */
export interface CancellationFlag {
  cancelled: boolean;
}

/**
 * Token returned at registration. Cancelling stops future runs of the slot;
 * a run already in progress is not interrupted. Safe to call repeatedly,
 * also after the executor shut down.
 */
export class CancellationHandle {
  readonly slotId: string;
  private readonly flag: CancellationFlag;
  private readonly onCancel: (slotId: string) => void;

  constructor(
    slotId: string,
    onCancel: (slotId: string) => void = () => {},
    flag: CancellationFlag = { cancelled: false }
  ) {
    this.slotId = slotId;
    this.onCancel = onCancel;
    this.flag = flag;
  }

  cancel(): void {
    if (this.flag.cancelled) return;
    this.flag.cancelled = true;
    this.onCancel(this.slotId);
  }

  get isCancelled(): boolean {
    return this.flag.cancelled;
  }
}
