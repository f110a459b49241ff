/**
 * Cooperative cancellation token.
 *
 * Passed down strategy → scheduler → worker and checked only at trial
 * submission boundaries. Cancelling is idempotent; the first reason wins.
 */
export class CancelToken {
  private cancelledReason: string | undefined;

  get isCancelled(): boolean {
    return this.cancelledReason !== undefined;
  }

  get reason(): string | undefined {
    return this.cancelledReason;
  }

  cancel(reason: string = 'cancelled'): void {
    if (this.cancelledReason === undefined) {
      this.cancelledReason = reason;
    }
  }
}
