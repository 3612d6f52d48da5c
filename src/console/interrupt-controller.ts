/**
 * Interrupt Controller
 *
 * Turns Ctrl+C into cancellation of the operation in progress (discovery,
 * live logs). With no operation in progress the interrupt is not consumed and
 * the caller exits the console.
 */

export class InterruptController {
  private current: AbortController | null = null;

  /**
   * Start a cancellable operation
   */
  begin(): AbortSignal {
    this.current = new AbortController();
    return this.current.signal;
  }

  end(): void {
    this.current = null;
  }

  isActive(): boolean {
    return this.current !== null;
  }

  /**
   * @returns true when an operation was cancelled
   */
  interrupt(): boolean {
    if (!this.current || this.current.signal.aborted) {
      return false;
    }
    this.current.abort();
    return true;
  }
}
