/**
 * Cooperative stop request. The orchestrator polls it between sources and
 * between URLs; a request in flight always runs to completion.
 */
export class CancellationToken {
  private cancelled = false;
  private reason: string | null = null;

  cancel(reason = 'cancelled'): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.reason = reason;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get cancelReason(): string | null {
    return this.reason;
  }
}

/** Exit status after a second interrupt: 128 + SIGINT. */
export const FORCED_EXIT_CODE = 130;

export interface InterruptHooks {
  notify: (message: string) => void;
  exit: (code: number) => void;
}

/**
 * Signal handler for a running import. The first signal asks the run to stop
 * at its next checkpoint; another one while that stop is pending exits at once.
 */
export function createInterruptHandler(
  token: CancellationToken,
  hooks: InterruptHooks,
): (signal: NodeJS.Signals) => void {
  return (signal) => {
    if (token.isCancelled) {
      hooks.notify(`Received ${signal} again, exiting now`);
      hooks.exit(FORCED_EXIT_CODE);
      return;
    }
    hooks.notify(`Received ${signal}, finishing the current request (repeat to exit now)...`);
    token.cancel(signal);
  };
}

/**
 * Install the interrupt handler on SIGINT and SIGTERM. Returns the uninstaller.
 */
export function handleInterrupts(token: CancellationToken, hooks: InterruptHooks): () => void {
  const onSignal = createInterruptHandler(token, hooks);
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
}
