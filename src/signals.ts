/**
 * Process-wide stop request, set from the SIGINT handler. The orchestrator
 * reads it between stages; a pending confirm-gate is declined separately
 * through the confirm channel.
 */

export let stopRequested = false;

export function requestStop(): void {
  stopRequested = true;
}

export function clearStopRequest(): void {
  stopRequested = false;
}
