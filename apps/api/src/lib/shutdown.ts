// Set once when the process starts its graceful shutdown
let shuttingDown = false;

export function markShuttingDown(): void {
  shuttingDown = true;
}

/**
 * Used by the health endpoint to return 503 during shutdown.
 */
export function isShuttingDown(): boolean {
  return shuttingDown;
}
