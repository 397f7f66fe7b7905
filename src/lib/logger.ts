/**
 * Progress and diagnostics go to stderr so command output on stdout
 * stays pipeable. Set MOODSORT_QUIET=1 to silence.
 */
export function log(message: string): void {
  if (process.env.MOODSORT_QUIET === "1") return;
  console.error(message);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
