/**
 * Decision tracing, enabled with DAG_TO_JULIA_DEBUG=1
 */

function debugEnabled(): boolean {
  return typeof process !== 'undefined' && process.env?.DAG_TO_JULIA_DEBUG === '1';
}

export function debugLog(message: string): void {
  if (debugEnabled()) {
    console.debug(`[dag-to-julia] ${message}`);
  }
}
