/**
 * Debug logging for the detonation models.
 *
 * Debug output is off by default. When enabled, messages are echoed to the
 * console with their module tag and kept in a bounded log for inspection.
 */

const DEBUG_LOG_MAX = 200;

let debugEnabled = false;
let debugLog: string[] = [];

export function setDetonationDebug(enabled: boolean): void {
  const wasEnabled = debugEnabled;
  debugEnabled = enabled;
  if (enabled && !wasEnabled) {
    debugLog = [];
    console.log('[Detonation] Debug logging ENABLED - will keep the last', DEBUG_LOG_MAX, 'messages');
  }
}

export function isDetonationDebugEnabled(): boolean {
  return debugEnabled;
}

export function getDetonationDebugLog(): string[] {
  return [...debugLog];
}

export function logDebug(tag: string, message: string): void {
  if (!debugEnabled) return;

  const line = `[${tag}] ${message}`;
  debugLog.push(line);
  if (debugLog.length > DEBUG_LOG_MAX) {
    debugLog.shift();
  }
  console.log(line);
}

/**
 * Always reported; anomalies are worth seeing even with debug off.
 */
export function logWarning(tag: string, message: string): void {
  const line = `[${tag}] ${message}`;
  if (debugEnabled) {
    debugLog.push(line);
    if (debugLog.length > DEBUG_LOG_MAX) {
      debugLog.shift();
    }
  }
  console.warn(line);
}
