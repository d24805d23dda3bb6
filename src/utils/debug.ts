// Debug output goes to stderr and only when CCR_DEBUG is set, so the MCP stdio
// handshake on stdout stays clean.

export function isDebugEnabled(): boolean {
  return Boolean(process.env.CCR_DEBUG);
}

export function debugLog(message: string, ...details: unknown[]): void {
  if (isDebugEnabled()) {
    console.error(`[DEBUG] ${message}`, ...details);
  }
}
