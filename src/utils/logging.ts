const LOG_PREFIX = '[endf-mcp]';

/** Diagnostics always go to stderr; stdout belongs to the MCP transport. */
export function logInfo(...args: unknown[]): void {
  console.error(LOG_PREFIX, ...args);
}

function routeToStderr(...args: unknown[]): void {
  console.error(...args);
}

/**
 * Redirects console.log/info/debug to stderr so that nothing but JSON-RPC
 * frames reaches stdout while the stdio server runs.
 */
export function installStdioHygiene(): void {
  if (console.log !== routeToStderr) console.log = routeToStderr;
  if (console.debug !== routeToStderr) console.debug = routeToStderr;
  if (console.info !== routeToStderr) console.info = routeToStderr;
}
