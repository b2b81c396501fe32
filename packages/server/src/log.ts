/**
 * Console logging for the mock server.
 *
 * Per-connection chatter is debug output and only printed when
 * MOCKWIRE_DEBUG=1, so test runs stay quiet by default.
 */

const PREFIX = "[mockwire]";

function debugEnabled(): boolean {
  return process.env.MOCKWIRE_DEBUG === "1";
}

export const log = {
  debug(message: string, ...rest: unknown[]): void {
    if (debugEnabled()) console.log(`${PREFIX} ${message}`, ...rest);
  },
  error(message: string, ...rest: unknown[]): void {
    console.error(`${PREFIX} ${message}`, ...rest);
  },
};
