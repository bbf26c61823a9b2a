/** Minimal logger accepted by the SDK; `console` satisfies it */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
}

export const silentLogger: Logger = {
  debug() {},
  warn() {},
};
