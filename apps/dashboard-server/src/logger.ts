export type Logger = Readonly<{
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}>;

export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

/** Logger that drops everything; handy for tests. */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
