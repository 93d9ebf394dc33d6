// Bracket-tagged console logging: `[report] Resolving "aave"...`

type Sink = (...args: unknown[]) => void;

let infoSink: Sink = (...args) => console.log(...args);

export const log = {
  info(tag: string, message: string): void {
    infoSink(`[${tag}] ${message}`);
  },
  warn(tag: string, message: string): void {
    console.warn(`[${tag}] ${message}`);
  },
  error(tag: string, err: unknown): void {
    console.error(`[${tag}]`, err);
  },
};

/** Send info lines to stderr so stdout carries only command output. */
export function logInfoToStderr(): void {
  infoSink = (...args) => console.error(...args);
}
