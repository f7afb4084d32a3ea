// LOG_LEVEL: debug | info | warn | error (default info)

const RANKS = { debug: 0, info: 1, warn: 2, error: 3 } as const;
type Level = keyof typeof RANKS;

function isLevel(v: string): v is Level {
  return v in RANKS;
}

function enabled(level: Level): boolean {
  const raw = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return RANKS[level] >= (isLevel(raw) ? RANKS[raw] : RANKS.info);
}

function writer(level: Level, sink: (line: string) => void, mark = "") {
  return (message: string): void => {
    if (enabled(level)) sink(mark + message);
  };
}

export const log = {
  debug: writer("debug", l => console.debug(l)),
  info: writer("info", l => console.info(l)),
  success: writer("info", l => console.info(l), "✓ "),
  warning: writer("warn", l => console.warn(l), "⚠ "),
  error: writer("error", l => console.error(l), "✗ "),
};
