export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  name: string;
  level: LogLevel;
  json: boolean;
  pretty: boolean;
  sink?: (line: string) => void; // по умолчанию console.log
}

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// bigint в JSON не сериализуется
function replacer(_key: string, value: unknown) {
  return typeof value === "bigint" ? value.toString() : value;
}

type LogFn = (msg: string, extra?: Record<string, unknown>) => void;

export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  child(name: string): Logger;
}

export function createLogger(opt: LoggerOptions): Logger {
  const enabled = (lvl: LogLevel) => levelOrder[lvl] >= levelOrder[opt.level];
  const ts = () => new Date().toISOString();
  const write = opt.sink ?? ((line: string) => console.log(line));

  function out(lvl: LogLevel, msg: string, extra?: Record<string, unknown>) {
    if (!enabled(lvl)) return;
    const rec = { level: lvl, ts: ts(), name: opt.name, msg, ...extra };
    if (opt.json && !opt.pretty) {
      write(JSON.stringify(rec, replacer));
      return;
    }
    if (opt.json && opt.pretty) {
      write(JSON.stringify(rec, replacer, 2));
      return;
    }
    const rest = extra ? " " + JSON.stringify(extra, replacer) : "";
    write(`[${rec.ts}] ${opt.name} ${lvl.toUpperCase()}: ${msg}${rest}`);
  }

  return {
    debug: (m, e) => out("debug", m, e),
    info: (m, e) => out("info", m, e),
    warn: (m, e) => out("warn", m, e),
    error: (m, e) => out("error", m, e),
    child: (name) => createLogger({ ...opt, name: `${opt.name}:${name}` }),
  };
}

// для тестов и встраивания без вывода
export const silentLogger: Logger = createLogger({ name: "silent", level: "error", json: true, pretty: false, sink: () => {} });
