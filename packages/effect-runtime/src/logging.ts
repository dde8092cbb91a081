/**
 * Structured logging and tracing integration.
 *
 * Provides a console logger with a compact line format and span helpers
 * for graph evaluation.
 */
import { Effect, Logger, LogLevel } from "effect";

// ── Line format ────────────────────────────────────────────────────────────

function renderMessage(message: unknown): string {
  if (Array.isArray(message)) return message.map(renderMessage).join(" ");
  return typeof message === "string" ? message : JSON.stringify(message);
}

/** `[hh:mm:ss.mmm] LEVEL <span> message`; the span part only inside spans. */
export function formatLogLine(
  level: LogLevel.LogLevel,
  message: unknown,
  date: Date,
  spans: readonly string[] = [],
): string {
  const ts = date.toISOString().slice(11, 23);
  const lvl = level.label.toUpperCase().padEnd(5);
  const where = spans.length > 0 ? `<${spans.join("/")}> ` : "";
  return `[${ts}] ${lvl} ${where}${renderMessage(message)}`;
}

// ── Pretty logger ──────────────────────────────────────────────────────────

export const prettyLogger = Logger.make(({ logLevel, message, date, spans }) => {
  const labels: string[] = [];
  for (const span of spans) labels.push(span.label);
  console.log(formatLogLine(logLevel, message, date, labels));
});

// ── Span helpers ───────────────────────────────────────────────────────────

/**
 * Tracing span plus a log span of the same name: the logger prints the label
 * on every line inside it.
 */
export function withSpan<A, E, R>(
  name: string,
  effect: Effect.Effect<A, E, R>,
  attributes: Record<string, unknown> = {},
): Effect.Effect<A, E, R> {
  return effect.pipe(Effect.withLogSpan(name), Effect.withSpan(name, { attributes }));
}

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    default: return LogLevel.Info;
  }
}
