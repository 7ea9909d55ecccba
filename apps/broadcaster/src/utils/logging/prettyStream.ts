/**
 * Lightweight Pretty Stream for Pino
 *
 * A Transform stream that turns pino NDJSON into colored console lines using
 * picocolors: `TIME LEVEL [module] (consumer) message {context}`.
 */

import { Transform, type TransformCallback } from 'node:stream';
import pc from 'picocolors';

type Colorize = (text: string) => string;

/** Pino numeric levels with label and color */
const LEVELS: Record<number, { label: string; color: Colorize }> = {
  10: { label: 'TRACE', color: pc.gray },
  20: { label: 'DEBUG', color: pc.cyan },
  30: { label: 'INFO', color: pc.green },
  40: { label: 'WARN', color: pc.yellow },
  50: { label: 'ERROR', color: pc.red },
  60: { label: 'FATAL', color: pc.bgRed },
};

/** Fields rendered elsewhere on the line, or not at all */
const RESERVED_FIELDS = [
  'pid',
  'hostname',
  'time',
  'level',
  'msg',
  'err',
  'module',
  'consumerId',
];

interface PrettyStreamOptions {
  /** Additional fields to leave out of the context block */
  ignore?: string[];
  /** Whether to print the module label */
  includeModule?: boolean;
}

interface PinoLine {
  level: number;
  time: string | number;
  msg?: string;
  module?: string;
  consumerId?: string;
  err?: {
    type?: string;
    message?: string;
    stack?: string;
  };
  [key: string]: unknown;
}

function isPinoLine(value: unknown): value is PinoLine {
  return (
    typeof value === 'object' &&
    value !== null &&
    'level' in value &&
    typeof value.level === 'number'
  );
}

function twoDigits(n: number): string {
  return n.toString().padStart(2, '0');
}

function formatTime(time: string | number): string {
  const d = new Date(time);
  return (
    `${d.getFullYear()}-${twoDigits(d.getMonth() + 1)}-${twoDigits(d.getDate())} ` +
    `${twoDigits(d.getHours())}:${twoDigits(d.getMinutes())}:${twoDigits(d.getSeconds())}`
  );
}

function formatLevel(level: number): string {
  const entry = LEVELS[level] ?? { label: 'LOG', color: pc.white };
  return entry.color(entry.label.padEnd(5));
}

function formatError(err: PinoLine['err']): string {
  if (!err) return '';

  const lines = [pc.red(`  ${err.type ?? 'Error'}: ${err.message ?? ''}`)];
  for (const frame of err.stack?.split('\n').slice(1) ?? []) {
    lines.push(pc.dim(`    ${frame.trim()}`));
  }
  return '\n' + lines.join('\n');
}

function formatContext(line: PinoLine, hidden: ReadonlySet<string>): string {
  const context = Object.fromEntries(
    Object.entries(line).filter(([key]) => !hidden.has(key)),
  );
  return Object.keys(context).length > 0
    ? pc.dim(` ${JSON.stringify(context)}`)
    : '';
}

/**
 * Render a single NDJSON line; non-JSON input passes through unchanged
 */
export function formatLogLine(
  raw: string,
  options: PrettyStreamOptions = {},
): string {
  const hidden = new Set([...RESERVED_FIELDS, ...(options.ignore ?? [])]);

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return raw;
  }
  if (!isPinoLine(parsed)) return raw;

  const module =
    options.includeModule && parsed.module ? pc.dim(`[${parsed.module}] `) : '';
  const consumer = parsed.consumerId
    ? pc.magenta(`(${parsed.consumerId.slice(0, 8)}) `)
    : '';

  return (
    `${pc.dim(formatTime(parsed.time))} ${formatLevel(parsed.level)} ` +
    `${module}${consumer}${parsed.msg ?? ''}` +
    formatContext(parsed, hidden) +
    formatError(parsed.err)
  );
}

/**
 * Create a pretty stream Transform
 */
export function createPrettyStream(
  options: PrettyStreamOptions = {},
): Transform {
  return new Transform({
    transform(
      chunk: Buffer,
      _encoding: BufferEncoding,
      callback: TransformCallback,
    ): void {
      for (const line of chunk.toString().split('\n')) {
        if (line.length > 0) {
          this.push(formatLogLine(line, options) + '\n');
        }
      }
      callback();
    },
  });
}
