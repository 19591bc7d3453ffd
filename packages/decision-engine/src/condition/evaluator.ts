// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Permission condition evaluator.
 *
 * Grammar (whitespace-insensitive):
 *
 *   condition  := comparison ( "&&" comparison )*
 *   comparison := "time" op clock
 *   op         := "<" | "<=" | ">" | ">=" | "=="
 *   clock      := HH ":" MM [ ":" SS ]
 *
 * `time` is the wall-clock time of day at the evaluation instant in the
 * context's time zone.  `==` matches at the precision of the literal, so
 * `time == 12:00` holds for the whole minute.  An empty condition holds vacuously; anything that
 * does not parse fails closed and says so in the returned note.
 */

export type ComparisonOperator = '<' | '<=' | '>' | '>=' | '==';

/** A single `time <op> HH:MM[:SS]` clause. */
export interface TimeComparison {
  readonly operator: ComparisonOperator;
  /** Seconds since midnight of the literal. */
  readonly seconds: number;
  /** Granularity of the literal in seconds: 60 for HH:MM, 1 for HH:MM:SS. */
  readonly precision: 60 | 1;
}

export type ParsedCondition =
  | { readonly ok: true; readonly clauses: readonly TimeComparison[] }
  | { readonly ok: false; readonly error: string };

/** Evaluation context; `timeZone` defaults to UTC. */
export interface ConditionContext {
  readonly now: Date;
  readonly timeZone?: string;
}

export interface ConditionEvaluation {
  readonly holds: boolean;
  /** True when the expression could not be parsed. */
  readonly malformed: boolean;
  /** Human-readable explanation, suitable for a trace entry. */
  readonly note: string;
}

const CLAUSE_PATTERN = /^time\s*(<=|>=|==|<|>)\s*(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

function parseClause(clause: string): TimeComparison | string {
  const match = CLAUSE_PATTERN.exec(clause);
  if (match === null) {
    return `unrecognised clause "${clause}"`;
  }
  const [, operator, hh, mm, ss] = match;
  const hours = Number(hh);
  const minutes = Number(mm);
  const seconds = ss !== undefined ? Number(ss) : 0;
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return `time literal out of range in "${clause}"`;
  }
  return {
    operator: toOperator(operator),
    seconds: hours * 3600 + minutes * 60 + seconds,
    precision: ss !== undefined ? 1 : 60,
  };
}

function toOperator(raw: string | undefined): ComparisonOperator {
  switch (raw) {
    case '<':
    case '<=':
    case '>':
    case '>=':
    case '==':
      return raw;
    default:
      // Unreachable: the clause pattern only captures the operators above.
      return '==';
  }
}

/**
 * Parses a condition expression into its clauses.
 */
export function parseCondition(expression: string): ParsedCondition {
  const clauses: TimeComparison[] = [];
  for (const raw of expression.split('&&')) {
    const clause = raw.trim();
    if (clause.length === 0) {
      return { ok: false, error: 'empty clause' };
    }
    const parsed = parseClause(clause);
    if (typeof parsed === 'string') {
      return { ok: false, error: parsed };
    }
    clauses.push(parsed);
  }
  return { ok: true, clauses };
}

function secondsOfDay(now: Date, timeZone: string): number {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(now);
  const read = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((part) => part.type === type)?.value ?? '0');
  return read('hour') * 3600 + read('minute') * 60 + read('second');
}

function formatClock(totalSeconds: number): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  return `${pad(hours)}:${pad(minutes)}:${pad(totalSeconds % 60)}`;
}

function compare(actual: number, { operator, seconds, precision }: TimeComparison): boolean {
  switch (operator) {
    case '<':
      return actual < seconds;
    case '<=':
      return actual <= seconds;
    case '>':
      return actual > seconds;
    case '>=':
      return actual >= seconds;
    case '==':
      return actual - (actual % precision) === seconds;
  }
}

/**
 * Evaluates a permission condition and explains the outcome.
 */
export function evaluateCondition(
  expression: string | undefined,
  context: ConditionContext,
): ConditionEvaluation {
  if (expression === undefined || expression.trim().length === 0) {
    return { holds: true, malformed: false, note: 'no condition' };
  }

  const parsed = parseCondition(expression.trim());
  if (!parsed.ok) {
    return {
      holds: false,
      malformed: true,
      note: `malformed condition "${expression}": ${parsed.error}`,
    };
  }

  const timeZone = context.timeZone ?? 'UTC';
  let actual: number;
  try {
    actual = secondsOfDay(context.now, timeZone);
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    return {
      holds: false,
      malformed: false,
      note: `cannot evaluate condition "${expression}" in time zone "${timeZone}": ${detail}`,
    };
  }

  const holds = parsed.clauses.every((clause) => compare(actual, clause));
  const clock = `${formatClock(actual)} ${timeZone}`;
  return {
    holds,
    malformed: false,
    note: holds
      ? `condition "${expression}" met at ${clock}`
      : `condition "${expression}" not met at ${clock}`,
  };
}

/**
 * Returns true when the condition holds for the context.  Malformed
 * conditions never hold.
 */
export function holds(expression: string | undefined, context: ConditionContext): boolean {
  return evaluateCondition(expression, context).holds;
}
