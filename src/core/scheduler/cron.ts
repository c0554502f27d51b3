import parser from "cron-parser";
import { ConfigurationError, errorMessage } from "../errors.js";

const FIELD_NAMES = ["minute", "hour", "day-of-month", "month", "day-of-week"] as const;

function fieldsOf(cronExpr: string): string[] {
  return cronExpr.trim().split(/\s+/).filter((f) => f.length > 0);
}

/**
 * Check a standard 5-field cron expression (minute hour dom month dow).
 * Throws ConfigurationError naming the problem.
 */
export function validateCronExpression(cronExpr: string): void {
  const fields = fieldsOf(cronExpr);
  if (fields.length === 0) {
    throw new ConfigurationError("Cron expression is required");
  }
  if (fields.length !== FIELD_NAMES.length) {
    throw new ConfigurationError(
      `Invalid cron expression "${cronExpr}": expected 5 fields (${FIELD_NAMES.join(" ")}), got ${fields.length}`,
    );
  }
  try {
    parser.parseExpression(fields.join(" "), { tz: "UTC" });
  } catch (error) {
    throw new ConfigurationError(`Invalid cron expression "${cronExpr}": ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/** Earliest due time strictly after `from`, evaluated in UTC. */
export function nextRunAfter(cronExpr: string, from: Date): Date {
  validateCronExpression(cronExpr);
  const interval = parser.parseExpression(fieldsOf(cronExpr).join(" "), {
    currentDate: from,
    tz: "UTC",
  });
  let next = interval.next().toDate();
  while (next.getTime() <= from.getTime()) {
    next = interval.next().toDate();
  }
  return next;
}

/** The next `count` due times after `from`. */
export function upcomingRuns(cronExpr: string, from: Date, count: number): Date[] {
  const runs: Date[] = [];
  let cursor = from;
  for (let i = 0; i < count; i++) {
    cursor = nextRunAfter(cronExpr, cursor);
    runs.push(cursor);
  }
  return runs;
}
