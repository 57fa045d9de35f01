import { Inject, Injectable, Optional } from "@nestjs/common";
import {
  addDays,
  differenceInCalendarDays,
  format,
  isValid,
  parse,
  startOfDay,
  subDays,
} from "date-fns";
import { CLOCK, Clock, systemClock } from "../common/utils/clock";
import { toIsoDate } from "../common/utils/date.util";

export const MAX_DAYS_PAST = 7;
export const MAX_DAYS_FUTURE = 5;
export const MAX_RANGE_DAYS = 5;
export const DATE_FORMAT = "yyyy-MM-dd";

export interface ValidatedDateRange {
  startDate: Date;
  endDate: Date;
  /** Inclusive day count (end - start + 1) */
  rangeDays: number;
}

export interface DateRangeValidation {
  valid: boolean;
  message: string;
  range: ValidatedDateRange | null;
}

export interface DisplayDate {
  iso: string; // 2024-01-05
  display: string; // January 05, 2024
  short: string; // 01/05/2024
}

export interface DateRangeBounds {
  earliestDate: string;
  latestDate: string;
  today: string;
  maxRangeDays: number;
}

/**
 * Validates date ranges against the lookup window: at most 7 days back,
 * 5 days ahead, and 5 days between start and end.
 *
 * Dates are calendar days in the server's local time.
 */
@Injectable()
export class DateRangeValidator {
  constructor(
    @Optional() @Inject(CLOCK) private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Checks run in a fixed order and the first failure wins:
   * format, order, span, past bound, future bound.
   */
  validate(start: string, end: string): DateRangeValidation {
    const startDate = this.parseDate(start);
    const endDate = this.parseDate(end);

    if (!startDate || !endDate) {
      return this.fail("Invalid date format. Use YYYY-MM-DD");
    }

    const today = this.today();
    const maxPastDate = subDays(today, MAX_DAYS_PAST);
    const maxFutureDate = addDays(today, MAX_DAYS_FUTURE);

    if (startDate > endDate) {
      return this.fail("Start date must be before or equal to end date");
    }

    const span = differenceInCalendarDays(endDate, startDate);
    if (span > MAX_RANGE_DAYS) {
      return this.fail(`Date range cannot exceed ${MAX_RANGE_DAYS} days`);
    }

    if (startDate < maxPastDate) {
      return this.fail(
        `Start date cannot be more than ${MAX_DAYS_PAST} days in the past`,
      );
    }

    if (endDate > maxFutureDate) {
      return this.fail(
        `End date cannot be more than ${MAX_DAYS_FUTURE} days in the future`,
      );
    }

    return {
      valid: true,
      message: "Valid date range",
      range: { startDate, endDate, rangeDays: span + 1 },
    };
  }

  getValidRangeBounds(): DateRangeBounds {
    const today = this.today();
    return {
      earliestDate: toIsoDate(subDays(today, MAX_DAYS_PAST)),
      latestDate: toIsoDate(addDays(today, MAX_DAYS_FUTURE)),
      today: toIsoDate(today),
      maxRangeDays: MAX_RANGE_DAYS,
    };
  }

  /**
   * One display record per calendar day, both ends inclusive
   */
  generateDateRange(start: Date, end: Date): DisplayDate[] {
    return Array.from(eachDay(start, end), (day) =>
      this.formatForDisplay(day),
    );
  }

  formatForDisplay(date: Date): DisplayDate {
    return {
      iso: toIsoDate(date),
      display: format(date, "MMMM dd, yyyy"),
      short: format(date, "MM/dd/yyyy"),
    };
  }

  parseDate(value: string): Date | null {
    const parsed = parse(value, DATE_FORMAT, this.today());
    return isValid(parsed) ? parsed : null;
  }

  private today(): Date {
    return startOfDay(this.clock());
  }

  private fail(message: string): DateRangeValidation {
    return { valid: false, message, range: null };
  }
}

/**
 * Calendar days from start to end inclusive. Restartable: every call
 * returns a fresh iterator.
 */
export function* eachDay(start: Date, end: Date): Generator<Date> {
  for (
    let current = startOfDay(start);
    current <= end;
    current = addDays(current, 1)
  ) {
    yield current;
  }
}
