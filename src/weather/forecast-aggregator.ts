import { Injectable } from "@nestjs/common";
import { toCalendarDate } from "../common/utils/date.util";
import { DailyForecast, ForecastSample } from "./weather.types";

export const DEFAULT_FORECAST_DAYS = 5;
export const SAMPLES_PER_DAY = 8; // 3-hour steps

/**
 * Groups 3-hour forecast samples into daily summaries.
 *
 * Samples must already be ordered by timestamp (the provider guarantees it).
 * Days are contiguous runs sharing the UTC calendar date of their timestamp;
 * a trailing partial day is still reported as a full entry.
 */
@Injectable()
export class ForecastAggregator {
  aggregate(
    samples: ForecastSample[],
    maxDays: number = DEFAULT_FORECAST_DAYS,
  ): DailyForecast[] {
    const days: DailyForecast[] = [];
    let run: ForecastSample[] = [];
    let runDate: string | null = null;

    for (const sample of samples) {
      const date = toCalendarDate(new Date(sample.timestamp));
      if (runDate !== null && date !== runDate) {
        days.push(this.summarize(runDate, run));
        run = [];
      }
      runDate = date;
      run.push(sample);
    }

    if (runDate !== null && run.length > 0) {
      days.push(this.summarize(runDate, run));
    }

    return days.slice(0, Math.max(0, maxDays));
  }

  private summarize(date: string, run: ForecastSample[]): DailyForecast {
    const temps = run.map((sample) => sample.temperature);
    const average = temps.reduce((sum, t) => sum + t, 0) / temps.length;
    const dominant = this.dominantCondition(run);

    return {
      date,
      tempMin: Math.min(...temps),
      tempMax: Math.max(...temps),
      tempAvg: Math.round(average * 100) / 100,
      condition: dominant.condition,
      icon: dominant.icon,
      precipitationProb: Math.max(...run.map((sample) => sample.pop)),
      sampleCount: run.length,
    };
  }

  /**
   * Most frequent (condition, icon) pair; on a tie the earliest one wins
   */
  private dominantCondition(run: ForecastSample[]): {
    condition: string;
    icon: string | null;
  } {
    const counts = new Map<
      string,
      { condition: string; icon: string | null; count: number }
    >();

    for (const sample of run) {
      const key = `${sample.condition}\u0000${sample.icon ?? ""}`;
      const entry = counts.get(key);
      if (entry) {
        entry.count++;
      } else {
        counts.set(key, {
          condition: sample.condition,
          icon: sample.icon,
          count: 1,
        });
      }
    }

    let best = { condition: run[0].condition, icon: run[0].icon, count: 0 };
    for (const entry of counts.values()) {
      if (entry.count > best.count) {
        best = entry;
      }
    }
    return { condition: best.condition, icon: best.icon };
  }
}
