import { readFileSync } from "node:fs";
import { z } from "zod";
import { addDays, weekdayOf, zonedTimeToUtc } from "./timezone.js";

export interface TradingSession {
  readonly date: string;
  readonly open: Date;
  readonly close: Date;
}

/** Where session calendars come from. `from` and `to` are inclusive YYYY-MM-DD dates. */
export interface CalendarSource {
  readonly name: string;
  load(from: string, to: string): Promise<TradingSession[]>;
}

export interface CalendarDay {
  date: string;
  open: string;
  close: string;
}

export interface CalendarClient {
  getCalendar(params: { start: string; end: string }): Promise<CalendarDay[]>;
}

/**
 * Sessions from the broker's market calendar endpoint.
 */
export class AlpacaCalendarSource implements CalendarSource {
  readonly name = "alpaca";

  constructor(private readonly client: CalendarClient) {}

  async load(from: string, to: string): Promise<TradingSession[]> {
    const days = await this.client.getCalendar({ start: from, end: to });
    return days.map((day) => ({
      date: day.date,
      open: zonedTimeToUtc(day.date, day.open),
      close: zonedTimeToUtc(day.date, day.close),
    }));
  }
}

const holidayFileSchema = z.object({
  timeZone: z.string(),
  regularOpen: z.string().regex(/^\d{2}:\d{2}$/),
  regularClose: z.string().regex(/^\d{2}:\d{2}$/),
  earlyClose: z.string().regex(/^\d{2}:\d{2}$/),
  holidays: z.array(z.string().regex(/^\d{4}-\d{2}-\d{2}$/)),
  earlyCloses: z.array(z.string().regex(/^\d{4}-\d{2}-\d{2}$/)),
});

export type HolidayTable = z.infer<typeof holidayFileSchema>;

export const DEFAULT_HOLIDAY_FILE = new URL("../../data/market-holidays.json", import.meta.url);

export function loadHolidayTable(file: URL | string = DEFAULT_HOLIDAY_FILE): HolidayTable {
  return holidayFileSchema.parse(JSON.parse(readFileSync(file, "utf8")));
}

/**
 * Weekday regular-hours sessions minus exchange holidays. Used when the
 * broker calendar is not wanted or not reachable. Dates past the end of the
 * holiday table are not served, so the oracle fails closed there.
 */
export class RegularHoursCalendarSource implements CalendarSource {
  readonly name = "regular_hours";
  private readonly holidays: ReadonlySet<string>;
  private readonly earlyCloses: ReadonlySet<string>;
  private readonly lastKnownYear: number;

  constructor(private readonly table: HolidayTable) {
    this.holidays = new Set(table.holidays);
    this.earlyCloses = new Set(table.earlyCloses);
    this.lastKnownYear = Math.max(...table.holidays.map((d) => Number(d.slice(0, 4))));
  }

  async load(from: string, to: string): Promise<TradingSession[]> {
    if (Number(to.slice(0, 4)) > this.lastKnownYear) {
      throw new Error(`holiday table ends in ${this.lastKnownYear}, cannot serve ${to}`);
    }
    const sessions: TradingSession[] = [];
    for (let date = from; date <= to; date = addDays(date, 1)) {
      const weekday = weekdayOf(date);
      if (weekday === 0 || weekday === 6 || this.holidays.has(date)) continue;
      const close = this.earlyCloses.has(date) ? this.table.earlyClose : this.table.regularClose;
      sessions.push({
        date,
        open: zonedTimeToUtc(date, this.table.regularOpen, this.table.timeZone),
        close: zonedTimeToUtc(date, close, this.table.timeZone),
      });
    }
    return sessions;
  }
}
