/**
 * Calendar fields of an RFC 5322 Date header, kept in the zone the sender
 * wrote them in. `offsetMinutes` is null when the zone is missing or unknown.
 */
export interface MailDate {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
  offsetMinutes: number | null;
}

const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];
const WEEKDAYS = ["mon", "tue", "wed", "thu", "fri", "sat", "sun"];

/** Obsolete zone names from RFC 5322 section 4.3 */
const NAMED_ZONES: Record<string, number> = {
  ut: 0,
  utc: 0,
  gmt: 0,
  z: 0,
  est: -300,
  edt: -240,
  cst: -360,
  cdt: -300,
  mst: -420,
  mdt: -360,
  pst: -480,
  pdt: -420,
};

/**
 * Parse a mail Date header, e.g. "Mon, 27 Jan 2025 23:30:00 -0800".
 *
 * Accepts an optional weekday, "Jan 27" as well as "27 Jan", two-digit
 * years (69-99 → 19xx, 00-68 → 20xx), times with or without seconds and
 * asctime-style "Jan 27 10:00:00 2025". Returns null when the value doesn't
 * follow the grammar, names a day that doesn't exist or carries a numeric
 * zone beyond +/-2359.
 */
export function parseMailDate(value: string): MailDate | null {
  const tokens = value.replace(/,/g, " ").trim().split(/\s+/).filter(Boolean);

  if (tokens.length > 0 && WEEKDAYS.includes(tokens[0].slice(0, 3).toLowerCase())) {
    tokens.shift();
  }
  if (tokens.length < 4) return null;

  let [dayToken, monthToken, yearToken, timeToken] = tokens;
  const zoneToken: string | undefined = tokens[4];

  if (monthIndex(monthToken) === -1) {
    [dayToken, monthToken] = [monthToken, dayToken];
  }
  if (yearToken.includes(":")) {
    [yearToken, timeToken] = [timeToken, yearToken];
  }

  const month = monthIndex(monthToken) + 1;
  if (month === 0) return null;

  if (!/^\d{1,2}$/.test(dayToken)) return null;
  const day = parseInt(dayToken, 10);

  const year = parseYear(yearToken);
  if (year === null) return null;

  const time = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/.exec(timeToken);
  if (!time) return null;
  const hour = parseInt(time[1], 10);
  const minute = parseInt(time[2], 10);
  const second = time[3] === undefined ? 0 : parseInt(time[3], 10);

  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const offsetMinutes = parseZone(zoneToken);
  if (offsetMinutes === false) return null;

  return {
    year,
    month,
    day,
    hour,
    minute,
    second,
    offsetMinutes,
  };
}

/** YYYY-MM-DD */
export function formatDateStamp(date: MailDate): string {
  return `${String(date.year).padStart(4, "0")}-${pad2(date.month)}-${pad2(date.day)}`;
}

function monthIndex(token: string): number {
  return MONTHS.indexOf(token.slice(0, 3).toLowerCase());
}

function parseYear(token: string): number | null {
  if (/^\d{4}$/.test(token)) {
    const year = parseInt(token, 10);
    return year >= 1 ? year : null;
  }
  if (/^\d{2}$/.test(token)) {
    const yy = parseInt(token, 10);
    return yy > 68 ? 1900 + yy : 2000 + yy;
  }
  return null;
}

/** Offset in minutes; null when missing or unknown, false when out of range */
function parseZone(token: string | undefined): number | null | false {
  if (token === undefined) return null;

  const numeric = /^([+-])(\d{2})(\d{2})$/.exec(token);
  if (numeric) {
    const hours = parseInt(numeric[2], 10);
    const mins = parseInt(numeric[3], 10);
    if (hours > 23 || mins > 59) return false;
    const minutes = hours * 60 + mins;
    return numeric[1] === "-" ? -minutes : minutes;
  }

  return NAMED_ZONES[token.toLowerCase()] ?? null;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function pad2(n: number): string {
  return n.toString().padStart(2, "0");
}
