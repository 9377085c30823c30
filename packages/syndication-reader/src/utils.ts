import DebugModule from "debug"

const debug = DebugModule.debug(`syndication:utils`)

const MONTHS: Record<string, number> = {
  Jan: 0,
  Feb: 1,
  Mar: 2,
  Apr: 3,
  May: 4,
  Jun: 5,
  Jul: 6,
  Aug: 7,
  Sep: 8,
  Oct: 9,
  Nov: 10,
  Dec: 11,
}

// RFC 3339: 2023-12-25T10:30:00Z, 2023-12-25T10:30:00.250+01:00
const RFC3339 =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,3})\d*)?(Z|[+-]\d{2}:?\d{2})$/i

// RFC 2822: Mon, 25 Dec 2023 10:30:00 GMT, 25 Dec 2023 10:30 +0100
const RFC2822 =
  /^(?:\w{3},\s*)?(\d{1,2})\s+(\w{3})\s+(\d{4})\s+(\d{2}):(\d{2})(?::(\d{2}))?\s+(GMT|UT|UTC|Z|[+-]\d{4})$/i

/**
 * Offset in minutes east of UTC for `Z`, `GMT`, `+01:00` or `-0500`
 */
function parseOffset(zone: string): number {
  const match = zone.match(/^([+-])(\d{2}):?(\d{2})$/)
  if (!match) return 0
  const [, sign, hours = `0`, minutes = `0`] = match
  const offset = parseInt(hours, 10) * 60 + parseInt(minutes, 10)
  return sign === `-` ? -offset : offset
}

function monthIndex(name: string): number | undefined {
  const key = name.charAt(0).toUpperCase() + name.slice(1, 3).toLowerCase()
  return MONTHS[key]
}

function utc(
  year: string,
  month: number,
  day: string,
  hour: string,
  minute: string,
  second: string | undefined,
  millisecond: string | undefined,
  zone: string
): Date {
  const time = Date.UTC(
    parseInt(year, 10),
    month,
    parseInt(day, 10),
    parseInt(hour, 10),
    parseInt(minute, 10),
    second ? parseInt(second, 10) : 0,
    millisecond ? parseInt(millisecond.padEnd(3, `0`), 10) : 0
  )
  return new Date(time - parseOffset(zone) * 60 * 1000)
}

/**
 * Parse date strings according to RFC 2822 and RFC 3339 standards
 * Handles RSS pubDate (RFC 2822) and Atom published/updated (RFC 3339)
 */
export function parseFeedDate(value: string | undefined): Date | undefined {
  const str = value?.trim()
  if (!str) return undefined

  const rfc3339 = str.match(RFC3339)
  if (rfc3339) {
    const [, year, month, day, hour, minute, second, ms, zone] = rfc3339
    if (year && month && day && hour && minute && second && zone) {
      const monthNumber = parseInt(month, 10) - 1
      return utc(year, monthNumber, day, hour, minute, second, ms, zone)
    }
  }

  const rfc2822 = str.match(RFC2822)
  if (rfc2822) {
    const [, day, monthName, year, hour, minute, second, zone] = rfc2822
    const month = monthName ? monthIndex(monthName) : undefined
    if (month === undefined) {
      debug(`Invalid month name in RFC 2822 date: ${str}`)
    } else if (day && year && hour && minute && zone) {
      return utc(year, month, day, hour, minute, second, undefined, zone)
    }
  }

  // Fallback to native Date parsing (less reliable)
  const fallbackDate = new Date(str)
  if (isNaN(fallbackDate.getTime())) {
    debug(`Failed to parse date: ${str}`)
    return undefined
  }

  return fallbackDate
}

/**
 * Latest of the given dates, ignoring missing ones
 */
export function newestDate(
  dates: Iterable<Date | undefined>
): Date | undefined {
  let newest: Date | undefined
  for (const date of dates) {
    if (date && (!newest || date.getTime() > newest.getTime())) {
      newest = date
    }
  }
  return newest
}
