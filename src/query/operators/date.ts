/**
 * Date operators: $dateBefore, $dateAfter
 *
 * Both sides may be written as:
 * - an ISO date, `2024-06-15` (midnight UTC)
 * - an ISO date-time, `2024-06-15T09:30:00Z` or with an offset; no offset means UTC
 * - epoch milliseconds, as an integer
 * - `"now"`, read from the context clock
 *
 * Comparisons are strict: the same instant is neither before nor after.
 * Anything unparseable does not match.
 */

import { NOW_TOKEN } from '../../constants'
import type { OperatorHandler, OperatorTable } from './types'

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/
const ISO_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:?\d{2})?$/i

function utcInstant(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0,
  millis = 0
): number | undefined {
  if (month < 1 || month > 12 || hours > 23 || minutes > 59 || seconds > 59) return undefined

  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds, millis))
  // Date.UTC rolls 2024-02-30 over into March
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined
  }
  return date.getTime()
}

function offsetMinutes(offset: string | undefined): number | undefined {
  if (offset === undefined || offset.toUpperCase() === 'Z') return 0

  const digits = offset.slice(1).replace(':', '')
  const hours = Number(digits.slice(0, 2))
  const minutes = Number(digits.slice(2))
  if (hours > 23 || minutes > 59) return undefined

  const total = hours * 60 + minutes
  return offset.startsWith('-') ? -total : total
}

/**
 * Parse a date operand or value to epoch milliseconds
 *
 * @returns undefined when the input is not a recognized date form
 *
 * @example
 * parseInstant('2024-01-01', Date.now) // 1704067200000
 * parseInstant('2024-01-01T02:00:00+02:00', Date.now) // 1704067200000
 * parseInstant(1704067200000, Date.now) // 1704067200000
 */
export function parseInstant(input: unknown, now: () => number): number | undefined {
  if (typeof input === 'number') {
    return Number.isSafeInteger(input) ? input : undefined
  }
  if (typeof input !== 'string') return undefined

  const text = input.trim()
  if (text.toLowerCase() === NOW_TOKEN) return now()

  const date = ISO_DATE.exec(text)
  if (date) {
    return utcInstant(Number(date[1]), Number(date[2]), Number(date[3]))
  }

  const dateTime = ISO_DATE_TIME.exec(text)
  if (!dateTime) return undefined

  const offset = offsetMinutes(dateTime[8])
  if (offset === undefined) return undefined

  // Fraction digits beyond milliseconds are truncated
  const millis = dateTime[7] ? Number(dateTime[7].padEnd(3, '0').slice(0, 3)) : 0
  const local = utcInstant(
    Number(dateTime[1]),
    Number(dateTime[2]),
    Number(dateTime[3]),
    Number(dateTime[4]),
    Number(dateTime[5]),
    Number(dateTime[6] ?? 0),
    millis
  )
  return local === undefined ? undefined : local - offset * 60_000
}

function dateComparison(test: (value: number, operand: number) => boolean): OperatorHandler {
  return (value, operand, context) => {
    const clock = () => context.now()
    const valueInstant = parseInstant(value, clock)
    const operandInstant = parseInstant(operand, clock)
    if (valueInstant === undefined || operandInstant === undefined) return false
    return test(valueInstant, operandInstant)
  }
}

export const dateOperators: OperatorTable = {
  $dateBefore: dateComparison((value, operand) => value < operand),
  $dateAfter: dateComparison((value, operand) => value > operand),
}
