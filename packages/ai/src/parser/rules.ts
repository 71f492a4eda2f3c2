/**
 * Rule-based task extraction
 *
 * Local fallback when the LLM is unavailable or its output is unusable.
 * Also the source of truth for whether a text mentions a date or time at
 * all: an LLM-proposed due date is discarded when nothing here matches.
 */

import {
  addDaysToDate,
  getZonedParts,
  isValidLocalDate,
  weekdayOf,
  zonedTimeToUtc,
  type LocalDate,
  type TaskPriority,
} from '@taskpilot/shared-types';

export interface RuleContext {
  now: Date;
  timezone: string;
  defaultPriority?: TaskPriority;
}

export interface RuleParseResult {
  title: string;
  description?: string;
  dueDate: Date | null;
  priority: TaskPriority;
  tags: string[];
  estimatedDuration: number | null;
  notes: string[];
}

interface Span {
  start: number;
  end: number;
}

interface DatePart {
  kind: 'date';
  date: LocalDate;
  /** Default time for phrases like "tonight" */
  defaultMinutes?: number;
  span: Span;
}

interface RelativeInstant {
  kind: 'instant';
  offsetMs: number;
  span: Span;
}

interface TimePart {
  minutes: number;
  span: Span;
}

export interface TemporalMatch {
  date: DatePart | RelativeInstant | null;
  time: TimePart | null;
}

const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'];

const MONTHS: Record<string, number> = {
  jan: 1, january: 1,
  feb: 2, february: 2,
  mar: 3, march: 3,
  apr: 4, april: 4,
  may: 5,
  jun: 6, june: 6,
  jul: 7, july: 7,
  aug: 8, august: 8,
  sep: 9, sept: 9, september: 9,
  oct: 10, october: 10,
  nov: 11, november: 11,
  dec: 12, december: 12,
};

const DATE_PREFIX = String.raw`(?:\b(?:by|on|due|before|until)\s+)?`;
const TIME_PREFIX = String.raw`(?:\b(?:at|by|around|before)\s+|@\s*)?`;

const TODAY = new RegExp(`${DATE_PREFIX}\\b(today|tonight|eod|end of (?:the )?day)\\b`, 'i');
const TOMORROW = new RegExp(`${DATE_PREFIX}\\b(tomorrow|tmrw)\\b`, 'i');
const NEXT_PERIOD = new RegExp(`${DATE_PREFIX}\\bnext (week|month)\\b`, 'i');
const WEEKDAY = new RegExp(
  `${DATE_PREFIX}\\b(?:(?:next|this)\\s+)?(${WEEKDAYS.join('|')})\\b`,
  'i'
);
const MONTH_DAY = new RegExp(
  `${DATE_PREFIX}\\b(${Object.keys(MONTHS).join('|')})\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?\\b`,
  'i'
);
const ISO_DATE = new RegExp(`${DATE_PREFIX}\\b(\\d{4})-(\\d{2})-(\\d{2})\\b`, 'i');
const SLASH_DATE = new RegExp(`${DATE_PREFIX}\\b(\\d{1,2})/(\\d{1,2})(?:/(\\d{2,4}))?\\b`, 'i');
const IN_RELATIVE =
  /\bin\s+(\d+|an?)\s+(minutes?|mins?|hours?|hrs?|days?|weeks?|months?)\b/i;

const TIME_12H = new RegExp(`${TIME_PREFIX}\\b(\\d{1,2})(?::(\\d{2}))?\\s*([ap])\\.?m\\.?(?![a-z])`, 'i');
const TIME_24H = /(?:\b(?:at|by|around|before)\s+|@\s*)\b([01]?\d|2[0-3]):([0-5]\d)\b/i;
const NOON = new RegExp(`${TIME_PREFIX}\\b(noon|midday)\\b`, 'i');

const HIGH_PRIORITY_PHRASE = /\b(?:high|top|urgent)[\s-]+priority\b|\bpriority\s*[:=]?\s*high\b/i;
const MEDIUM_PRIORITY_PHRASE = /\b(?:medium|normal)[\s-]+priority\b|\bpriority\s*[:=]?\s*medium\b/i;
const LOW_PRIORITY_PHRASE = /\blow[\s-]+priority\b|\bpriority\s*[:=]?\s*low\b/i;

const HIGH_PRIORITY_KEYWORDS = [
  'urgent',
  'urgently',
  'asap',
  'immediately',
  'important',
  'critical',
  'emergency',
  'crucial',
];
const LOW_PRIORITY_KEYWORDS = ['later', 'whenever', 'eventually', 'maybe', 'someday', 'when convenient'];

const LEAD_IN =
  /^(?:please\s+)?(?:remind me to|remind me|remember to|don'?t forget to|i need to|i have to|i must|i should|need to|have to|todo:?|to-do:?|add (?:a )?task(?: to)?:?)\s+/i;

const EXPLICIT_DURATION = /\bfor\s+(\d+)\s*(hours?|hrs?|minutes?|mins?)\b/i;
const ADJECTIVE_DURATION = /\b(\d+)-(hour|hr|minute|min)\b/i;

const TAG_KEYWORDS: Array<[tag: string, words: string[]]> = [
  ['work', ['meeting', 'email', 'project', 'report', 'presentation', 'work', 'office']],
  ['communication', ['call', 'email', 'message', 'contact', 'phone', 'text']],
  ['errands', ['buy', 'shop', 'shopping', 'grocery', 'groceries', 'store', 'purchase', 'errand']],
  ['health', ['doctor', 'dentist', 'appointment', 'exercise', 'workout', 'health', 'medical']],
  ['personal', ['personal', 'home', 'family', 'friend']],
];

const DURATION_KEYWORDS: Array<[minutes: number, words: string[]]> = [
  [60, ['meeting', 'call', 'interview']],
  [15, ['email', 'message', 'reply']],
  [120, ['report', 'analysis', 'research']],
  [90, ['shopping', 'groceries', 'errand', 'errands']],
  [60, ['exercise', 'workout']],
];

function spanOf(match: RegExpExecArray): Span {
  return { start: match.index, end: match.index + match[0].length };
}

function hasWord(text: string, word: string): boolean {
  const escaped = word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`\\b${escaped}s?\\b`, 'i').test(text);
}

function todayIn(context: RuleContext): LocalDate {
  const parts = getZonedParts(context.now, context.timezone);
  return { year: parts.year, month: parts.month, day: parts.day };
}

function minutesNow(context: RuleContext): number {
  const parts = getZonedParts(context.now, context.timezone);
  return parts.hour * 60 + parts.minute;
}

function compareDates(a: LocalDate, b: LocalDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

/** Month/day without a year: this year, or next year once it has passed */
function upcomingMonthDay(month: number, day: number, today: LocalDate): LocalDate | null {
  const candidate = { year: today.year, month, day };
  if (!isValidLocalDate(candidate)) {
    const nextYear = { year: today.year + 1, month, day };
    return isValidLocalDate(nextYear) ? nextYear : null;
  }
  return compareDates(candidate, today) < 0 ? { ...candidate, year: today.year + 1 } : candidate;
}

function addMonths(date: LocalDate, months: number): LocalDate {
  const index = date.month - 1 + months;
  const year = date.year + Math.floor(index / 12);
  const month = (index % 12) + 1;
  const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return { year, month, day: Math.min(date.day, lastDay) };
}

function findDate(text: string, context: RuleContext): DatePart | RelativeInstant | null {
  const today = todayIn(context);

  const relative = IN_RELATIVE.exec(text);
  if (relative) {
    const rawCount = relative[1] ?? '1';
    const count = /^\d+$/.test(rawCount) ? Number(rawCount) : 1;
    const unit = (relative[2] ?? '').toLowerCase();
    const span = spanOf(relative);
    if (unit.startsWith('min')) {
      return { kind: 'instant', offsetMs: count * 60_000, span };
    }
    if (unit.startsWith('h')) {
      return { kind: 'instant', offsetMs: count * 3_600_000, span };
    }
    if (unit.startsWith('day')) {
      return { kind: 'date', date: addDaysToDate(today, count), span };
    }
    if (unit.startsWith('week')) {
      return { kind: 'date', date: addDaysToDate(today, count * 7), span };
    }
    return { kind: 'date', date: addMonths(today, count), span };
  }

  const todayMatch = TODAY.exec(text);
  if (todayMatch) {
    const word = (todayMatch[1] ?? '').toLowerCase();
    return {
      kind: 'date',
      date: today,
      ...(word === 'tonight' ? { defaultMinutes: 20 * 60 } : {}),
      span: spanOf(todayMatch),
    };
  }

  const tomorrow = TOMORROW.exec(text);
  if (tomorrow) {
    return { kind: 'date', date: addDaysToDate(today, 1), span: spanOf(tomorrow) };
  }

  const nextPeriod = NEXT_PERIOD.exec(text);
  if (nextPeriod) {
    const unit = (nextPeriod[1] ?? '').toLowerCase();
    return {
      kind: 'date',
      date: unit === 'week' ? addDaysToDate(today, 7) : addMonths(today, 1),
      span: spanOf(nextPeriod),
    };
  }

  const weekday = WEEKDAY.exec(text);
  if (weekday) {
    const target = WEEKDAYS.indexOf((weekday[1] ?? '').toLowerCase());
    const daysAhead = (target - weekdayOf(today) + 7) % 7 || 7;
    return { kind: 'date', date: addDaysToDate(today, daysAhead), span: spanOf(weekday) };
  }

  const monthDay = MONTH_DAY.exec(text);
  if (monthDay) {
    const month = MONTHS[(monthDay[1] ?? '').toLowerCase()];
    const date = month ? upcomingMonthDay(month, Number(monthDay[2]), today) : null;
    if (date) {
      return { kind: 'date', date, span: spanOf(monthDay) };
    }
  }

  const iso = ISO_DATE.exec(text);
  if (iso) {
    const date = { year: Number(iso[1]), month: Number(iso[2]), day: Number(iso[3]) };
    if (isValidLocalDate(date)) {
      return { kind: 'date', date, span: spanOf(iso) };
    }
  }

  const slash = SLASH_DATE.exec(text);
  if (slash) {
    const month = Number(slash[1]);
    const day = Number(slash[2]);
    const rawYear = slash[3];
    let date: LocalDate | null;
    if (rawYear) {
      const year = rawYear.length === 2 ? 2000 + Number(rawYear) : Number(rawYear);
      const candidate = { year, month, day };
      date = isValidLocalDate(candidate) ? candidate : null;
    } else {
      date = upcomingMonthDay(month, day, today);
    }
    if (date) {
      return { kind: 'date', date, span: spanOf(slash) };
    }
  }

  return null;
}

function findTime(text: string): TimePart | null {
  const twelve = TIME_12H.exec(text);
  if (twelve) {
    const hour = Number(twelve[1]);
    const minute = twelve[2] !== undefined ? Number(twelve[2]) : 0;
    if (hour >= 1 && hour <= 12 && minute <= 59) {
      const isPm = (twelve[3] ?? '').toLowerCase() === 'p';
      const hour24 = (hour % 12) + (isPm ? 12 : 0);
      return { minutes: hour24 * 60 + minute, span: spanOf(twelve) };
    }
  }

  const twentyFour = TIME_24H.exec(text);
  if (twentyFour) {
    return {
      minutes: Number(twentyFour[1]) * 60 + Number(twentyFour[2]),
      span: spanOf(twentyFour),
    };
  }

  const noon = NOON.exec(text);
  if (noon) {
    return { minutes: 12 * 60, span: spanOf(noon) };
  }

  return null;
}

/**
 * Locate date and time phrases without resolving them
 */
export function findTemporal(text: string, context: RuleContext): TemporalMatch {
  return { date: findDate(text, context), time: findTime(text) };
}

/**
 * Whether the text carries any date or time language
 */
export function mentionsTime(text: string, context: RuleContext): boolean {
  const found = findTemporal(text, context);
  return found.date !== null || found.time !== null;
}

/**
 * Resolve date and time phrases to an instant in the user's timezone.
 * A date without a time is due at 23:59 local; a time without a date is the
 * next occurrence of that time.
 */
export function resolveDueDate(found: TemporalMatch, context: RuleContext): Date | null {
  const { date, time } = found;

  if (date?.kind === 'instant') {
    return new Date(context.now.getTime() + date.offsetMs);
  }

  if (date) {
    const minutes = time?.minutes ?? date.defaultMinutes ?? 23 * 60 + 59;
    return zonedTimeToUtc(
      { ...date.date, hour: Math.floor(minutes / 60), minute: minutes % 60 },
      context.timezone
    );
  }

  if (time) {
    const today = todayIn(context);
    const day = time.minutes > minutesNow(context) ? today : addDaysToDate(today, 1);
    return zonedTimeToUtc(
      { ...day, hour: Math.floor(time.minutes / 60), minute: time.minutes % 60 },
      context.timezone
    );
  }

  return null;
}

function findPriority(text: string): { priority: TaskPriority | null; span: Span | null } {
  const phrases: Array<[TaskPriority, RegExp]> = [
    ['high', HIGH_PRIORITY_PHRASE],
    ['low', LOW_PRIORITY_PHRASE],
    ['medium', MEDIUM_PRIORITY_PHRASE],
  ];
  for (const [priority, pattern] of phrases) {
    const match = pattern.exec(text);
    if (match) {
      return { priority, span: spanOf(match) };
    }
  }

  const highCount = HIGH_PRIORITY_KEYWORDS.filter((word) => hasWord(text, word)).length;
  const lowCount = LOW_PRIORITY_KEYWORDS.filter((word) => hasWord(text, word)).length;
  if (highCount > lowCount) return { priority: 'high', span: null };
  if (lowCount > highCount) return { priority: 'low', span: null };
  return { priority: null, span: null };
}

/**
 * Keyword-based priority, null when the text gives no signal
 */
export function detectPriority(text: string): TaskPriority | null {
  return findPriority(text).priority;
}

export function detectTags(text: string): string[] {
  return TAG_KEYWORDS.filter(([, words]) => words.some((word) => hasWord(text, word))).map(
    ([tag]) => tag
  );
}

function findDuration(text: string): { minutes: number | null; span: Span | null } {
  const explicit = EXPLICIT_DURATION.exec(text) ?? ADJECTIVE_DURATION.exec(text);
  if (explicit) {
    const count = Number(explicit[1]);
    const unit = (explicit[2] ?? '').toLowerCase();
    const minutes = unit.startsWith('h') ? count * 60 : count;
    return { minutes, span: explicit[0].toLowerCase().startsWith('for') ? spanOf(explicit) : null };
  }

  for (const [minutes, words] of DURATION_KEYWORDS) {
    if (words.some((word) => hasWord(text, word))) {
      return { minutes, span: null };
    }
  }
  return { minutes: null, span: null };
}

export function estimateDuration(text: string): number | null {
  return findDuration(text).minutes;
}

function removeSpans(text: string, spans: Span[]): string {
  let result = text;
  for (const span of [...spans].sort((a, b) => b.start - a.start)) {
    result = `${result.slice(0, span.start)} ${result.slice(span.end)}`;
  }
  return result;
}

/**
 * Title from the text with date, time, priority and duration phrases and
 * lead-ins like "remind me to" removed. Case is kept as typed.
 */
export function extractTitle(text: string, spans: Span[]): string {
  const collapsed = removeSpans(text, spans).replace(/[ \t]+/g, ' ').trim();
  const withoutLeadIn = collapsed.replace(LEAD_IN, '');
  const firstSentence = withoutLeadIn.split(/[.!?\n]/)[0] ?? '';

  return firstSentence
    .replace(/\s+([,;:])/g, '$1')
    .replace(/^[\s,;:\-–]+|[\s,;:\-–]+$/g, '')
    .slice(0, 255)
    .trim();
}

/**
 * Full rule-based parse. The title may come back empty for input with no
 * usable words; callers decide what to do with that.
 */
export function parseWithRules(text: string, context: RuleContext): RuleParseResult {
  const trimmed = text.trim();
  const temporal = findTemporal(trimmed, context);
  const priority = findPriority(trimmed);
  const duration = findDuration(trimmed);

  const spans = [temporal.date?.span, temporal.time?.span, priority.span, duration.span].filter(
    (span): span is Span => span !== undefined && span !== null
  );

  let title = extractTitle(trimmed, spans);
  if (!title) {
    title = (trimmed.split(/[.!?\n]/)[0] ?? '').trim().slice(0, 255);
  }

  const notes: string[] = ['Parsed with local rules'];
  const dueDate = resolveDueDate(temporal, context);
  if (!dueDate) {
    notes.push('No date or time found');
  }

  return {
    title,
    description: trimmed !== title ? trimmed.slice(0, 2000) : undefined,
    dueDate,
    priority: priority.priority ?? context.defaultPriority ?? 'medium',
    tags: detectTags(trimmed),
    estimatedDuration: duration.minutes,
    notes,
  };
}
