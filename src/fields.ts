/**
 * Field helpers shared by the exporter and the transform stage: custom field
 * lookup, HTML/text cleanup, and the date and duration shapes the
 * destination accepts.
 */

/* ------------------------------------------------------------------ */
/*  Custom fields                                                      */
/* ------------------------------------------------------------------ */

/**
 * First non-empty value of a custom field whose name contains one of
 * `names` (case-insensitive). Names are tried in the order given.
 */
export function customField(fields: Record<string, string>, ...names: string[]): string | undefined {
  const entries = Object.entries(fields);
  for (const wanted of names) {
    const w = wanted.toLowerCase();
    for (const [name, value] of entries) {
      if (!name.toLowerCase().includes(w)) continue;
      const v = value.trim();
      if (v) return v;
    }
  }
  return undefined;
}

/** Value of the field named exactly `name` (case-insensitive). */
export function customFieldExact(fields: Record<string, string>, name: string): string | undefined {
  const w = name.toLowerCase();
  for (const [k, v] of Object.entries(fields)) {
    if (k.trim().toLowerCase() === w && v.trim()) return v.trim();
  }
  return undefined;
}

export function parsePriority(value: string | undefined): 1 | 2 | 3 | undefined {
  if (!value) return undefined;
  const v = value.toLowerCase();
  if (v.includes('high') || v.includes('urgent')) return 1;
  if (v.includes('low')) return 3;
  if (v.includes('medium') || v.includes('normal')) return 2;
  return undefined;
}

/* ------------------------------------------------------------------ */
/*  Text                                                               */
/* ------------------------------------------------------------------ */

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

export function decodeEntities(s: string): string {
  return s.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (whole, body: string) => {
    if (body[0] === '#') {
      const code = body[1] === 'x' || body[1] === 'X' ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10);
      return Number.isFinite(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : whole;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? whole;
  });
}

/** Rich text -> plain text. Block breaks become newlines. */
export function stripHtml(s: string | undefined): string {
  if (!s) return '';
  const text = s
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|li|h[1-6])>/gi, '\n')
    .replace(/<[^>]+>/g, '');
  return decodeEntities(text)
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/* ------------------------------------------------------------------ */
/*  Dates / durations                                                  */
/* ------------------------------------------------------------------ */

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const DATE_TIME = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2}(?::\d{2})?)/;

/** `YYYY-MM-DD` from a date or datetime; undefined when unparseable. */
export function toDateOnly(s: string | undefined | null): string | undefined {
  if (!s) return undefined;
  const v = s.trim();
  if (DATE_ONLY.test(v)) return v;
  const m = v.match(DATE_TIME);
  return m ? m[1] : undefined;
}

/** `YYYY-MM-DDTHH:MM:SS`; a bare date becomes midnight. */
export function toDateTime(s: string | undefined | null): string | undefined {
  if (!s) return undefined;
  const v = s.trim();
  if (DATE_ONLY.test(v)) return `${v}T00:00:00`;
  const m = v.match(DATE_TIME);
  if (!m) return undefined;
  const time = m[2] ?? '00:00';
  return `${m[1]}T${time.length === 5 ? `${time}:00` : time}`;
}

/**
 * Duration as `HH:MM:SS`. Accepts `H:MM`, `H:MM:SS`, or a number of hours
 * ("1.5").
 */
export function toDuration(s: string | undefined): string | undefined {
  if (!s) return undefined;
  const v = s.trim();
  const clock = v.match(/^(\d+):([0-5]\d)(?::([0-5]\d))?$/);
  if (clock) return `${(clock[1] ?? '0').padStart(2, '0')}:${clock[2]}:${clock[3] ?? '00'}`;

  const hours = Number(v.replace(/\s*h(ours?)?$/i, ''));
  if (!v || !Number.isFinite(hours) || hours < 0) return undefined;
  const totalMin = Math.round(hours * 60);
  const hh = String(Math.floor(totalMin / 60)).padStart(2, '0');
  const mm = String(totalMin % 60).padStart(2, '0');
  return `${hh}:${mm}:00`;
}

/** Earliest / latest of a set of `YYYY-MM-DD` dates (lexical order works for this shape). */
export function dateRange(dates: Array<string | undefined>): { min?: string; max?: string } {
  const valid = dates.filter((d): d is string => d !== undefined).sort();
  return { min: valid[0], max: valid[valid.length - 1] };
}
