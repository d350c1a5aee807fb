import { ConfigurationError } from "../errors";

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

const DAY_MS = 24 * 60 * 60 * 1000;

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];
const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

// zero-based day of the year
const yearDay = (d: Date) =>
  Math.floor(
    (Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()) -
      Date.UTC(d.getUTCFullYear(), 0, 1)) /
      DAY_MS
  );

// days before the first `firstDay` of the year fall in week 0
const weekOfYear = (d: Date, firstDay: number) =>
  Math.floor((yearDay(d) + 7 - ((d.getUTCDay() - firstDay + 7) % 7)) / 7);

// strftime directives, always rendered in UTC
const DIRECTIVES: Record<string, (date: Date) => string> = {
  Y: (d) => pad(d.getUTCFullYear(), 4),
  y: (d) => pad(d.getUTCFullYear() % 100),
  m: (d) => pad(d.getUTCMonth() + 1),
  d: (d) => pad(d.getUTCDate()),
  H: (d) => pad(d.getUTCHours()),
  M: (d) => pad(d.getUTCMinutes()),
  S: (d) => pad(d.getUTCSeconds()),
  f: (d) => pad(d.getUTCMilliseconds() * 1000, 6),
  j: (d) => pad(yearDay(d) + 1, 3),
  e: (d) => String(d.getUTCDate()).padStart(2, " "),
  I: (d) => pad(d.getUTCHours() % 12 || 12),
  p: (d) => (d.getUTCHours() < 12 ? "AM" : "PM"),
  a: (d) => WEEKDAYS[d.getUTCDay()].slice(0, 3),
  A: (d) => WEEKDAYS[d.getUTCDay()],
  b: (d) => MONTHS[d.getUTCMonth()].slice(0, 3),
  B: (d) => MONTHS[d.getUTCMonth()],
  w: (d) => String(d.getUTCDay()),
  u: (d) => String(d.getUTCDay() || 7),
  U: (d) => pad(weekOfYear(d, 0)),
  W: (d) => pad(weekOfYear(d, 1)),
  "%": () => "%",
};

type Token = { literal: string } | { directive: string };

/**
 * Returns the first directive in `format` that formatRunDate cannot render,
 * or undefined when every directive is supported.
 */
export function findUnsupportedDirective(format: string): string | undefined {
  for (let i = 0; i < format.length; i++) {
    if (format[i] !== "%") continue;

    const directive = format[i + 1];
    if (directive === undefined || !(directive in DIRECTIVES)) {
      return `%${directive ?? ""}`;
    }
    i++;
  }
  return undefined;
}

function tokenize(format: string): Token[] {
  const unsupported = findUnsupportedDirective(format);
  if (unsupported !== undefined) {
    throw new ConfigurationError(
      `Unsupported date format directive "${unsupported}" in "${format}"`,
      [{ path: "date_format", message: `unsupported directive ${unsupported}` }]
    );
  }

  const tokens: Token[] = [];
  let literal = "";

  for (let i = 0; i < format.length; i++) {
    const char = format[i];
    if (char !== "%") {
      literal += char;
      continue;
    }

    if (literal) tokens.push({ literal });
    literal = "";
    tokens.push({ directive: format[i + 1] });
    i++;
  }

  if (literal) tokens.push({ literal });
  return tokens;
}

export function formatRunDate(date: Date, format: string): string {
  if (Number.isNaN(date.getTime())) {
    throw new RangeError("Invalid Date");
  }

  return tokenize(format)
    .map((token) =>
      "literal" in token ? token.literal : DIRECTIVES[token.directive](date)
    )
    .join("");
}
