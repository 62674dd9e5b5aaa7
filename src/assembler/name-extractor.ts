const NAME_PATTERN = /^[A-Za-zÀ-ÿ'\-]{2,30}$/;

const SIGN_OFFS = [
  'best',
  'best regards',
  'best wishes',
  'kind regards',
  'warm regards',
  'regards',
  'thanks',
  'thanks again',
  'thanks so much',
  'many thanks',
  'thank you',
  'cheers',
  'sincerely',
  'warmly',
  'love',
];

/** Words that land in a name slot without being a name */
const NOT_NAMES = new Set([
  'all',
  'again',
  'and',
  'best',
  'cheers',
  'client',
  'customer',
  'everyone',
  'everything',
  'for',
  'here',
  'it',
  'just',
  'me',
  'much',
  'nobody',
  'not',
  'nothing',
  'really',
  'regards',
  'so',
  'support',
  'team',
  'thank',
  'thanks',
  'the',
  'there',
  'very',
  'you',
  'your',
]);

// longest first so "thanks again" is not read as "thanks" followed by a name
const SIGN_OFF = `(?:${[...SIGN_OFFS].sort((a, b) => b.length - a.length).join('|')})`;
const NAME = "([A-Za-zÀ-ÿ'\\-]+)";

/** "Best, Sarah" or "Thanks Sarah Lee." on one line */
const INLINE_SIGN_OFF = new RegExp(`^${SIGN_OFF}[,!.]*\\s+${NAME}(?:\\s+[A-Za-zÀ-ÿ'\\-]+)?[.!]?$`, 'i');
/** "Thanks," alone, with the name on the next line */
const BARE_SIGN_OFF = new RegExp(`^${SIGN_OFF}[,!.]*$`, 'i');
const NAME_LINE = new RegExp(`^${NAME}(?:\\s+[A-Za-zÀ-ÿ'\\-]+)?[.!]?$`);
/** "- Sarah" */
const DASH_SIGNATURE = new RegExp(`^[-–~]\\s*${NAME}[.!]?$`);
// the name itself must be capitalized so "this is urgent" does not match
const INTRODUCTION = /\b(?:[Mm]y name is|[Mm]y name's|[Tt]his is)\s+([A-ZÀ-Þ][A-Za-zÀ-ÿ'\-]+)/;
const HERE_INTRODUCTION = /^(?:(?:[Hh]i|[Hh]ello|[Hh]ey)[,!]?\s+)?([A-ZÀ-Þ][A-Za-zÀ-ÿ'\-]+) here\b/;
const DEVICE_FOOTER = /^sent from /i;

/** First name, cleaned and capitalized; undefined when nothing usable remains */
export function cleanName(raw: string | undefined): string | undefined {
  const first = raw?.trim().split(/\s+/)[0];
  if (!first || !NAME_PATTERN.test(first)) return undefined;
  return first.charAt(0).toUpperCase() + first.slice(1).toLowerCase();
}

function accept(candidate: string | undefined): string | undefined {
  const name = cleanName(candidate);
  return name && !NOT_NAMES.has(name.toLowerCase()) ? name : undefined;
}

function fromSignature(lines: string[]): string | undefined {
  const last = lines[lines.length - 1];
  if (!last) return undefined;

  const dash = DASH_SIGNATURE.exec(last);
  if (dash) return accept(dash[1]);

  const inline = INLINE_SIGN_OFF.exec(last);
  if (inline) return accept(inline[1]);

  const before = lines[lines.length - 2];
  const alone = NAME_LINE.exec(last);
  if (before && alone && BARE_SIGN_OFF.test(before)) return accept(alone[1]);

  return undefined;
}

/**
 * Customer's first name from a sign-off ("Best, Sarah") or a
 * self-introduction ("My name is David") in the message.
 */
export function extractSignatureName(text: string | undefined): string | undefined {
  if (!text) return undefined;

  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  while (lines.length > 0 && DEVICE_FOOTER.test(lines[lines.length - 1])) {
    lines.pop();
  }

  const signed = fromSignature(lines);
  if (signed) return signed;

  const introduced = INTRODUCTION.exec(text) ?? HERE_INTRODUCTION.exec(lines[0] ?? '');
  return accept(introduced?.[1]);
}
