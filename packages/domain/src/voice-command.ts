// '+' and a digit run, then further groups of two or more digits, each after
// a space, dot, dash or bracket ("+1 (800) 555-0100"). A lone digit after a
// space is a separate word.
const SPOKEN_NUMBER = /\+\d+(?:(?=[\s.()-])\)?[\s.-]{0,2}\(?\d{2,})*/g;

const MIN_DIGITS = 8;
const MAX_DIGITS = 15;

export function extractNumber(text: string): string | undefined {
  for (const match of text.matchAll(SPOKEN_NUMBER)) {
    const digits = match[0].replace(/\D/g, '');
    if (digits.length >= MIN_DIGITS && digits.length <= MAX_DIGITS) {
      return `+${digits}`;
    }
  }
  return;
}
