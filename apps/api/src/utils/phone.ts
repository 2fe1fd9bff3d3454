const E164_REGEX = /^\+[1-9]\d{7,14}$/;

export function isE164(value: string): boolean {
  return E164_REGEX.test(value);
}

export function normalizePhoneE164Candidate(raw?: string): string | undefined {
  if (!raw) {
    return;
  }

  const trimmed = raw.trim();
  if (!trimmed) {
    return;
  }

  const startsWithPlus = trimmed.startsWith('+');
  const digits = trimmed.replace(/\D/g, '');
  if (!digits) {
    return;
  }

  let candidate: string;
  if (startsWithPlus) {
    candidate = `+${digits}`;
  } else if (digits.length === 10) {
    candidate = `+1${digits}`;
  } else if (digits.length === 11 && digits.startsWith('1')) {
    candidate = `+${digits}`;
  } else {
    return;
  }

  return isE164(candidate) ? candidate : undefined;
}

/** Splits an upload into raw entries: one per line, first CSV column only. */
export function splitNumberList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.split(',')[0].trim().replace(/^"(.*)"$/, '$1').trim())
    .filter((entry) => entry.length > 0);
}
