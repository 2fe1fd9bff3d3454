function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function sayTwiml(message: string, voice = 'alice', language = 'en-US'): string {
  return (
    '<?xml version="1.0" encoding="UTF-8"?>' +
    `<Response><Say voice="${voice}" language="${language}">${escapeXml(message)}</Say></Response>`
  );
}
