// Prefixes printed into QR payloads, e.g. `TOOL#T1234`
const QR_PREFIXES = ['TOOL#', 'CONSUMABLE#'];

/**
 * Strip the QR payload prefix from a scanned code, leaving the item reference
 */
export function parseScanCode(code: string): string {
  const trimmed = code.trim();
  const prefix = QR_PREFIXES.find((candidate) => trimmed.toUpperCase().startsWith(candidate));
  return prefix ? trimmed.slice(prefix.length) : trimmed;
}
