// Checklist columns are stored as JSON text. Malformed or mistyped content
// reads back as an empty value.

export function parseJsonRecord(raw: string | null | undefined): Record<string, boolean> {
  if (!raw) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) return {};
    const result: Record<string, boolean> = {};
    for (const [key, value] of Object.entries(parsed)) {
      result[key] = value === true;
    }
    return result;
  } catch (err) {
    return {};
  }
}

export function parseJsonStringList(raw: string | null | undefined): string[] {
  if (!raw) return [];
  try {
    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed)) return [];
    return parsed.filter((item): item is string => typeof item === 'string');
  } catch (err) {
    return [];
  }
}
