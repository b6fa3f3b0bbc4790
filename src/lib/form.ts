function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function readTextField(body: unknown, name: string): string {
  if (!isRecord(body)) return '';
  const value = body[name];
  if (Array.isArray(value)) return typeof value[0] === 'string' ? value[0] : '';
  return typeof value === 'string' ? value : '';
}

/** Repeated form fields arrive as an array, a single one as a string. */
export function readListField(body: unknown, name: string): string[] {
  if (!isRecord(body)) return [];
  const value = body[name];
  if (Array.isArray(value)) {
    return value.map((entry) => (typeof entry === 'string' ? entry : ''));
  }
  return typeof value === 'string' ? [value] : [];
}
