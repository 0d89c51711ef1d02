/** Quote a CSV field when it contains a delimiter, quote or line break. */
export function csvField(value: string | number | boolean): string {
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function csvLine(fields: ReadonlyArray<string | number | boolean>): string {
  return fields.map(csvField).join(',');
}

/** Lines joined with \n and a trailing newline. */
export function csvDocument(header: readonly string[], rows: ReadonlyArray<ReadonlyArray<string | number | boolean>>): string {
  return [csvLine(header), ...rows.map(csvLine)].join('\n') + '\n';
}
