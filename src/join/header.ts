/**
 * Prefix every tab-separated header field: "name" -> "<prefix>.name".
 * An empty header has no fields and stays empty.
 */
export function prefixHeader(header: string, prefix: string): string {
  if (header === '') return header;
  return header
    .split('\t')
    .map(field => `${prefix}.${field}`)
    .join('\t');
}
