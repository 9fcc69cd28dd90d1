/**
 * "dev, cloud,,db" -> ["dev", "cloud", "db"]. Order is preserved: later
 * profiles override earlier ones when files are merged.
 */
export function parseProfiles(raw: string): string[] {
  return raw
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}
