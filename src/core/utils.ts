import path from "node:path";

export function isoNow(): string {
  return new Date().toISOString();
}

export function defaultSessionId(): string {
  // YYYYMMDD-HHMMSS-<pid>
  const d = new Date();
  const yyyy = d.getUTCFullYear();
  const mm = String(d.getUTCMonth() + 1).padStart(2, "0");
  const dd = String(d.getUTCDate()).padStart(2, "0");
  const hh = String(d.getUTCHours()).padStart(2, "0");
  const mi = String(d.getUTCMinutes()).padStart(2, "0");
  const ss = String(d.getUTCSeconds()).padStart(2, "0");
  return `${yyyy}${mm}${dd}-${hh}${mi}${ss}-${process.pid}`;
}

export function truncateText(
  text: string,
  maxChars: number,
  suffix: string,
): { text: string; truncated: boolean } {
  if (text.length <= maxChars) {
    return { text, truncated: false };
  }

  return { text: `${text.slice(0, maxChars)}${suffix}`, truncated: true };
}

export function isPathInside(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  if (relative === "") return true;
  return relative.split(path.sep)[0] !== ".." && !path.isAbsolute(relative);
}
