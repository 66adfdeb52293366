const LABEL_DAY_RE = /^(\d{4}-\d{2}-\d{2})T\d{2}:\d{2}:\d{2}$/;

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Format a run label as local time `YYYY-MM-DDTHH:MM:SS`. */
export function formatSnapshotLabel(d: Date): string {
  const date = `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
  const time = `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
  return `${date}T${time}`;
}

/**
 * Calendar day of a timestamp label, read straight from the label text so the
 * labelling and consolidation passes always agree on the day. Labels in any
 * other shape return null.
 */
export function labelDay(label: string): string | null {
  const match = LABEL_DAY_RE.exec(label);
  return match ? match[1] : null;
}
