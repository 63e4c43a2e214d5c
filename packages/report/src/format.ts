/** Column text wider than this is shortened. */
const MAX_NAME_LENGTH = 38;

export function truncateName(name: string): string {
  return name.length > MAX_NAME_LENGTH ? `${name.slice(0, 35)}...` : name;
}

/**
 * Left-aligns each cell to its width; the last cell is not padded.
 */
export function columns(cells: readonly string[], widths: readonly number[]): string {
  return cells
    .map((cell, index) => {
      const width = widths[index];
      return width === undefined ? cell : cell.padEnd(width);
    })
    .join(' ')
    .trimEnd();
}

export function formatGpa(gpa: number): string {
  return gpa.toFixed(2);
}

function twoDigits(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as YYYY-MM-DD HH:MM:SS. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${twoDigits(date.getMonth() + 1)}-${twoDigits(date.getDate())}`;
  const time = `${twoDigits(date.getHours())}:${twoDigits(date.getMinutes())}:${twoDigits(date.getSeconds())}`;
  return `${day} ${time}`;
}
