/**
 * Canonical text for formatted packets: JSON layout with sorted keys and a
 * two-space indent. Differs from JSON.stringify in three places:
 *   - bigint values print as plain digits
 *   - NaN / Infinity print as their names instead of null
 *   - object keys are sorted at every level
 */

export type FormattedValue =
  | number
  | bigint
  | string
  | FormattedValue[]
  | FormattedMapping;

export interface FormattedMapping {
  [key: string]: FormattedValue;
}

const INDENT = "  ";

function scalarText(value: number | bigint | string): string {
  if (typeof value === "string") return JSON.stringify(value);
  return String(value);
}

function render(value: FormattedValue, depth: number): string {
  if (typeof value !== "object") {
    return scalarText(value);
  }

  const pad = INDENT.repeat(depth + 1);
  const closePad = INDENT.repeat(depth);

  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    const items = value.map((item) => pad + render(item, depth + 1));
    return `[\n${items.join(",\n")}\n${closePad}]`;
  }

  const keys = Object.keys(value).sort();
  if (keys.length === 0) return "{}";
  const entries = keys.map(
    (key) => `${pad}${JSON.stringify(key)}: ${render(value[key], depth + 1)}`,
  );
  return `{\n${entries.join(",\n")}\n${closePad}}`;
}

export function toCanonicalText(value: FormattedValue): string {
  return render(value, 0);
}
