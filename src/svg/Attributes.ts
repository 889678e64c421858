export type AttributeValue = string | number | undefined;

const entities: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

/** @return number text: at most three decimals, no negative zero */
export function formatNumber(value: number): string {
  const rounded = Math.round(value * 1000) / 1000;
  return String(rounded === 0 ? 0 : rounded);
}

/** @return text with XML special characters escaped */
export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, ch => entities[ch]);
}

/** @return ` key="value"` pairs in insertion order, undefined values skipped */
export function formatAttributes(
  attrs: Readonly<Record<string, AttributeValue>>,
): string {
  return Object.entries(attrs)
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .map(([key, value]) => {
      const text = typeof value === "number" ? formatNumber(value) : value;
      return ` ${escapeXml(key)}="${escapeXml(text)}"`;
    })
    .join("");
}
