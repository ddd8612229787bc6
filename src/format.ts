// src/format.ts
// Display helpers shared by the chat replies, reports and CLIs.

/** "electricity_kwh_peak" -> "Electricity Kwh Peak" */
export function titleCaseItem(item: string): string {
  return item
    .split("_")
    .map((w) => (w ? w[0].toUpperCase() + w.slice(1).toLowerCase() : w))
    .join(" ");
}
